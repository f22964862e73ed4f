/**
 * Wires the engine to its real collaborators from environment configuration.
 */
import {
  env,
  buildCameraConfig,
  buildFaceRecognitionConfig,
  buildVerificationConfig,
  type Env,
} from './config.js';
import { ExclusiveCaptureSource, FfmpegCaptureSource } from './camera/capture.js';
import { createFaceEncoder } from './face/face-api-encoder.js';
import { IntrusionRecorder } from './recorder/intrusion-recorder.js';
import { VerificationEngine } from './verification/engine.js';
import { logger } from './utils/logger.js';

export async function createVerificationEngine(source: Env = env): Promise<VerificationEngine> {
  const config = buildVerificationConfig(source);
  const encoder = await createFaceEncoder(buildFaceRecognitionConfig(source));
  const camera = new ExclusiveCaptureSource(new FfmpegCaptureSource(buildCameraConfig(source)));
  const recorder = new IntrusionRecorder(config.photosDir);

  logger.info('Engine: ready', {
    facesDir: config.facesDir,
    photosDir: config.photosDir,
    recognition: encoder.available ? 'available' : 'unavailable',
  });

  return new VerificationEngine(config, { camera, recorder, encoder });
}
