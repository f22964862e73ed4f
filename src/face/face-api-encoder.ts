/**
 * Face encoder backed by @vladmandic/face-api (SSD MobileNet v1 detector,
 * 68-point landmarks and the 128-d face recognition net).
 *
 * The library runs on TensorFlow.js with the WebAssembly backend, loaded
 * through face-api's `node-wasm` build. Recognition is still an optional
 * capability: when the module cannot be loaded, recognition is disabled by
 * configuration, or the model weights are missing, `createFaceEncoder` hands
 * back an `UnavailableFaceEncoder` carrying the reason instead of failing
 * start-up.
 */
import * as fs from 'fs';
import * as path from 'path';
import { createRequire } from 'module';
import type { FaceRecognitionConfig } from '../config.js';
import type { RgbImage } from '../camera/frame.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import {
  RECOGNITION_UNAVAILABLE_REASON,
  UnavailableFaceEncoder,
  withinThreshold,
  type FaceEncoder,
  type FaceEncoding,
} from './encoder.js';

const require = createRequire(import.meta.url);

/** The slice of face-api this module relies on. */
export interface FaceDescriber {
  loadModels(modelsPath: string): Promise<void>;
  describeFaces(image: RgbImage, minConfidence: number): Promise<Float32Array[]>;
}

export type FaceDescriberLoader = () => Promise<FaceDescriber>;

interface DisposableTensor {
  dispose(): void;
}

interface ModelNet {
  loadFromDisk(modelsPath: string): Promise<void>;
}

/** The face-api exports the describer calls into. */
export interface FaceApiModule {
  tf: {
    setBackend(name: string): Promise<boolean>;
    ready(): Promise<void>;
    tensor3d(values: Uint8Array, shape: [number, number, number], dtype: 'int32'): DisposableTensor;
  };
  nets: Record<'ssdMobilenetv1' | 'faceLandmark68Net' | 'faceRecognitionNet', ModelNet>;
  SsdMobilenetv1Options: new (options: { minConfidence: number }) => object;
  detectAllFaces(input: DisposableTensor, options: object): {
    withFaceLandmarks(): {
      withFaceDescriptors(): Promise<Array<{ descriptor: Float32Array }>>;
    };
  };
}

interface WasmBackend {
  setWasmPaths(prefix: string): void;
}

export function describerFrom(faceapi: FaceApiModule): FaceDescriber {
  return {
    async loadModels(modelsPath) {
      await faceapi.nets.ssdMobilenetv1.loadFromDisk(modelsPath);
      await faceapi.nets.faceLandmark68Net.loadFromDisk(modelsPath);
      await faceapi.nets.faceRecognitionNet.loadFromDisk(modelsPath);
    },

    async describeFaces(image, minConfidence) {
      const tensor = faceapi.tf.tensor3d(image.data, [image.height, image.width, image.channels], 'int32');
      try {
        const results = await faceapi
          .detectAllFaces(tensor, new faceapi.SsdMobilenetv1Options({ minConfidence }))
          .withFaceLandmarks()
          .withFaceDescriptors();
        return results.map((r) => Float32Array.from(r.descriptor));
      } finally {
        tensor.dispose();
      }
    },
  };
}

export async function useWasmBackend(faceapi: FaceApiModule, wasm: WasmBackend, wasmDir: string): Promise<void> {
  // the .wasm binaries sit next to the backend's entry point
  wasm.setWasmPaths(wasmDir.endsWith(path.sep) ? wasmDir : wasmDir + path.sep);
  if (!(await faceapi.tf.setBackend('wasm'))) {
    throw new Error('TensorFlow.js wasm backend failed to initialise');
  }
  await faceapi.tf.ready();
}

export const loadFaceApi: FaceDescriberLoader = async () => {
  const faceapi: FaceApiModule = require('@vladmandic/face-api/dist/face-api.node-wasm.js');
  const wasm: WasmBackend = require('@tensorflow/tfjs-backend-wasm');
  await useWasmBackend(faceapi, wasm, path.dirname(require.resolve('@tensorflow/tfjs-backend-wasm')));
  logger.debug('Face: tfjs wasm backend ready');
  return describerFrom(faceapi);
};

export class FaceApiEncoder implements FaceEncoder {
  readonly available = true;

  constructor(
    private readonly describer: FaceDescriber,
    private readonly options: Pick<FaceRecognitionConfig, 'matchThreshold' | 'minConfidence'>,
  ) {}

  async encode(image: RgbImage): Promise<FaceEncoding[]> {
    return this.describer.describeFaces(image, this.options.minConfidence);
  }

  matches(known: FaceEncoding, probe: FaceEncoding): boolean {
    return withinThreshold(known, probe, this.options.matchThreshold);
  }
}

export async function createFaceEncoder(
  config: FaceRecognitionConfig,
  load: FaceDescriberLoader = loadFaceApi,
): Promise<FaceEncoder> {
  if (!config.enabled) {
    logger.info('Face: recognition disabled by configuration');
    return new UnavailableFaceEncoder('Face recognition is disabled by configuration. Recognition skipped.');
  }

  if (!fs.existsSync(config.modelsPath)) {
    logger.warn('Face: model directory not found, recognition unavailable', { modelsPath: config.modelsPath });
    return new UnavailableFaceEncoder(RECOGNITION_UNAVAILABLE_REASON);
  }

  try {
    const describer = await load();
    await describer.loadModels(config.modelsPath);
    logger.info('Face: models loaded', { modelsPath: config.modelsPath });
    return new FaceApiEncoder(describer, config);
  } catch (err) {
    logger.warn('Face: face-api could not be loaded, recognition unavailable', { error: errorMessage(err) });
    return new UnavailableFaceEncoder(RECOGNITION_UNAVAILABLE_REASON);
  }
}
