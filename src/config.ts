import * as path from 'path';
import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

export const EnvSchema = z.object({
  // Access
  CAPTURE_PASSWORD:      z.string().default('monSecret'),

  // Local storage
  PHOTOS_DIR:            z.string().min(1).default('photos'),
  FACES_DIR:             z.string().min(1).default('faces'),

  // Face recognition (optional capability)
  FACE_RECOGNITION:      z.enum(['auto', 'off']).default('auto'),
  FACE_MODELS_PATH:      z.string().min(1).default(
    path.join(process.cwd(), 'node_modules', '@vladmandic', 'face-api', 'model'),
  ),
  FACE_MATCH_THRESHOLD:  z.coerce.number().positive().default(0.6),
  FACE_MIN_CONFIDENCE:   z.coerce.number().min(0).max(1).default(0.5),

  // Camera
  CAMERA_DEVICE:         z.string().min(1).default('/dev/video0'),
  CAMERA_INPUT_FORMAT:   z.string().min(1).default('v4l2'),
  CAMERA_WIDTH:          z.coerce.number().int().positive().default(640),
  CAMERA_HEIGHT:         z.coerce.number().int().positive().default(480),
  CAMERA_TIMEOUT_MS:     z.coerce.number().int().positive().default(10_000),
  FFMPEG_PATH:           z.string().min(1).default('ffmpeg'),

  // HTTP front end
  HOST:                  z.string().min(1).default('127.0.0.1'),
  PORT:                  z.coerce.number().int().min(0).max(65_535).default(5000),

  // Logging
  LOG_LEVEL:             z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:            z.enum(['text', 'json']).default('text'),
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const invalid = parsed.error.issues.map(i => i.path.join('.')).join(', ');
    throw new Error(`Missing or invalid environment variables: ${invalid}`);
  }
  return parsed.data;
}

export const env = parseEnv(process.env);

// ── Verification ──────────────────────────────────────────────────────────────

/** Read once at start-up and handed to the engine; never mutated afterwards. */
export interface VerificationConfig {
  readonly secret: string;
  readonly photosDir: string;
  readonly facesDir: string;
}

export function buildVerificationConfig(source: Env = env): VerificationConfig {
  return Object.freeze({
    secret:    source.CAPTURE_PASSWORD,
    photosDir: source.PHOTOS_DIR,
    facesDir:  source.FACES_DIR,
  });
}

// ── Camera ────────────────────────────────────────────────────────────────────

export interface CameraConfig {
  ffmpegPath: string;
  device: string;
  inputFormat: string;
  width: number;
  height: number;
  timeoutMs: number;
}

export function buildCameraConfig(source: Env = env): CameraConfig {
  return {
    ffmpegPath:  source.FFMPEG_PATH,
    device:      source.CAMERA_DEVICE,
    inputFormat: source.CAMERA_INPUT_FORMAT,
    width:       source.CAMERA_WIDTH,
    height:      source.CAMERA_HEIGHT,
    timeoutMs:   source.CAMERA_TIMEOUT_MS,
  };
}

// ── Face Recognition ──────────────────────────────────────────────────────────

export interface FaceRecognitionConfig {
  enabled: boolean;
  modelsPath: string;
  matchThreshold: number;   // max euclidean distance between two descriptors
  minConfidence: number;    // detector score below which a face is ignored
}

export function buildFaceRecognitionConfig(source: Env = env): FaceRecognitionConfig {
  return {
    enabled:        source.FACE_RECOGNITION === 'auto',
    modelsPath:     source.FACE_MODELS_PATH,
    matchThreshold: source.FACE_MATCH_THRESHOLD,
    minConfidence:  source.FACE_MIN_CONFIDENCE,
  };
}

// ── Gallery ───────────────────────────────────────────────────────────────────

export const GALLERY_EXTENSIONS = ['.jpg', '.jpeg', '.png'] as const;
