/**
 * Camera capture: grabs one still frame from a video device through ffmpeg.
 *
 * Every capture is a single short-lived ffmpeg process: the device is opened,
 * one frame is read as raw bgr24 on stdout, and the process exits, which
 * releases the device. `ExclusiveCaptureSource` serialises callers so two
 * requests never race for the same device.
 */
import { execFile } from 'child_process';
import type { CameraConfig } from '../config.js';
import { logger } from '../utils/logger.js';
import { ExclusiveLock } from '../utils/lock.js';
import {
  CaptureReadError,
  CaptureUnavailableError,
  errorMessage,
  type CaptureError,
} from '../utils/errors.js';
import { createFrame, expectedByteLength, type Frame } from './frame.js';

export type CaptureResult =
  | { ok: true; frame: Frame }
  | { ok: false; error: CaptureError };

export interface CaptureSource {
  capture(): Promise<CaptureResult>;
}

// ── ffmpeg ────────────────────────────────────────────────────────────────────

interface FfmpegOutput {
  stdout: Buffer;
  stderr: string;
}

interface FfmpegFailure {
  code?: string | number | null;
  killed?: boolean;
  stderr: string;
  message: string;
}

export type FfmpegRunner = (
  file: string,
  args: string[],
  opts: { timeoutMs: number; maxBuffer: number },
) => Promise<FfmpegOutput>;

function failureFrom(err: unknown, stderr: Buffer | string | undefined): FfmpegFailure {
  const base: FfmpegFailure = { stderr: stderr ? String(stderr).trim() : '', message: errorMessage(err) };
  if (typeof err === 'object' && err !== null) {
    if ('code' in err && (typeof err.code === 'string' || typeof err.code === 'number')) base.code = err.code;
    if ('killed' in err && typeof err.killed === 'boolean') base.killed = err.killed;
  }
  return base;
}

export class FfmpegError extends Error {
  constructor(public readonly failure: FfmpegFailure) {
    super(failure.stderr || failure.message);
    this.name = 'FfmpegError';
  }
}

export const runFfmpeg: FfmpegRunner = (file, args, opts) =>
  new Promise((resolve, reject) => {
    execFile(
      file,
      args,
      { encoding: 'buffer', timeout: opts.timeoutMs, maxBuffer: opts.maxBuffer, killSignal: 'SIGKILL' },
      (err, stdout, stderr) => {
        if (err) {
          reject(new FfmpegError(failureFrom(err, stderr)));
          return;
        }
        resolve({ stdout, stderr: stderr.toString().trim() });
      },
    );
  });

export function buildCaptureArgs(camera: CameraConfig): string[] {
  const size = `${camera.width}x${camera.height}`;
  return [
    '-hide_banner',
    '-loglevel', 'error',
    '-f', camera.inputFormat,
    '-video_size', size,
    '-i', camera.device,
    '-frames:v', '1',
    '-vf', `scale=${camera.width}:${camera.height}`,
    '-f', 'rawvideo',
    '-pix_fmt', 'bgr24',
    'pipe:1',
  ];
}

export class FfmpegCaptureSource implements CaptureSource {
  constructor(
    private readonly camera: CameraConfig,
    private readonly run: FfmpegRunner = runFfmpeg,
  ) {}

  async capture(): Promise<CaptureResult> {
    const { camera } = this;
    const frameBytes = expectedByteLength(camera.width, camera.height);
    logger.debug('Camera: capturing frame', { device: camera.device, format: camera.inputFormat });

    let output: FfmpegOutput;
    try {
      output = await this.run(camera.ffmpegPath, buildCaptureArgs(camera), {
        timeoutMs: camera.timeoutMs,
        maxBuffer: frameBytes * 2,
      });
    } catch (err) {
      return { ok: false, error: classifyFailure(err, camera) };
    }

    if (output.stdout.length < frameBytes) {
      logger.warn('Camera: short frame', { expected: frameBytes, received: output.stdout.length });
      return {
        ok: false,
        error: new CaptureReadError(
          `Camera returned no frame (${output.stdout.length} of ${frameBytes} bytes)`,
        ),
      };
    }

    // some v4l2 drivers emit a second frame before ffmpeg stops
    const frame = createFrame(output.stdout.subarray(0, frameBytes), camera.width, camera.height);
    logger.debug('Camera: frame captured', { width: frame.width, height: frame.height });
    return { ok: true, frame };
  }
}

function classifyFailure(err: unknown, camera: CameraConfig): CaptureError {
  const failure = err instanceof FfmpegError ? err.failure : failureFrom(err, undefined);

  if (failure.code === 'ENOENT') {
    return new CaptureUnavailableError(`ffmpeg not found at "${camera.ffmpegPath}"`, err);
  }
  if (failure.killed) {
    return new CaptureReadError(`Camera did not deliver a frame within ${camera.timeoutMs}ms`, err);
  }
  const detail = failure.stderr || failure.message;
  return new CaptureUnavailableError(`Cannot open camera ${camera.device}: ${detail}`, err);
}

// ── Exclusive access ──────────────────────────────────────────────────────────

const deviceLock = new ExclusiveLock();

/**
 * Wraps a source so only one capture is in flight process-wide. A source that
 * throws instead of returning a failed result is converted to
 * `capture_unavailable`; the lock is released either way.
 */
export class ExclusiveCaptureSource implements CaptureSource {
  constructor(
    private readonly inner: CaptureSource,
    private readonly lock: ExclusiveLock = deviceLock,
  ) {}

  capture(): Promise<CaptureResult> {
    return this.lock.run<CaptureResult>(async () => {
      try {
        return await this.inner.capture();
      } catch (err) {
        logger.error('Camera: capture threw', { error: errorMessage(err) });
        return { ok: false, error: new CaptureUnavailableError(errorMessage(err), err) };
      }
    });
  }
}
