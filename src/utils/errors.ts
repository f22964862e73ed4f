export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** The camera device could not be opened (missing, busy, ffmpeg absent). */
export class CaptureUnavailableError extends Error {
  readonly kind = 'capture_unavailable';
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'CaptureUnavailableError';
  }
}

/** The device opened but no usable frame came back. */
export class CaptureReadError extends Error {
  readonly kind = 'capture_read_failed';
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'CaptureReadError';
  }
}

export type CaptureError = CaptureUnavailableError | CaptureReadError;

export class PersistError extends Error {
  readonly kind = 'persist_failed';
  constructor(message: string, public readonly path: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'PersistError';
  }
}

export class EncodingUnavailableError extends Error {
  readonly kind = 'encoding_unavailable';
  constructor(message: string) {
    super(message);
    this.name = 'EncodingUnavailableError';
  }
}
