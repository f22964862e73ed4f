import type { RgbImage } from '../camera/frame.js';
import { EncodingUnavailableError } from '../utils/errors.js';

/** Descriptor of one detected face. Produced once, never mutated. */
export type FaceEncoding = Readonly<Float32Array>;

export interface FaceEncoder {
  readonly available: boolean;
  /** Why the capability is missing; undefined when available. */
  readonly unavailableReason?: string;
  /** Descriptors of every face found, in detection order. */
  encode(image: RgbImage): Promise<FaceEncoding[]>;
  /** True when the two descriptors are within the match threshold. */
  matches(known: FaceEncoding, probe: FaceEncoding): boolean;
}

export const RECOGNITION_UNAVAILABLE_REASON =
  'Face recognition is not installed on this deployment. Recognition skipped.';

export class UnavailableFaceEncoder implements FaceEncoder {
  readonly available = false;

  constructor(readonly unavailableReason: string = RECOGNITION_UNAVAILABLE_REASON) {}

  async encode(): Promise<FaceEncoding[]> {
    throw new EncodingUnavailableError(this.unavailableReason);
  }

  matches(): boolean {
    return false;
  }
}

export function euclideanDistance(a: FaceEncoding, b: FaceEncoding): number {
  if (a.length !== b.length) {
    throw new RangeError(`Descriptor length mismatch: ${a.length} vs ${b.length}`);
  }
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    sum += diff * diff;
  }
  return Math.sqrt(sum);
}

export function withinThreshold(a: FaceEncoding, b: FaceEncoding, threshold: number): boolean {
  return euclideanDistance(a, b) <= threshold;
}
