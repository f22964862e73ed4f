import { toRgb, type Frame } from '../camera/frame.js';
import type { FaceEncoder } from './encoder.js';
import type { GalleryEntry } from './gallery.js';

export type MatchResult =
  | { kind: 'matched'; label: string; index: number }
  | { kind: 'no_face' }
  | { kind: 'no_match' };

/**
 * Compare the first face of the probe frame against the gallery in order and
 * return the first entry within threshold. This is first-match, not
 * nearest-match: with duplicate references the earliest one wins.
 */
export async function matchFace(
  probe: Frame,
  gallery: readonly GalleryEntry[],
  encoder: FaceEncoder,
): Promise<MatchResult> {
  const [captured] = await encoder.encode(toRgb(probe));
  if (!captured) return { kind: 'no_face' };

  const index = gallery.findIndex((entry) => encoder.matches(entry.encoding, captured));
  const entry = gallery[index];
  if (!entry) return { kind: 'no_match' };

  return { kind: 'matched', label: entry.label, index };
}
