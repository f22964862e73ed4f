/**
 * Reference gallery: one labelled face descriptor per image in the faces
 * directory. The label is the file name without its extension.
 *
 * Loading never fails as a whole. A missing directory or an unavailable
 * encoder yields an empty gallery; unreadable images and images without a
 * detectable face are skipped. Entries keep enumeration order (file names in
 * code-unit order) and duplicate labels are kept as they are.
 */
import * as fs from 'fs';
import * as path from 'path';
import { GALLERY_EXTENSIONS } from '../config.js';
import { decodeImageFile, type RgbImage } from '../camera/frame.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { FaceEncoder, FaceEncoding } from './encoder.js';

export interface GalleryEntry {
  readonly label: string;
  readonly encoding: FaceEncoding;
}

export type ImageDecoder = (filePath: string) => Promise<RgbImage>;

export function isGalleryImage(fileName: string): boolean {
  const ext = path.extname(fileName).toLowerCase();
  return GALLERY_EXTENSIONS.some((allowed) => allowed === ext);
}

export function labelFor(fileName: string): string {
  return path.parse(fileName).name;
}

function listCandidates(directory: string): string[] {
  let names: string[];
  try {
    if (!fs.statSync(directory).isDirectory()) return [];
    // readdir order is filesystem-dependent; code-unit order keeps it stable
    names = fs.readdirSync(directory).sort();
  } catch {
    return [];
  }
  return names.filter(isGalleryImage);
}

export async function loadGallery(
  directory: string,
  encoder: FaceEncoder,
  decode: ImageDecoder = decodeImageFile,
): Promise<GalleryEntry[]> {
  if (!encoder.available) return [];

  const candidates = listCandidates(directory);
  const gallery: GalleryEntry[] = [];

  for (const fileName of candidates) {
    const filePath = path.join(directory, fileName);
    try {
      const image = await decode(filePath);
      const [first] = await encoder.encode(image);
      if (!first) {
        logger.debug('Gallery: no face found, skipping', { file: fileName });
        continue;
      }
      gallery.push({ label: labelFor(fileName), encoding: first });
    } catch (err) {
      logger.warn('Gallery: unreadable reference image, skipping', { file: fileName, error: errorMessage(err) });
    }
  }

  logger.debug('Gallery: loaded', { directory, candidates: candidates.length, entries: gallery.length });
  return gallery;
}
