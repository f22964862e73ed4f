/**
 * Verification engine: turns a submitted secret into exactly one Outcome.
 *
 * Wrong secret: photograph the submitter and stop; recognition is never
 * attempted on this path. Correct secret: short-circuit before touching the
 * camera when the encoder is unavailable or the gallery is empty, otherwise
 * capture once and match against the gallery. Each call performs at most one
 * capture and at most one file write, and never throws.
 */
import type { VerificationConfig } from '../config.js';
import type { CaptureSource } from '../camera/capture.js';
import type { FrameRecorder } from '../recorder/intrusion-recorder.js';
import type { FaceEncoder } from '../face/encoder.js';
import { loadGallery, type GalleryEntry } from '../face/gallery.js';
import { matchFace } from '../face/matcher.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { Outcome } from './outcome.js';

export type GalleryLoader = (directory: string, encoder: FaceEncoder) => Promise<GalleryEntry[]>;

export interface VerificationDeps {
  camera: CaptureSource;
  recorder: FrameRecorder;
  encoder: FaceEncoder;
  loadGallery?: GalleryLoader;
}

export class VerificationEngine {
  private readonly camera: CaptureSource;
  private readonly recorder: FrameRecorder;
  private readonly encoder: FaceEncoder;
  private readonly loadGallery: GalleryLoader;

  constructor(private readonly config: VerificationConfig, deps: VerificationDeps) {
    this.camera = deps.camera;
    this.recorder = deps.recorder;
    this.encoder = deps.encoder;
    this.loadGallery = deps.loadGallery ?? loadGallery;
  }

  async evaluate(submittedSecret: string): Promise<Outcome> {
    const outcome = submittedSecret === this.config.secret
      ? await this.recognize()
      : await this.recordIntrusion();

    logger.info('Verification: outcome', { outcome: outcome.kind });
    return outcome;
  }

  private async recordIntrusion(): Promise<Outcome> {
    logger.warn('Verification: wrong secret submitted, capturing photo');

    const shot = await this.camera.capture();
    if (!shot.ok) {
      return { kind: 'capture_failed', stage: 'intrusion', error: shot.error.message };
    }

    const saved = await this.recorder.persist(shot.frame);
    if (!saved.ok) {
      return { kind: 'persist_failed', error: saved.error.message };
    }
    return { kind: 'secret_rejected', photoPath: saved.path };
  }

  private async recognize(): Promise<Outcome> {
    if (!this.encoder.available) {
      return { kind: 'recognition_unavailable', reason: this.encoder.unavailableReason ?? 'Face recognition unavailable.' };
    }

    const gallery = await this.loadGallery(this.config.facesDir, this.encoder);
    if (gallery.length === 0) {
      return { kind: 'recognition_skipped_no_gallery' };
    }

    const shot = await this.camera.capture();
    if (!shot.ok) {
      return { kind: 'capture_failed', stage: 'recognition', error: shot.error.message };
    }

    try {
      const match = await matchFace(shot.frame, gallery, this.encoder);
      logger.debug('Verification: match result', { result: match.kind, galleryEntries: gallery.length });
      return match.kind === 'matched'
        ? { kind: 'person_recognized', label: match.label }
        : { kind: 'person_unknown' };
    } catch (err) {
      logger.error('Verification: face encoder failed on probe frame', { error: errorMessage(err) });
      return { kind: 'recognition_failed', error: errorMessage(err) };
    }
  }
}
