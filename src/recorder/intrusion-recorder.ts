/**
 * Stores a photo of whoever submitted a wrong secret.
 *
 * Files land in the photos directory as `photo_<YYYYMMDD_HHMMSS>.png`, named
 * from local time. The directory is created on demand. A second attempt within
 * the same second gets a numeric suffix so the earlier photo is kept.
 */
import * as fs from 'fs/promises';
import * as path from 'path';
import { encodePng, toRgb, type Frame } from '../camera/frame.js';
import { logger } from '../utils/logger.js';
import { PersistError, errorMessage } from '../utils/errors.js';

export type PersistResult =
  | { ok: true; path: string }
  | { ok: false; error: PersistError };

export interface FrameRecorder {
  persist(frame: Frame): Promise<PersistResult>;
}

export type Clock = () => Date;

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

export function formatTimestamp(d: Date): string {
  const date = `${pad(d.getFullYear(), 4)}${pad(d.getMonth() + 1)}${pad(d.getDate())}`;
  const time = `${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`;
  return `${date}_${time}`;
}

export const PHOTO_NAME_PATTERN = /^photo_\d{8}_\d{6}(?:_\d+)?\.png$/;

const MAX_SAME_SECOND = 100;

export class IntrusionRecorder implements FrameRecorder {
  constructor(
    private readonly photosDir: string,
    private readonly now: Clock = () => new Date(),
  ) {}

  async persist(frame: Frame): Promise<PersistResult> {
    const stem = `photo_${formatTimestamp(this.now())}`;
    let target = path.join(this.photosDir, `${stem}.png`);

    try {
      await fs.mkdir(this.photosDir, { recursive: true });
      const png = await encodePng(toRgb(frame));

      for (let n = 1; ; n++) {
        try {
          await fs.writeFile(target, png, { flag: 'wx' });
          break;
        } catch (err) {
          if (!isExistsError(err) || n >= MAX_SAME_SECOND) throw err;
          target = path.join(this.photosDir, `${stem}_${n}.png`);
        }
      }
    } catch (err) {
      logger.error('Recorder: could not store intrusion photo', { path: target, error: errorMessage(err) });
      return {
        ok: false,
        error: new PersistError(`Could not save image ${target}: ${errorMessage(err)}`, target, err),
      };
    }

    logger.info('Recorder: intrusion photo stored', { path: target });
    return { ok: true, path: target };
  }
}

function isExistsError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'EEXIST';
}
