import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import sharp from 'sharp';
import { IntrusionRecorder, PHOTO_NAME_PATTERN, formatTimestamp } from './intrusion-recorder.js';
import { solidFrame } from '../testing/fakes.js';

const fixedClock = () => new Date(2024, 0, 2, 3, 4, 5);

let root: string;

beforeEach(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), 'recorder-'));
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

describe('formatTimestamp', () => {
  it('renders local time as YYYYMMDD_HHMMSS', () => {
    expect(formatTimestamp(new Date(2024, 11, 31, 23, 59, 8))).toBe('20241231_235908');
  });
});

describe('IntrusionRecorder', () => {
  it('creates the directory and writes a decodable PNG of the frame size', async () => {
    const photosDir = path.join(root, 'photos');
    const frame = solidFrame([0, 0, 255], 6, 4);

    const result = await new IntrusionRecorder(photosDir, fixedClock).persist(frame);

    expect(result).toEqual({ ok: true, path: path.join(photosDir, 'photo_20240102_030405.png') });
    if (!result.ok) return;
    const { data, info } = await sharp(result.path).raw().toBuffer({ resolveWithObject: true });
    expect(info.width).toBe(6);
    expect(info.height).toBe(4);
    // BGR (0, 0, 255) is pure red once written
    expect(Array.from(data.subarray(0, 3))).toEqual([255, 0, 0]);
  });

  it('names photos photo_<14-digit timestamp>.png with the real clock', async () => {
    const result = await new IntrusionRecorder(path.join(root, 'photos')).persist(solidFrame([1, 2, 3]));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(path.basename(result.path)).toMatch(/^photo_\d{8}_\d{6}\.png$/);
    expect(fs.existsSync(result.path)).toBe(true);
  });

  it('never overwrites a photo taken in the same second', async () => {
    const recorder = new IntrusionRecorder(root, fixedClock);

    const first = await recorder.persist(solidFrame([1, 2, 3]));
    const second = await recorder.persist(solidFrame([4, 5, 6]));

    expect(first.ok && path.basename(first.path)).toBe('photo_20240102_030405.png');
    expect(second.ok && path.basename(second.path)).toBe('photo_20240102_030405_1.png');
    expect(fs.readdirSync(root).sort()).toEqual(['photo_20240102_030405.png', 'photo_20240102_030405_1.png']);
    expect(fs.readdirSync(root).every((name) => PHOTO_NAME_PATTERN.test(name))).toBe(true);
  });

  it('reports a failure when the photos directory cannot be created', async () => {
    const blocker = path.join(root, 'photos');
    fs.writeFileSync(blocker, 'a file where the directory should be');

    const result = await new IntrusionRecorder(blocker, fixedClock).persist(solidFrame([1, 2, 3]));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('persist_failed');
    expect(result.error.path).toBe(path.join(blocker, 'photo_20240102_030405.png'));
    expect(result.error.message).toMatch(/^Could not save image .*photo_20240102_030405\.png: /);
  });
});
