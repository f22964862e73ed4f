#!/usr/bin/env tsx
/**
 * Pre-flight check: configuration, ffmpeg, gallery and face models.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0: all required checks pass
 *   1: one or more required checks failed
 */
import { existsSync, readdirSync, statSync } from 'fs';
import { execFileSync } from 'child_process';
import { env, buildFaceRecognitionConfig } from '../src/config.js';
import { isGalleryImage } from '../src/face/gallery.js';
import { createFaceEncoder } from '../src/face/face-api-encoder.js';
import { errorMessage } from '../src/utils/errors.js';

// ── ANSI color helpers ────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const pass = (label: string, detail = '') =>
  console.log(`  ${GREEN}✓${RESET} ${label}${detail ? `  ${YELLOW}${detail}${RESET}` : ''}`);

const fail = (label: string, hint = '') => {
  console.error(`  ${RED}✗${RESET} ${label}${hint ? `\n    ${YELLOW}hint: ${hint}${RESET}` : ''}`);
};

const note = (label: string, detail = '') =>
  console.log(`  ${YELLOW}○${RESET} ${label}${detail ? `  ${detail}` : ''}`);

let anyRequiredFailed = false;

// ── Section: Configuration ────────────────────────────────────────────────────

console.log(`\n${BOLD}=== doorcheck: pre-flight check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] Configuration${RESET}`);

if (process.env['CAPTURE_PASSWORD']) pass('CAPTURE_PASSWORD', '(set)');
else note('CAPTURE_PASSWORD', 'using the built-in default, set one in .env');

for (const [key, value] of Object.entries({
  PHOTOS_DIR:          env.PHOTOS_DIR,
  FACES_DIR:           env.FACES_DIR,
  FACE_RECOGNITION:    env.FACE_RECOGNITION,
  FACE_MATCH_THRESHOLD: env.FACE_MATCH_THRESHOLD,
  CAMERA_DEVICE:       env.CAMERA_DEVICE,
  CAMERA_INPUT_FORMAT: env.CAMERA_INPUT_FORMAT,
  LOG_LEVEL:           env.LOG_LEVEL,
})) {
  note(key, String(value));
}

// ── Section: ffmpeg ───────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 2 ] ffmpeg${RESET}`);

try {
  const version = execFileSync(env.FFMPEG_PATH, ['-hide_banner', '-version'], { encoding: 'utf-8' })
    .split('\n')[0] ?? '';
  pass('ffmpeg', version.trim());
} catch (err) {
  fail('ffmpeg not runnable', `install ffmpeg or set FFMPEG_PATH (${errorMessage(err)})`);
  anyRequiredFailed = true;
}

if (existsSync(env.CAMERA_DEVICE)) pass('camera device', env.CAMERA_DEVICE);
else note('camera device', `${env.CAMERA_DEVICE} not found (fine for non-file inputs)`);

// ── Section: Gallery ──────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 3 ] Reference faces${RESET}`);

if (existsSync(env.FACES_DIR) && statSync(env.FACES_DIR).isDirectory()) {
  const images = readdirSync(env.FACES_DIR).filter(isGalleryImage);
  if (images.length > 0) {
    pass(`${env.FACES_DIR}/`, `${images.length} image(s): ${images.slice(0, 3).join(', ')}${images.length > 3 ? '…' : ''}`);
  } else {
    note(`${env.FACES_DIR}/`, 'no .jpg/.jpeg/.png files, recognition will be skipped');
  }
} else {
  note(`${env.FACES_DIR}/`, 'missing, recognition will be skipped');
}

// ── Section: Face recognition ─────────────────────────────────────────────────

console.log(`\n${BOLD}[ 4 ] Face recognition${RESET}`);

const encoder = await createFaceEncoder(buildFaceRecognitionConfig(env));
if (encoder.available) pass('face-api models loaded', env.FACE_MODELS_PATH);
else note('face recognition unavailable', encoder.unavailableReason ?? '');

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}FAILED: one or more required checks did not pass.${RESET}\n`);
  process.exit(1);
} else {
  console.log(`${GREEN}${BOLD}PASSED: all required checks complete.${RESET}\n`);
}
