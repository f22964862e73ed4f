import { describeOutcome, exitCodeFor, type Outcome } from './outcome.js';

describe('describeOutcome', () => {
  it('renders a rejected secret with the photo path', () => {
    expect(describeOutcome({ kind: 'secret_rejected', photoPath: 'photos/photo_20240102_030405.png' })).toEqual({
      status: 'error',
      message: 'Wrong secret. Photo saved: photos/photo_20240102_030405.png',
      photoPath: 'photos/photo_20240102_030405.png',
    });
  });

  it('renders a recognised person', () => {
    expect(describeOutcome({ kind: 'person_recognized', label: 'alice' })).toEqual({
      status: 'ok',
      message: 'Correct secret. Welcome, alice!',
      person: 'alice',
    });
  });

  it.each<[Outcome, string]>([
    [{ kind: 'person_unknown' }, 'Correct secret. Unknown face.'],
    [{ kind: 'recognition_skipped_no_gallery' }, 'Correct secret. No reference faces found. Recognition skipped.'],
    [{ kind: 'recognition_unavailable', reason: 'Not installed.' }, 'Correct secret. Not installed.'],
    [{ kind: 'recognition_failed', error: 'boom' }, 'Correct secret. Unable to perform face recognition: boom'],
    [{ kind: 'capture_failed', stage: 'recognition', error: 'busy' }, 'Correct secret. Unable to perform face recognition: busy'],
  ])('renders %j as ok', (outcome, message) => {
    expect(describeOutcome(outcome)).toEqual({ status: 'ok', message });
  });

  it.each<[Outcome, string]>([
    [{ kind: 'capture_failed', stage: 'intrusion', error: 'busy' }, 'Photo capture failed: busy'],
    [{ kind: 'persist_failed', error: 'disk full' }, 'Photo capture failed: disk full'],
  ])('renders %j as an error', (outcome, message) => {
    expect(describeOutcome(outcome)).toEqual({ status: 'error', message });
  });
});

describe('exitCodeFor', () => {
  it.each<[Outcome, 0 | 1]>([
    [{ kind: 'secret_rejected', photoPath: 'p.png' }, 1],
    [{ kind: 'capture_failed', stage: 'intrusion', error: 'x' }, 1],
    [{ kind: 'persist_failed', error: 'x' }, 1],
    [{ kind: 'capture_failed', stage: 'recognition', error: 'x' }, 0],
    [{ kind: 'recognition_unavailable', reason: 'x' }, 0],
    [{ kind: 'recognition_skipped_no_gallery' }, 0],
    [{ kind: 'person_recognized', label: 'alice' }, 0],
    [{ kind: 'person_unknown' }, 0],
    [{ kind: 'recognition_failed', error: 'x' }, 0],
  ])('%j exits %i', (outcome, code) => {
    expect(exitCodeFor(outcome)).toBe(code);
  });
});
