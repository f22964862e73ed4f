/**
 * Result of one verification attempt, and how front ends render it.
 */

export type CaptureStage = 'intrusion' | 'recognition';

export type Outcome =
  | { kind: 'secret_rejected'; photoPath: string }
  | { kind: 'recognition_unavailable'; reason: string }
  | { kind: 'recognition_skipped_no_gallery' }
  | { kind: 'person_recognized'; label: string }
  | { kind: 'person_unknown' }
  | { kind: 'capture_failed'; stage: CaptureStage; error: string }
  | { kind: 'persist_failed'; error: string }
  | { kind: 'recognition_failed'; error: string };

export type OutcomeKind = Outcome['kind'];

export interface RenderedOutcome {
  status: 'ok' | 'error';
  message: string;
  photoPath?: string;
  person?: string;
}

const CORRECT = 'Correct secret.';

export function describeOutcome(outcome: Outcome): RenderedOutcome {
  switch (outcome.kind) {
    case 'secret_rejected':
      return {
        status: 'error',
        message: `Wrong secret. Photo saved: ${outcome.photoPath}`,
        photoPath: outcome.photoPath,
      };
    case 'capture_failed':
      return outcome.stage === 'intrusion'
        ? { status: 'error', message: `Photo capture failed: ${outcome.error}` }
        : { status: 'ok', message: `${CORRECT} Unable to perform face recognition: ${outcome.error}` };
    case 'persist_failed':
      return { status: 'error', message: `Photo capture failed: ${outcome.error}` };
    case 'recognition_unavailable':
      return { status: 'ok', message: `${CORRECT} ${outcome.reason}` };
    case 'recognition_skipped_no_gallery':
      return { status: 'ok', message: `${CORRECT} No reference faces found. Recognition skipped.` };
    case 'person_recognized':
      return { status: 'ok', message: `${CORRECT} Welcome, ${outcome.label}!`, person: outcome.label };
    case 'person_unknown':
      return { status: 'ok', message: `${CORRECT} Unknown face.` };
    case 'recognition_failed':
      return { status: 'ok', message: `${CORRECT} Unable to perform face recognition: ${outcome.error}` };
  }
}

/** Wrong-secret flows exit 1, every correct-secret flow exits 0. */
export function exitCodeFor(outcome: Outcome): 0 | 1 {
  return secretWasRejected(outcome) ? 1 : 0;
}

export function secretWasRejected(outcome: Outcome): boolean {
  switch (outcome.kind) {
    case 'secret_rejected':
    case 'persist_failed':
      return true;
    case 'capture_failed':
      return outcome.stage === 'intrusion';
    default:
      return false;
  }
}
