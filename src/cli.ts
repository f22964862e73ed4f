#!/usr/bin/env node
/**
 * Interactive front end: asks for the secret without echo, prints the result.
 *
 * Exit codes:
 *   0: correct secret (recognised, unknown, skipped or unavailable)
 *   1: wrong secret, or the secret could not be read
 */
import { createVerificationEngine } from './bootstrap.js';
import { readSecret } from './cli/prompt.js';
import { describeOutcome, exitCodeFor } from './verification/outcome.js';
import { logger } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';

async function main(): Promise<number> {
  let secret: string;
  try {
    secret = await readSecret('Secret: ');
  } catch (err) {
    logger.debug('CLI: prompt failed', { error: errorMessage(err) });
    console.error('Unable to read the secret.');
    return 1;
  }

  const engine = await createVerificationEngine();
  const outcome = await engine.evaluate(secret);
  const rendered = describeOutcome(outcome);

  if (rendered.status === 'error') console.error(rendered.message);
  else console.log(rendered.message);

  return exitCodeFor(outcome);
}

main()
  .then((code) => { process.exitCode = code; })
  .catch((err: unknown) => {
    logger.error('CLI: fatal error', { error: errorMessage(err) });
    process.exitCode = 1;
  });
