/**
 * HTTP entry point. Builds the engine once and serves the form front end.
 */
import { env, buildVerificationConfig } from './config.js';
import { createVerificationEngine } from './bootstrap.js';
import { createApp } from './http/app.js';
import { logger } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';

async function start(): Promise<void> {
  const engine = await createVerificationEngine(env);
  const app = createApp(engine, buildVerificationConfig(env).photosDir);

  app.listen(env.PORT, env.HOST, () => {
    logger.info('HTTP: listening', { url: `http://${env.HOST}:${env.PORT}/` });
  });
}

start().catch((err: unknown) => {
  logger.error('HTTP: failed to start', { error: errorMessage(err) });
  process.exitCode = 1;
});
