/**
 * HTTP front end: a password form, its result page, a JSON endpoint and
 * read-only access to stored intrusion photos.
 *
 * GET  /              - form
 * POST /submit        - form post (urlencoded `password`), HTML result
 * POST /api/verify    - JSON `{ secret }`, JSON result
 * GET  /photos/:name  - stored intrusion photo
 * GET  /health        - liveness probe
 */
import * as path from 'path';
import express, { type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import { describeOutcome } from '../verification/outcome.js';
import type { Outcome } from '../verification/outcome.js';
import { logger } from '../utils/logger.js';
import { renderForm, renderResult } from './pages.js';

export interface Verifier {
  evaluate(submittedSecret: string): Promise<Outcome>;
}

const VerifyBody = z.object({ secret: z.string() });
// a repeated field arrives as an array; the first value counts
const FormBody = z.object({
  password: z
    .union([z.string(), z.array(z.string())])
    .default('')
    .transform((value) => (Array.isArray(value) ? value[0] ?? '' : value)),
});

function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err)) return undefined;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export function createApp(engine: Verifier, photosDir: string): express.Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(express.urlencoded({ extended: false }));
  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.get('/', (_req, res) => {
    res.type('html').send(renderForm());
  });

  app.post('/submit', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = FormBody.safeParse(req.body ?? {});
      const password = parsed.success ? parsed.data.password : '';
      const outcome = await engine.evaluate(password);
      res.type('html').send(renderResult(describeOutcome(outcome)));
    } catch (err) {
      next(err);
    }
  });

  app.post('/api/verify', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = VerifyBody.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: 'secret is required and must be a string' });
        return;
      }
      const outcome = await engine.evaluate(parsed.data.secret);
      res.json({ outcome: outcome.kind, ...describeOutcome(outcome) });
    } catch (err) {
      next(err);
    }
  });

  app.use('/photos', express.static(path.resolve(photosDir), {
    index: false,
    dotfiles: 'deny',
    fallthrough: true,
  }));

  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    // body-parser rejects malformed or non-object JSON with a 4xx status
    const status = clientErrorStatus(err);
    if (status !== undefined) {
      logger.warn('HTTP: rejected request body', { path: req.path, status, error: err.message });
      res.status(status).json({ error: 'Invalid request body' });
      return;
    }
    logger.error('HTTP: unhandled error', { error: err.message });
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
