import cors from 'cors';
import express from 'express';
import type { Express, Request, Response } from 'express';
import { z } from 'zod';
import type { AppConfig } from '../shared/config';
import { getPublicConfig } from './config/config';
import type { Failure } from '../shared/types';
import type { Logger } from './obs/logger';
import type { AcquisitionService } from './retrieval/acquisition';

export interface AppDeps {
  config: AppConfig;
  logger: Logger;
  service: AcquisitionService;
}

const AcquireBodySchema = z.object({
  topic: z.string().trim().min(1).max(2_000),
});

const ValidateUrlBodySchema = z.object({
  url: z.string().trim().min(1).max(8_000),
});

export const failureStatus = (failure: Failure): number => {
  switch (failure.kind) {
    case 'invalid_url':
      return 400;
    case 'unreachable':
      return 502;
    case 'too_large':
      return 413;
    case 'unsupported_content':
      return 415;
    case 'no_candidates':
      return 502;
    case 'no_keyword_match':
      return 404;
    case 'feeds_unavailable':
      return 503;
  }
};

/** Aborts in-flight work when the client goes away before the response is sent. */
const requestSignal = (res: Response): AbortSignal => {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
};

export const createApp = ({ config, logger, service }: AppDeps): Express => {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '64kb' }));

  if (config.observability.logLevel === 'debug') {
    app.use((req, res, next) => {
      const startedAt = Date.now();
      logger.debug('HTTP request', { method: req.method, path: req.path });
      let finished = false;
      res.on('finish', () => {
        finished = true;
        logger.debug('HTTP response', {
          method: req.method,
          path: req.path,
          status: res.statusCode,
          elapsedMs: Date.now() - startedAt,
        });
      });
      res.on('close', () => {
        if (finished) return;
        logger.debug('HTTP closed early', {
          method: req.method,
          path: req.path,
          elapsedMs: Date.now() - startedAt,
        });
      });
      next();
    });
  }

  app.get('/api/healthz', (_req: Request, res: Response) => {
    res.json({ ok: true, ts: new Date().toISOString() });
  });

  app.get('/api/config', (_req: Request, res: Response) => {
    res.json(getPublicConfig(config));
  });

  app.post('/api/acquire', async (req: Request, res: Response) => {
    const parsed = AcquireBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid request body', issues: parsed.error.issues });
      return;
    }

    try {
      const outcome = await service.acquireTopic(parsed.data.topic, requestSignal(res));
      if (!outcome.ok) {
        res.status(failureStatus(outcome.failure)).json({ error: outcome.failure });
        return;
      }
      res.json(outcome.value);
    } catch (error) {
      logger.error('Acquisition crashed', { error: error instanceof Error ? error.message : String(error) });
      res.status(500).json({ error: 'Acquisition failed' });
    }
  });

  app.post('/api/validate-url', async (req: Request, res: Response) => {
    const parsed = ValidateUrlBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid request body', issues: parsed.error.issues });
      return;
    }

    try {
      const verdict = await service.validateUrl(parsed.data.url);
      if (!verdict.ok) {
        res.json({ ok: false, reason: verdict.reason, message: verdict.message });
        return;
      }
      res.json({ ok: true, url: verdict.url, hostname: verdict.hostname, addresses: verdict.addresses });
    } catch (error) {
      logger.error('URL validation crashed', { error: error instanceof Error ? error.message : String(error) });
      res.status(500).json({ error: 'Validation failed' });
    }
  });

  return app;
};
