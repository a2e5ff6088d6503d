import express, { type ErrorRequestHandler, type Express, type RequestHandler } from 'express';
import cors from 'cors';
import { errorMessage } from './errors.js';
import { describeIssues, incomingEventSchema } from './schemas.js';
import type { HoneypotService } from './services/honeypotService.js';
import type { SessionStore } from './services/sessionStore.js';

export const FAILURE_BODY = { status: 'error', reply: 'Something went wrong. Please try again.' } as const;

export interface AppDeps {
  service: HoneypotService;
  store: SessionStore;
  authKey: string;
  generationConfigured: boolean;
}

function statusOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err)) return undefined;
  return typeof err.status === 'number' ? err.status : undefined;
}

export function createApp(deps: AppDeps): Express {
  const app = express();
  app.use(express.json({ limit: '1mb' }));
  app.use(cors());

  const handleMessage: RequestHandler = async (req, res) => {
    // Checked before validation so a bad credential never reaches the store.
    if (req.get('x-api-key') !== deps.authKey) {
      res.status(401).json({ error: 'Unauthorized access' });
      return;
    }

    const parsed = incomingEventSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Validation failed', details: describeIssues(parsed.error) });
      return;
    }

    try {
      res.json(await deps.service.handle(parsed.data));
    } catch (error) {
      console.error(`❌ Honeypot error | Session: ${parsed.data.sessionId}:`, errorMessage(error));
      res.status(500).json(FAILURE_BODY);
    }
  };

  app.post('/honeypot', handleMessage);
  app.post('/message', handleMessage);

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      uptime: Math.floor(process.uptime()),
      sessions: deps.store.size,
      finalizedSessions: deps.store.finalizedCount,
      generationConfigured: deps.generationConfigured,
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  const onError: ErrorRequestHandler = (err, _req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const status = statusOf(err);
    // Body-parser failures carry a 4xx status; anything else is opaque.
    if (status !== undefined && status >= 400 && status < 500) {
      res.status(status).json(FAILURE_BODY);
      return;
    }
    console.error('❌ Unhandled request error:', errorMessage(err));
    res.status(500).json(FAILURE_BODY);
  };
  app.use(onError);

  return app;
}
