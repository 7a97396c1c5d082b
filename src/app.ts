// src/app.ts
import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { Engine } from './engine.js';
import { FulfillmentError, GENERIC_USER_MESSAGE } from './errors.js';
import { createLogger } from './logger.js';
import { requireAdmin } from './middleware/auth.js';
import { adminRouter } from './routes/admin.js';
import { ordersRouter } from './routes/orders.js';
import { pspRouter } from './routes/psp.js';

declare module 'http' {
  interface IncomingMessage {
    /** Exact request bytes, kept for webhook signature checks. */
    rawBody?: string;
  }
}

const log = createLogger('http');

export type AppOptions = {
  adminToken: string;
  webhookSecret: string;
  webhookAllowedIps: readonly string[];
  /** Proxy hops in front of the app; 0 takes req.ip from the socket. */
  trustProxy?: number;
};

export function createApp(engine: Engine, opts: AppOptions) {
  const app = express();
  app.disable('x-powered-by');
  app.set('trust proxy', opts.trustProxy ?? 0);

  /** capture raw body for signature HMAC */
  app.use(
    express.json({
      limit: '1mb',
      verify: (req, _res, buf) => {
        req.rawBody = buf ? buf.toString('utf8') : '';
      },
    })
  );

  app.use(
    cors({
      origin: '*',
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'x-psp-signature', 'Authorization'],
    })
  );

  /** health */
  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      ok: true,
      uptime: Math.round(process.uptime()),
      locksInFlight: engine.locks.pending,
      ts: new Date().toISOString(),
    });
  });

  /** routes */
  app.use('/', pspRouter(engine.webhook, { webhookSecret: opts.webhookSecret, allowedIps: opts.webhookAllowedIps }));
  app.use('/api/admin', requireAdmin(opts.adminToken), adminRouter(engine));
  app.use('/api', ordersRouter(engine));

  /** 404 */
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ ok: false, error: 'Not Found' });
  });

  /** errors: full detail to the log, a generic message to the caller */
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof FulfillmentError) {
      const level = err.httpStatus >= 500 ? 'error' : 'warn';
      log[level]({ err, method: req.method, path: req.path }, 'request failed');
      res.status(err.httpStatus).json({ ok: false, error: err.code, message: err.userMessage });
      return;
    }
    if (err instanceof SyntaxError) {
      // express.json on a body that is not JSON
      log.warn({ err, path: req.path }, 'unparseable request body');
      res.status(400).json({ ok: false, error: 'validation_error', message: 'Malformed JSON body' });
      return;
    }
    log.error({ err, method: req.method, path: req.path }, 'unhandled error');
    res.status(500).json({ ok: false, error: 'internal_error', message: GENERIC_USER_MESSAGE });
  });

  return app;
}
