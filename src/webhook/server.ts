import express, { type Express } from 'express';
import type { Server } from 'http';
import { createHealthRouter } from './routes/health.js';
import { createWhatsAppWebhookRouter } from './routes/whatsapp.js';
import { verifyWhatsAppSignature } from './middleware/verify-signature.js';
import { rateLimit, type RateLimitOptions } from './middleware/rate-limit.js';
import { createStatsRouter } from '../api/routes/stats.js';
import { logger } from '../utils/logger.js';
import type { InboundHandler } from '../chat/types.js';
import type { SessionStore } from '../session/store.js';

export interface ServerDeps {
  handler: InboundHandler;
  store: SessionStore;
  verifyToken: string;
  appSecret?: string;
  rateLimit: RateLimitOptions;
  version: string;
  /**
   * Number of reverse proxies in front of the server. req.ip is then taken
   * that many hops from the right of X-Forwarded-For, never from entries
   * the client wrote itself.
   */
  trustProxyHops?: number;
}

const WEBHOOK_PATH = '/webhook';

export function createServer(deps: ServerDeps): Express {
  const app = express();

  if (deps.trustProxyHops) {
    app.set('trust proxy', deps.trustProxyHops);
  }

  // Parse JSON for all routes except webhook (needs raw body for signature verification)
  app.use((req, res, next) => {
    if (req.path === WEBHOOK_PATH) {
      express.text({ type: '*/*', limit: '1mb' })(req, res, next);
    } else {
      express.json()(req, res, next);
    }
  });

  // Routes
  app.use('/health', createHealthRouter(deps.version));
  app.use('/admin/stats', createStatsRouter(deps.store));

  // Webhook Routes (signature is only checked on deliveries)
  app.post(WEBHOOK_PATH, verifyWhatsAppSignature(deps.appSecret), rateLimit(deps.rateLimit));
  app.use(WEBHOOK_PATH, createWhatsAppWebhookRouter({ verifyToken: deps.verifyToken, handler: deps.handler }));

  // Error handler
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error({ err }, 'Unhandled error');
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

export function startServer(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      logger.info({ port }, '🚀 Webhook server started');
      resolve(server);
    });
    server.on('error', reject);
  });
}
