import express from 'express';
import type { Server } from 'node:http';
import { createLogger } from './utils/logger.js';
import { createProgressRouter, type ProgressRouterDeps } from './adapters/http/progressRouter.js';
const logger = createLogger({ component: 'server' });

export function createApp(deps: ProgressRouterDeps): express.Express {
  const app = express();

  // Request logging middleware
  app.use((req, _res, next) => {
    logger.info({ method: req.method, path: req.path }, 'Incoming request');
    next();
  });

  app.use('/', createProgressRouter(deps));

  // Health check
  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Error handling; body-parser errors carry their own status (413 for oversized uploads)
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
    if (status >= 500) {
      logger.error({ error: err }, 'Unhandled error in Express');
      res.status(status).json({ error: 'Internal server error' });
      return;
    }
    logger.warn({ error: err.message, status }, 'Request rejected');
    res.status(status).json({ error: err.message });
  });

  return app;
}

export async function startServer(app: express.Express, port: number, host: string = '0.0.0.0'): Promise<Server> {
  return new Promise((resolve) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, 'HTTP server started');
      resolve(server);
    });
  });
}
