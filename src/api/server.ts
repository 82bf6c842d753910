import express, { type Express } from 'express';
import type { Server } from 'http';
import { createHealthRouter, type HealthCheckDependencies } from './routes/health.js';
import { getMetrics, getContentType } from '../utils/metrics.js';
import { logger } from '../utils/logger.js';

const log = logger('ApiServer');

export interface ApiServerOptions {
  enableMetrics: boolean;
}

/**
 * Build the status app: /health always, /metrics when enabled
 */
export function createApp(deps: HealthCheckDependencies, options: ApiServerOptions): Express {
  const app = express();
  app.use(express.json());

  app.use('/health', createHealthRouter(deps));

  if (options.enableMetrics) {
    app.get('/metrics', async (_req, res) => {
      try {
        const metrics = await getMetrics();
        res.set('Content-Type', getContentType());
        res.send(metrics);
      } catch (error) {
        log.error('Error collecting metrics', {
          error: error instanceof Error ? error.message : String(error),
        });
        res.status(500).send('Error collecting metrics');
      }
    });
  }

  return app;
}

/**
 * Listen on `port`; resolves once the socket is bound
 */
export function startApiServer(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      log.info('API server listening', { port });
      resolve(server);
    });
    server.once('error', reject);
  });
}

/**
 * Close the server, waiting for open connections to finish
 */
export function stopApiServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}
