import { Router, type Request, type Response } from 'express';
import { checkCopyTradingService, type StateSource } from '../../services/healthMonitor/index.js';

export interface HealthCheckDependencies {
  copyTrading: StateSource;
  isSubmitterConnected: () => boolean;
}

export function createHealthRouter(deps: HealthCheckDependencies): Router {
  const router = Router();

  /**
   * GET /health
   * Service state, feed state and trade counters
   */
  router.get('/', (_req: Request, res: Response) => {
    try {
      const copyTrading = checkCopyTradingService(deps.copyTrading);
      const submitterConnected = deps.isSubmitterConnected();

      let status = copyTrading.status;
      if (status === 'healthy' && !submitterConnected) {
        status = 'degraded';
      }

      const statusCode = status === 'unhealthy' ? 503 : 200;
      res.status(statusCode).json({
        status,
        timestamp: new Date().toISOString(),
        components: {
          copyTrading: {
            status: copyTrading.status,
            message: copyTrading.message,
            ...copyTrading.details,
          },
          orderSubmitter: {
            status: submitterConnected ? 'connected' : 'disconnected',
            connected: submitterConnected,
          },
        },
      });
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        error: error instanceof Error ? error.message : String(error),
        timestamp: new Date().toISOString(),
      });
    }
  });

  return router;
}
