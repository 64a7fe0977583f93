import { Router, Request, Response } from 'express';

import { getDatabaseStatus } from '../config/database';
import { isRedisConnected } from '../config/redis';

export interface HealthChecks {
  database: () => { connected: boolean; readyState: number };
  redis: () => boolean;
}

const defaultChecks: HealthChecks = {
  database: getDatabaseStatus,
  redis: isRedisConnected,
};

export const createHealthRoutes = (checks: HealthChecks = defaultChecks): Router => {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const dbStatus = checks.database();
    const redisConnected = checks.redis();

    const isHealthy = dbStatus.connected && redisConnected;

    res.status(isHealthy ? 200 : 503).json({
      status: isHealthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      services: {
        database: {
          connected: dbStatus.connected,
          readyState: dbStatus.readyState,
        },
        redis: {
          connected: redisConnected,
        },
      },
    });
  });

  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
    });
  });

  router.get('/ready', (_req: Request, res: Response) => {
    const isReady = checks.database().connected && checks.redis();

    res.status(isReady ? 200 : 503).json({
      status: isReady ? 'ready' : 'not ready',
      timestamp: new Date().toISOString(),
    });
  });

  return router;
};
