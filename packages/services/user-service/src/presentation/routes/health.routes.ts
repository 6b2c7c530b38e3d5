import type { Router } from 'express';
import { serializeError, type SchedulerHealthReport } from '@lastcup/platform-core';
import { SERVICE_NAME, getLogger } from '../../config/logging';

const logger = getLogger('health-routes');

interface DatabaseHealth {
  status: 'healthy' | 'unhealthy';
  latencyMs: number;
}

export interface HealthRouteDeps {
  getSchedulerHealth: () => SchedulerHealthReport;
  checkDatabase?: () => Promise<DatabaseHealth>;
}

export function registerHealthRoutes(router: Router, deps: HealthRouteDeps): void {
  router.get('/health/live', (_req, res) => {
    res.json({ status: 'ok', service: SERVICE_NAME, timestamp: new Date().toISOString() });
  });

  router.get('/health', async (_req, res) => {
    const schedulers = deps.getSchedulerHealth();
    let database: DatabaseHealth | undefined;
    try {
      database = deps.checkDatabase ? await deps.checkDatabase() : undefined;
    } catch (error) {
      logger.error('Database health check threw', { error: serializeError(error) });
      database = { status: 'unhealthy', latencyMs: 0 };
    }
    const healthy = schedulers.healthy && (database === undefined || database.status === 'healthy');

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'unhealthy',
      service: SERVICE_NAME,
      schedulers,
      ...(database && { database }),
      timestamp: new Date().toISOString(),
    });
  });
}
