import type { FastifyInstance } from 'fastify';
import type { CycleSummary } from '@diskwatch/shared';
import type { Broadcaster } from '../../broadcast/Broadcaster.js';

export interface HealthRouteOptions {
  broadcaster: Broadcaster;
  getLastCycle: () => CycleSummary | null;
}

export function registerHealthRoutes(app: FastifyInstance, options: HealthRouteOptions): void {
  app.get('/api/health', async () => ({
    status: 'ok',
    timestamp: new Date().toISOString(),
    subscribers: options.broadcaster.size,
    lastCycle: options.getLastCycle(),
  }));
}
