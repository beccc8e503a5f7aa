import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { CurrentUsage, UsageHistory } from '@diskwatch/shared';
import { DEFAULT_HISTORY_HOURS, MAX_HISTORY_HOURS, MIN_HISTORY_HOURS } from '@diskwatch/shared';
import type { VolumeCollector } from '../../collector/VolumeCollector.js';
import type { SnapshotRepository } from '../../db/repositories/SnapshotRepository.js';
import { formatIssues } from '../validation.js';

export const historyQuerySchema = z.object({
  hours: z.coerce
    .number()
    .int()
    .min(MIN_HISTORY_HOURS)
    .max(MAX_HISTORY_HOURS)
    .default(DEFAULT_HISTORY_HOURS),
});

export interface UsageRouteOptions {
  hostname: string;
  alertThreshold: number;
}

export function registerUsageRoutes(
  app: FastifyInstance,
  collector: VolumeCollector,
  snapshots: SnapshotRepository,
  options: UsageRouteOptions,
): void {
  // On-demand sample, independent of the scheduler and not persisted
  app.get('/api/current', async (): Promise<CurrentUsage> => {
    const disks = await collector.sample();
    return {
      hostname: options.hostname,
      timestamp: new Date().toISOString(),
      disks,
      alertThreshold: options.alertThreshold,
    };
  });

  // Mountpoints contain separators, so the whole remaining path is the key
  app.get<{ Params: { '*': string }; Querystring: { hours?: string } }>(
    '/api/history/*',
    async (request, reply) => {
      const query = historyQuerySchema.safeParse(request.query);
      if (!query.success) {
        reply.status(400);
        return { error: formatIssues(query.error) };
      }

      const raw = request.params['*'];
      const mountpoint = raw.startsWith('/') ? raw : `/${raw}`;
      const history: UsageHistory = {
        mountpoint,
        hours: query.data.hours,
        data: snapshots.query(mountpoint, query.data.hours),
      };
      return history;
    },
  );

  app.get('/api/mountpoints', async () => ({ mountpoints: snapshots.listMountpoints() }));
}
