import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { DEFAULT_ALERT_LIMIT, MAX_ALERT_LIMIT, MIN_ALERT_LIMIT } from '@diskwatch/shared';
import type { AlertEngine } from '../../alerts/AlertEngine.js';
import { formatIssues } from '../validation.js';

export const alertsQuerySchema = z.object({
  limit: z.coerce
    .number()
    .int()
    .min(MIN_ALERT_LIMIT)
    .max(MAX_ALERT_LIMIT)
    .default(DEFAULT_ALERT_LIMIT),
});

export const alertParamsSchema = z.object({
  id: z.coerce.number().int(),
});

export function registerAlertRoutes(app: FastifyInstance, alertEngine: AlertEngine): void {
  app.get<{ Querystring: { limit?: string } }>('/api/alerts', async (request, reply) => {
    const query = alertsQuerySchema.safeParse(request.query);
    if (!query.success) {
      reply.status(400);
      return { error: formatIssues(query.error) };
    }
    return alertEngine.list(query.data.limit);
  });

  // Unknown ids acknowledge successfully as a no-op
  app.post<{ Params: { id: string } }>('/api/alerts/:id/acknowledge', async (request, reply) => {
    const params = alertParamsSchema.safeParse(request.params);
    if (!params.success) {
      reply.status(400);
      return { error: formatIssues(params.error) };
    }
    return alertEngine.acknowledge(params.data.id);
  });
}
