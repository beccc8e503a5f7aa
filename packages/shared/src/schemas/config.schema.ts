import { z } from 'zod';
import {
  DEFAULT_ALERT_THRESHOLD,
  DEFAULT_DELIVERY_TIMEOUT,
  DEFAULT_DUF_COMMAND,
  DEFAULT_DUF_TIMEOUT,
  DEFAULT_HTTP_HOST,
  DEFAULT_HTTP_PORT,
  DEFAULT_POLL_INTERVAL,
  DISKWATCH_DB_FILE,
} from '../constants.js';

export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);

export const monitorConfigSchema = z.object({
  /** Seconds between the end of one cycle and the start of the next. */
  pollInterval: z.coerce.number().int().positive().default(DEFAULT_POLL_INTERVAL),
  alertThreshold: z.coerce.number().int().min(0).max(100).default(DEFAULT_ALERT_THRESHOLD),
  dbPath: z.string().min(1).default(DISKWATCH_DB_FILE),
  // Empty string is treated the same as "not configured"
  webhookUrl: z
    .union([z.literal(''), z.string().url()])
    .optional()
    .transform((value) => (value ? value : undefined)),
  port: z.coerce.number().int().min(1).max(65535).default(DEFAULT_HTTP_PORT),
  host: z.string().min(1).default(DEFAULT_HTTP_HOST),
  deliveryTimeout: z.coerce.number().int().positive().default(DEFAULT_DELIVERY_TIMEOUT),
  dufCommand: z.string().min(1).default(DEFAULT_DUF_COMMAND),
  dufTimeout: z.coerce.number().int().positive().default(DEFAULT_DUF_TIMEOUT),
  logLevel: logLevelSchema.default('info'),
});

export type MonitorConfig = z.infer<typeof monitorConfigSchema>;
