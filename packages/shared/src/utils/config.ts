import { monitorConfigSchema, type MonitorConfig } from '../schemas/config.schema.js';
import { ConfigValidationError } from './errors.js';

const ENV_KEYS = {
  pollInterval: 'DISKWATCH_POLL_INTERVAL',
  alertThreshold: 'DISKWATCH_ALERT_THRESHOLD',
  dbPath: 'DISKWATCH_DB_PATH',
  webhookUrl: 'DISKWATCH_WEBHOOK_URL',
  port: 'DISKWATCH_PORT',
  host: 'DISKWATCH_HOST',
  deliveryTimeout: 'DISKWATCH_DELIVERY_TIMEOUT',
  dufCommand: 'DISKWATCH_DUF_COMMAND',
  dufTimeout: 'DISKWATCH_DUF_TIMEOUT',
  logLevel: 'DISKWATCH_LOG_LEVEL',
} as const satisfies Record<keyof MonitorConfig, string>;

/**
 * Build the monitor configuration from `DISKWATCH_*` environment variables.
 * Explicit overrides win over the environment; anything unset falls back to
 * the schema defaults.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<Record<keyof MonitorConfig, string | number>> = {},
): MonitorConfig {
  const raw: Record<string, string | number> = {};

  for (const [key, envName] of Object.entries(ENV_KEYS)) {
    const value = env[envName];
    if (value !== undefined && value !== '') {
      raw[key] = value;
    }
  }

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      raw[key] = value;
    }
  }

  const result = monitorConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return result.data;
}
