// Types
export type {
  VolumeMetric,
  HistoryPoint,
  UsageHistory,
  CurrentUsage,
  NewAlert,
  Alert,
  AcknowledgeResult,
  UpdateMessage,
  CycleSummary,
  SubscriberEvent,
  EventBusMessage,
} from './types/index.js';

// Constants
export {
  DISKWATCH_HOME,
  DISKWATCH_DB_FILE,
  DEFAULT_POLL_INTERVAL,
  DEFAULT_ALERT_THRESHOLD,
  DEFAULT_HTTP_PORT,
  DEFAULT_HTTP_HOST,
  DEFAULT_DELIVERY_TIMEOUT,
  DEFAULT_WEBHOOK_TIMEOUT,
  DEFAULT_DUF_COMMAND,
  DEFAULT_DUF_TIMEOUT,
  DEFAULT_API_URL,
  DEFAULT_HISTORY_HOURS,
  MIN_HISTORY_HOURS,
  MAX_HISTORY_HOURS,
  DEFAULT_ALERT_LIMIT,
  MIN_ALERT_LIMIT,
  MAX_ALERT_LIMIT,
  DISKWATCH_VERSION,
} from './constants.js';

// Schemas
export { monitorConfigSchema, logLevelSchema } from './schemas/config.schema.js';
export type { MonitorConfig } from './schemas/config.schema.js';
export {
  volumeMetricSchema,
  currentUsageSchema,
  historyPointSchema,
  usageHistorySchema,
  alertSchema,
  alertListSchema,
  acknowledgeResultSchema,
  apiErrorSchema,
} from './schemas/api.schema.js';

// Utilities
export { loadConfig } from './utils/config.js';
export { formatBytes, formatPercent, roundPercent } from './utils/format.js';

export {
  createLogger,
  getLogger,
  parseLogLevel,
  setDefaultLogger,
  setLogLevel,
} from './utils/logger.js';
export type { LogLevel, CreateLoggerOptions } from './utils/logger.js';

export {
  DiskWatchError,
  ConfigValidationError,
  SourceUnavailableError,
  DeliveryTimeoutError,
  ApiRequestError,
} from './utils/errors.js';
