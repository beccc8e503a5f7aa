export type {
  VolumeMetric,
  HistoryPoint,
  UsageHistory,
  CurrentUsage,
} from './volume.js';

export type { NewAlert, Alert, AcknowledgeResult } from './alert.js';

export type {
  UpdateMessage,
  CycleSummary,
  SubscriberEvent,
  EventBusMessage,
} from './events.js';
