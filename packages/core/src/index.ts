// Database
export { openDatabase, getDatabase, closeDatabase } from './db/Database.js';
export { SnapshotRepository } from './db/repositories/SnapshotRepository.js';
export { AlertRepository } from './db/repositories/AlertRepository.js';

// Events
export { EventBus } from './events/EventBus.js';

// Collection
export type { VolumeSource, FallbackVolumeSource } from './collector/VolumeSource.js';
export { NativeVolumeSource, parseMountTable } from './collector/NativeVolumeSource.js';
export type { MountEntry, NativeVolumeSourceOptions } from './collector/NativeVolumeSource.js';
export { DufVolumeSource, runCommand, dufReportSchema } from './collector/DufVolumeSource.js';
export type { CommandRunner, DufVolumeSourceOptions } from './collector/DufVolumeSource.js';
export { SyntheticVolumeSource, SYNTHETIC_MOUNTPOINTS } from './collector/SyntheticVolumeSource.js';
export { VolumeCollector } from './collector/VolumeCollector.js';

// Alerts
export { AlertEngine, findBreaches } from './alerts/AlertEngine.js';
export { AlertNotifier, formatAlertText } from './alerts/AlertNotifier.js';

// Live updates
export { Broadcaster } from './broadcast/Broadcaster.js';
export type {
  Subscriber,
  SubscriberHandle,
  PublishResult,
  BroadcasterOptions,
} from './broadcast/Broadcaster.js';
export { WebSocketSubscriber } from './broadcast/WebSocketSubscriber.js';

// Scheduling
export { MonitorScheduler } from './scheduler/MonitorScheduler.js';
export type { MonitorSchedulerDeps, CycleResult } from './scheduler/MonitorScheduler.js';

// HTTP API
export { HTTPServer } from './api/HTTPServer.js';
export type { HTTPServerDeps } from './api/HTTPServer.js';

// Daemon
export { DiskWatchDaemon } from './daemon/Daemon.js';
