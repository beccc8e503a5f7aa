import { hostname as osHostname } from 'node:os';
import type { MonitorConfig } from '@diskwatch/shared';
import { getLogger, setLogLevel } from '@diskwatch/shared';
import { getDatabase, closeDatabase } from '../db/Database.js';
import { SnapshotRepository } from '../db/repositories/SnapshotRepository.js';
import { AlertRepository } from '../db/repositories/AlertRepository.js';
import { EventBus } from '../events/EventBus.js';
import { VolumeCollector } from '../collector/VolumeCollector.js';
import { AlertEngine } from '../alerts/AlertEngine.js';
import { AlertNotifier } from '../alerts/AlertNotifier.js';
import { Broadcaster } from '../broadcast/Broadcaster.js';
import { MonitorScheduler } from '../scheduler/MonitorScheduler.js';
import { HTTPServer } from '../api/HTTPServer.js';

const logger = getLogger();

interface Components {
  broadcaster: Broadcaster;
  notifier: AlertNotifier | null;
  scheduler: MonitorScheduler;
  httpServer: HTTPServer;
}

export class DiskWatchDaemon {
  private config: MonitorConfig;
  private eventBus: EventBus;
  private components: Components | null = null;
  private signalsInstalled = false;

  constructor(config: MonitorConfig) {
    this.config = config;
    this.eventBus = new EventBus();
  }

  isRunning(): boolean {
    return this.components !== null;
  }

  async start(): Promise<void> {
    if (this.components) return;

    const { config } = this;
    const hostname = osHostname();

    setLogLevel(config.logLevel);
    logger.info({ dbPath: config.dbPath }, 'diskwatch starting...');

    // 1. Storage
    const db = getDatabase(config.dbPath);
    const snapshots = new SnapshotRepository(db);
    const alertEngine = new AlertEngine(new AlertRepository(db), config.alertThreshold);

    // 2. Collection and fan-out
    const collector = VolumeCollector.create({
      hostname,
      dufCommand: config.dufCommand,
      dufTimeout: config.dufTimeout,
    });
    const broadcaster = new Broadcaster({ deliveryTimeout: config.deliveryTimeout });

    // 3. Optional outbound notification
    let notifier: AlertNotifier | null = null;
    if (config.webhookUrl) {
      notifier = new AlertNotifier(this.eventBus, { webhookUrl: config.webhookUrl });
      notifier.attach();
    }

    // 4. Request surface
    const httpServer = new HTTPServer(
      { collector, snapshots, alertEngine, broadcaster, eventBus: this.eventBus, hostname },
      config.port,
      config.host,
    );
    await httpServer.start();

    // 5. Polling loop; the first cycle runs immediately
    const scheduler = new MonitorScheduler(
      { collector, snapshots, alertEngine, broadcaster, eventBus: this.eventBus },
      config.pollInterval * 1000,
    );
    scheduler.resumeFrom(snapshots.getLatestTimestamp(hostname));
    scheduler.start();

    this.eventBus.on('subscriber:connect', ({ subscriberId, subscribers }) => {
      logger.info({ subscriberId, subscribers }, 'Live viewer connected');
    });
    this.eventBus.on('subscriber:disconnect', ({ subscriberId, subscribers }) => {
      logger.info({ subscriberId, subscribers }, 'Live viewer disconnected');
    });

    this.components = { broadcaster, notifier, scheduler, httpServer };
    this.setupSignalHandlers();

    logger.info(
      {
        pid: process.pid,
        address: httpServer.getAddress(),
        pollInterval: config.pollInterval,
        alertThreshold: config.alertThreshold,
      },
      'diskwatch started',
    );
  }

  async stop(): Promise<void> {
    const components = this.components;
    if (!components) return;
    this.components = null;

    logger.info('diskwatch stopping...');

    // Stop in reverse order
    components.scheduler.stop();
    components.notifier?.detach();
    components.broadcaster.closeAll();
    await components.httpServer.stop();
    closeDatabase();
    this.eventBus.removeAllListeners();

    logger.info('diskwatch stopped');
  }

  private setupSignalHandlers(): void {
    if (this.signalsInstalled) return;
    this.signalsInstalled = true;

    const shutdown = (signal: NodeJS.Signals): void => {
      logger.info({ signal }, 'Received shutdown signal');
      this.stop().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, 'Error during shutdown');
          process.exit(1);
        },
      );
    };

    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  }
}
