import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import websocket from '@fastify/websocket';
import type { CycleSummary } from '@diskwatch/shared';
import { DEFAULT_HTTP_HOST, DEFAULT_HTTP_PORT, getLogger } from '@diskwatch/shared';
import type { VolumeCollector } from '../collector/VolumeCollector.js';
import type { SnapshotRepository } from '../db/repositories/SnapshotRepository.js';
import type { AlertEngine } from '../alerts/AlertEngine.js';
import type { Broadcaster } from '../broadcast/Broadcaster.js';
import { WebSocketSubscriber } from '../broadcast/WebSocketSubscriber.js';
import type { EventBus } from '../events/EventBus.js';
import { registerUsageRoutes } from './routes/usage.js';
import { registerAlertRoutes } from './routes/alerts.js';
import { registerHealthRoutes } from './routes/health.js';

const logger = getLogger();

export interface HTTPServerDeps {
  collector: VolumeCollector;
  snapshots: SnapshotRepository;
  alertEngine: AlertEngine;
  broadcaster: Broadcaster;
  eventBus: EventBus;
  hostname: string;
}

export class HTTPServer {
  private app: FastifyInstance;
  private port: number;
  private host: string;
  private broadcaster: Broadcaster;
  private eventBus: EventBus;
  private lastCycle: CycleSummary | null = null;
  private booted: Promise<FastifyInstance> | null = null;

  private readonly onCycle = (summary: CycleSummary): void => {
    this.lastCycle = summary;
  };

  constructor(
    deps: HTTPServerDeps,
    port: number = DEFAULT_HTTP_PORT,
    host: string = DEFAULT_HTTP_HOST,
  ) {
    this.port = port;
    this.host = host;
    this.broadcaster = deps.broadcaster;
    this.eventBus = deps.eventBus;

    this.app = Fastify({ logger: false });

    this.setupRoutes(deps);
  }

  private setupRoutes(deps: HTTPServerDeps): void {
    registerUsageRoutes(this.app, deps.collector, deps.snapshots, {
      hostname: deps.hostname,
      alertThreshold: deps.alertEngine.threshold,
    });
    registerAlertRoutes(this.app, deps.alertEngine);

    this.eventBus.on('cycle:complete', this.onCycle);

    registerHealthRoutes(this.app, {
      broadcaster: this.broadcaster,
      getLastCycle: () => this.lastCycle,
    });
  }

  /**
   * Register plugins and the live channel, then wait for Fastify to boot.
   * Safe to call more than once; `start()` goes through it before listening.
   */
  ready(): Promise<FastifyInstance> {
    if (!this.booted) {
      this.booted = this.boot();
    }
    return this.booted;
  }

  async start(): Promise<void> {
    await this.ready();
    await this.app.listen({ port: this.port, host: this.host });
    logger.info({ port: this.port, host: this.host }, 'HTTP server listening');
  }

  private async boot(): Promise<FastifyInstance> {
    await this.app.register(cors, { origin: true });
    await this.app.register(websocket);

    // Live update channel. Inbound frames carry no commands and are dropped;
    // the socket is only watched for close.
    this.app.get('/ws', { websocket: true }, (socket) => {
      const handle = this.broadcaster.register(new WebSocketSubscriber(socket));
      this.eventBus.emit('subscriber:connect', {
        subscriberId: handle.id,
        subscribers: this.broadcaster.size,
      });

      // Fires for client closes and for sockets the broadcaster dropped
      socket.on('close', () => {
        this.broadcaster.unregister(handle);
        this.eventBus.emit('subscriber:disconnect', {
          subscriberId: handle.id,
          subscribers: this.broadcaster.size,
        });
      });

      socket.on('error', (err) => {
        logger.debug({ err, subscriber: handle.id }, 'WebSocket error');
      });
    });

    await this.app.ready();
    return this.app;
  }

  async stop(): Promise<void> {
    this.eventBus.off('cycle:complete', this.onCycle);
    await this.app.close();
  }

  getAddress(): string {
    return `http://${this.host}:${this.port}`;
  }
}
