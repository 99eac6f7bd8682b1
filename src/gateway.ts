import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import net from 'node:net';
import type http from 'node:http';
import type { Duplex } from 'node:stream';

import { ClientConnection, type ClientConnectionEndReason } from './clientConnection.js';
import { ClientRegistry } from './clientRegistry.js';
import type { Config } from './config.js';
import { FrameSinkAdapter } from './frameSink.js';
import { createDetachedMediaEngine, type MediaEngine, type MediaSession } from './mediaEngine.js';
import { createMetrics, type MetricsBundle } from './metrics.js';
import { respondUpgradeHttp } from './routes/upgradeHttp.js';
import { writeWebSocketHandshake } from './routes/wsHandshake.js';
import { buildServer, type ServerBundle, type UpgradeAcceptor } from './server.js';
import { SignalingRouter, type GatewayRegistry } from './signaling/router.js';
import { formatOneLineError } from './util/text.js';

export { MAX_CLIENTS } from './clientRegistry.js';
export { loadConfig, type Config } from './config.js';
export type { FrameSink } from './frameSink.js';
export * from './mediaEngine.js';

/** Notifications for the host application. Invoked synchronously from the event loop. */
export interface GatewayEvents {
  onClientConnected?(index: number): void;
  onClientDisconnected?(index: number): void;
  onError?(message: string): void;
}

/** The gateway could not bind its listening socket. */
export class SetupError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SetupError';
  }
}

export type SignalingGatewayOptions = Readonly<{
  config: Config;
  engine?: MediaEngine;
  events?: GatewayEvents;
}>;

type GatewayState = 'idle' | 'running' | 'stopping' | 'stopped';

export class SignalingGateway implements UpgradeAcceptor {
  readonly app: FastifyInstance;
  readonly registry: GatewayRegistry;
  readonly router: SignalingRouter;
  readonly frameSink: FrameSinkAdapter;
  readonly metrics: MetricsBundle;

  private readonly config: Config;
  private readonly events: GatewayEvents;
  private readonly server: ServerBundle;
  private readonly log: FastifyBaseLogger;
  private readonly announced = new Set<number>();

  private state: GatewayState = 'idle';
  private readonly stopped: Promise<void>;
  private resolveStopped: () => void = () => {};

  constructor(opts: SignalingGatewayOptions) {
    this.config = opts.config;
    this.events = opts.events ?? {};
    const engine = opts.engine ?? createDetachedMediaEngine();

    this.metrics = createMetrics();
    this.server = buildServer(this.config, { metrics: this.metrics, acceptor: this });
    this.app = this.server.app;
    this.log = this.app.log;

    this.registry = new ClientRegistry<ClientConnection, MediaSession>({
      capacity: this.config.MAX_CLIENTS,
      onDisconnect: (index, session) => this.handleDisconnect(index, session),
    });
    this.router = new SignalingRouter({
      registry: this.registry,
      engine,
      iceServers: this.config.ICE_SERVERS,
      log: this.log.child({ component: 'signaling' }),
      metrics: this.metrics.signaling,
      onError: (message) => this.reportError(message),
    });
    this.frameSink = new FrameSinkAdapter({
      registry: this.registry,
      engine,
      log: this.log.child({ component: 'frame-sink' }),
      metrics: this.metrics.media,
    });

    this.stopped = new Promise<void>((resolve) => {
      this.resolveStopped = resolve;
    });
  }

  get clientCount(): number {
    return this.registry.size;
  }

  get isRunning(): boolean {
    return this.state === 'running';
  }

  /** Binds the listening socket. Rejects with `SetupError` before any client is accepted. */
  async start(): Promise<void> {
    if (this.state !== 'idle') {
      throw new SetupError(`Gateway cannot start while ${this.state}`);
    }
    try {
      await this.app.listen({ host: this.config.HOST, port: this.config.PORT });
    } catch (err) {
      this.state = 'stopped';
      this.resolveStopped();
      throw new SetupError(
        `Could not listen on ${this.config.HOST}:${this.config.PORT}: ${formatOneLineError(err, 256)}`,
        { cause: err },
      );
    }
    this.state = 'running';
    this.log.info({ ...this.address(), maxClients: this.registry.capacity }, 'signaling gateway listening');
  }

  address(): { host: string; port: number } | null {
    const addr = this.app.server.address();
    if (!addr || typeof addr === 'string') return null;
    return { host: addr.address, port: addr.port };
  }

  /**
   * Stops accepting, then force-closes every registered client. Use `join()` to wait for the
   * listener to finish closing and for in-flight media engine calls to return.
   */
  stop(): void {
    if (this.state === 'stopping' || this.state === 'stopped') return;
    this.state = 'stopping';
    this.server.markShuttingDown();

    const closing = this.app.close();
    this.app.server.closeIdleConnections?.();
    this.registry.clear();
    this.server.closeUpgradeSockets();

    closing
      .catch((err: unknown) => {
        this.log.error({ err: formatOneLineError(err, 512) }, 'listener_close_failed');
      })
      .then(() => this.router.settled())
      .then(
        () => this.finishStop(),
        (err: unknown) => {
          this.log.error({ err: formatOneLineError(err, 512) }, 'signaling_drain_failed');
          this.finishStop();
        },
      );
  }

  /** Resolves once the gateway has fully stopped. */
  join(): Promise<void> {
    return this.stopped;
  }

  accept(_req: http.IncomingMessage, socket: Duplex, head: Buffer, handshakeKey: string): void {
    let index = -1;
    const conn = new ClientConnection(socket, {
      maxMessageBytes: this.config.MAX_MESSAGE_BYTES,
      onMessage: (opcode, payload) => this.router.handleMessage(index, opcode, payload),
      onEnd: (reason, detail) => this.handleConnectionEnd(index, reason, detail),
    });

    const added = this.registry.add(conn);
    if (!added.ok) {
      this.metrics.signaling.clientsRejectedTotal.inc({ reason: added.code });
      this.log.warn({ code: added.code, maxClients: this.registry.capacity }, 'client_rejected');
      respondUpgradeHttp(socket, 503, 'Too many clients');
      return;
    }
    index = added.value;

    if (!writeWebSocketHandshake(socket, { key: handshakeKey })) {
      this.registry.remove(index);
      return;
    }
    if (socket instanceof net.Socket) socket.setNoDelay(true);

    conn.start(head);
    this.metrics.signaling.clientsConnected.set(this.registry.countConnected());
    this.announced.add(index);
    this.log.info({ clientIndex: index, format: this.frameSink.activeFormat }, 'client_connected');
    this.notify('onClientConnected', () => this.events.onClientConnected?.(index));
  }

  private handleConnectionEnd(index: number, reason: ClientConnectionEndReason, detail?: string): void {
    if (index < 0) return;
    if (reason === 'protocol_error' || reason === 'message_too_large') {
      this.metrics.signaling.protocolErrorsTotal.inc();
      this.log.info({ clientIndex: index, reason, detail }, 'client_protocol_error');
    } else {
      this.log.debug({ clientIndex: index, reason, detail }, 'client_connection_ended');
    }
    this.registry.remove(index);
  }

  private handleDisconnect(index: number, session: MediaSession | null): void {
    this.router.forget(index);
    if (session) {
      try {
        session.close();
      } catch (err) {
        this.log.warn({ clientIndex: index, err: formatOneLineError(err, 256) }, 'session_close_failed');
      }
    }
    this.metrics.signaling.clientsConnected.set(this.registry.countConnected());
    if (!this.announced.delete(index)) return;
    this.log.info({ clientIndex: index }, 'client_disconnected');
    this.notify('onClientDisconnected', () => this.events.onClientDisconnected?.(index));
  }

  private reportError(message: string): void {
    this.notify('onError', () => this.events.onError?.(message));
  }

  private notify(hook: keyof GatewayEvents, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      this.log.error({ hook, err: formatOneLineError(err, 512) }, 'host_callback_failed');
    }
  }

  private finishStop(): void {
    this.state = 'stopped';
    this.log.info('signaling gateway stopped');
    this.resolveStopped();
  }
}
