import type { FastifyBaseLogger } from "fastify";

import {
  WS_CLOSE_INTERNAL_ERROR,
  WS_CLOSE_PROTOCOL_ERROR,
  WS_CLOSE_UNSUPPORTED_DATA,
  type ClientConnection,
} from "../clientConnection.js";
import type { ClientRegistry } from "../clientRegistry.js";
import type { MediaEngine, MediaSession, IceServer } from "../mediaEngine.js";
import type { SignalingMetrics } from "../metrics.js";
import { WS_OPCODE_TEXT } from "../routes/wsFrame.js";
import { formatOneLineError } from "../util/text.js";
import { parseSignalingMessage, serializeSignal, type OutboundSignal, type SignalingMessage } from "./messages.js";

export type GatewayRegistry = ClientRegistry<ClientConnection, MediaSession>;

const MAX_ERROR_MESSAGE_BYTES = 256;

/** A message that is well-formed but arrives when the client's session cannot take it. */
export class SignalingStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SignalingStateError";
  }
}

export type SignalingRouterOptions = Readonly<{
  registry: GatewayRegistry;
  engine: MediaEngine;
  iceServers: readonly IceServer[];
  log: FastifyBaseLogger;
  metrics?: SignalingMetrics;
  onError?: (message: string) => void;
}>;

/**
 * Turns inbound channel messages into media engine calls and relays the engine's output back to
 * the originating client. Work for each client runs on its own promise chain, so messages are
 * applied in arrival order and a failing client never stalls the others.
 */
export class SignalingRouter {
  private readonly opts: SignalingRouterOptions;
  private readonly chains = new Map<number, Promise<void>>();
  private readonly draining = new Set<Promise<void>>();

  constructor(opts: SignalingRouterOptions) {
    this.opts = opts;
  }

  handleMessage(index: number, opcode: number, payload: Buffer): void {
    const conn = this.opts.registry.lookup(index)?.transport;
    if (!conn) return;

    if (opcode !== WS_OPCODE_TEXT) {
      this.rejectClient(index, conn, WS_CLOSE_UNSUPPORTED_DATA, "Binary signaling messages are not supported");
      return;
    }

    const parsed = parseSignalingMessage(payload);
    if (!parsed.ok) {
      this.rejectClient(index, conn, WS_CLOSE_PROTOCOL_ERROR, parsed.message);
      return;
    }

    const message = parsed.value;
    this.opts.metrics?.messagesTotal.inc({ type: message.kind });
    this.enqueue(index, conn, () => this.dispatch(index, conn, message));
  }

  /** Encodes `signal` as a text frame and writes it to the client's transport. */
  send(index: number, signal: OutboundSignal): boolean {
    const conn = this.opts.registry.lookup(index)?.transport;
    if (!conn?.isOpen) return false;
    return conn.sendText(serializeSignal(signal));
  }

  /**
   * Resolves once every message queued so far for `index` has been handled. Without an index,
   * waits for all queued work, including that of clients already forgotten.
   */
  settled(index?: number): Promise<void> {
    if (index !== undefined) return this.chains.get(index) ?? Promise.resolve();
    return Promise.all([...this.chains.values(), ...this.draining]).then(() => undefined);
  }

  /** Drops per-client state after the client has been removed from the registry. */
  forget(index: number): void {
    const chain = this.chains.get(index);
    if (!chain) return;
    this.chains.delete(index);
    this.draining.add(chain);
    void chain.then(() => this.draining.delete(chain));
  }

  private isCurrent(index: number, conn: ClientConnection): boolean {
    return this.opts.registry.lookup(index)?.transport === conn;
  }

  private enqueue(index: number, conn: ClientConnection, task: () => Promise<void>): void {
    const prev = this.chains.get(index) ?? Promise.resolve();
    const next = prev.then(task).catch((err: unknown) => this.failClient(index, conn, err));
    this.chains.set(index, next);
  }

  private async dispatch(index: number, conn: ClientConnection, message: SignalingMessage): Promise<void> {
    // The slot may have been removed (or even reused) while earlier work was pending.
    if (!this.isCurrent(index, conn)) return;

    switch (message.kind) {
      case "RequestSession": {
        const session = this.opts.registry.sessionOf(index) ?? (await this.createSession(index, conn));
        if (!session) return;
        const offer = await session.createOffer();
        if (!this.isCurrent(index, conn)) return;
        this.send(index, { type: "offer", offer });
        this.opts.log.debug({ clientIndex: index }, "offer_sent");
        return;
      }
      case "SessionDescription": {
        const session = this.requireSession(index, "answer");
        await session.setRemoteDescription(message.description);
        this.opts.log.debug({ clientIndex: index }, "answer_applied");
        return;
      }
      case "ConnectivityCandidate": {
        const session = this.requireSession(index, "ice-candidate");
        await session.addRemoteCandidate(message.candidate);
        return;
      }
    }
  }

  private async createSession(index: number, conn: ClientConnection): Promise<MediaSession | null> {
    const session = await this.opts.engine.createSession({
      clientIndex: index,
      iceServers: this.opts.iceServers,
      onLocalCandidate: (candidate) => {
        if (this.isCurrent(index, conn)) this.send(index, { type: "ice-candidate", candidate });
      },
    });
    if (!this.isCurrent(index, conn) || !this.opts.registry.attachSession(index, session)) {
      // The viewer left while the engine was still building its session.
      session.close();
      return null;
    }
    this.opts.log.info({ clientIndex: index }, "session_created");
    return session;
  }

  private requireSession(index: number, what: string): MediaSession {
    const session = this.opts.registry.sessionOf(index);
    if (!session) throw new SignalingStateError(`Received ${what} before a session was requested`);
    return session;
  }

  private rejectClient(index: number, conn: ClientConnection, closeCode: number, reason: string): void {
    this.opts.metrics?.protocolErrorsTotal.inc();
    this.opts.log.info({ clientIndex: index, reason }, "signaling_protocol_error");
    conn.close(closeCode);
    this.opts.registry.remove(index);
  }

  private failClient(index: number, conn: ClientConnection, err: unknown): void {
    if (!this.isCurrent(index, conn)) return;
    if (err instanceof SignalingStateError) {
      this.rejectClient(index, conn, WS_CLOSE_PROTOCOL_ERROR, err.message);
      return;
    }

    const message = formatOneLineError(err, MAX_ERROR_MESSAGE_BYTES, "Media engine failure");
    this.opts.log.warn({ clientIndex: index, err: message }, "signaling_engine_error");
    this.opts.onError?.(`client ${index}: ${message}`);
    this.send(index, { type: "error", message });
    conn.close(WS_CLOSE_INTERNAL_ERROR);
    this.opts.registry.remove(index);
  }
}
