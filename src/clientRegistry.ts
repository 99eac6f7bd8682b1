import { err, ok, type Result } from "./result.js";

export const MAX_CLIENTS = 10;

export interface ClientTransport {
  /** Releases the underlying connection. Must be idempotent. */
  close(): void;
}

export type ClientSlot<TTransport extends ClientTransport, TSession> = Readonly<{
  index: number;
  connected: boolean;
  transport: TTransport | null;
  session: TSession | null;
}>;

type MutableSlot<TTransport, TSession> = {
  index: number;
  connected: boolean;
  transport: TTransport | null;
  session: TSession | null;
};

export type ClientRegistryOptions<TSession> = Readonly<{
  capacity?: number;
  /** Fired after a slot is released, with the session reference it held (if any). */
  onDisconnect?: (index: number, detachedSession: TSession | null) => void;
}>;

/**
 * Fixed-capacity table of client connections.
 *
 * Indexes are handed out in order (0, 1, 2, ...) until every slot has been used once; after
 * that the lowest removed index is reused. Every operation is synchronous, so on the event loop
 * registry mutations and fan-out iteration never interleave.
 */
export class ClientRegistry<TTransport extends ClientTransport, TSession> {
  readonly capacity: number;

  private readonly slots: MutableSlot<TTransport, TSession>[] = [];
  private readonly onDisconnect?: (index: number, detachedSession: TSession | null) => void;
  private count = 0;

  constructor(opts: ClientRegistryOptions<TSession> = {}) {
    const capacity = opts.capacity ?? MAX_CLIENTS;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Invalid registry capacity: ${capacity}`);
    }
    this.capacity = capacity;
    this.onDisconnect = opts.onDisconnect;
  }

  get size(): number {
    return this.count;
  }

  add(transport: TTransport): Result<number> {
    if (this.count >= this.capacity) {
      return err("CAPACITY_EXCEEDED", `Client limit of ${this.capacity} reached`);
    }

    let slot: MutableSlot<TTransport, TSession> | undefined;
    if (this.slots.length < this.capacity) {
      slot = { index: this.slots.length, connected: false, transport: null, session: null };
      this.slots.push(slot);
    } else {
      slot = this.slots.find((s) => !s.connected);
    }
    if (!slot) {
      // count < capacity guarantees a free slot; anything else is table corruption.
      return err("INTERNAL_ERROR", "Client table has no free slot");
    }

    slot.transport = transport;
    slot.session = null;
    slot.connected = true;
    this.count += 1;
    return ok(slot.index);
  }

  remove(index: number): void {
    const slot = this.slots[index];
    if (!Number.isInteger(index) || !slot || !slot.connected) return;

    const transport = slot.transport;
    const session = slot.session;
    slot.connected = false;
    slot.transport = null;
    slot.session = null;
    this.count -= 1;

    transport?.close();
    this.onDisconnect?.(index, session);
  }

  lookup(index: number): ClientSlot<TTransport, TSession> | undefined {
    if (!Number.isInteger(index)) return undefined;
    const slot = this.slots[index];
    return slot ? { ...slot } : undefined;
  }

  /** Stores the externally owned session handle on a connected slot. */
  attachSession(index: number, session: TSession): boolean {
    const slot = this.slots[index];
    if (!Number.isInteger(index) || !slot || !slot.connected) return false;
    slot.session = session;
    return true;
  }

  sessionOf(index: number): TSession | null {
    const slot = this.slots[index];
    if (!Number.isInteger(index) || !slot || !slot.connected) return null;
    return slot.session;
  }

  forEachConnected(fn: (slot: ClientSlot<TTransport, TSession>) => void): void {
    for (const slot of this.slots) {
      if (slot.connected) fn(slot);
    }
  }

  /** Counts connected slots by walking the table; `size` is the maintained counter. */
  countConnected(): number {
    let n = 0;
    for (const slot of this.slots) {
      if (slot.connected) n += 1;
    }
    return n;
  }

  /** Force-removes every client (shutdown path). */
  clear(): void {
    for (const slot of this.slots) {
      this.remove(slot.index);
    }
  }
}
