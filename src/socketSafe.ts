import type { Duplex } from "node:stream";

// Socket helpers that never throw: peers may disappear at any point, and a throwing `write`
// or `destroy` inside an event handler would take the whole gateway down.

const DEFAULT_END_TIMEOUT_MS = 1_000;

export function isDestroyed(socket: Duplex): boolean {
  try {
    return socket.destroyed === true;
  } catch {
    // Fail closed: if state is not observable, treat it as destroyed.
    return true;
  }
}

export function destroyBestEffort(socket: Duplex | null | undefined): void {
  if (!socket) return;
  try {
    socket.destroy();
  } catch {
    // ignore
  }
}

/**
 * Writes `data` and reports whether the stream accepted it without backpressure (`ok`) or threw
 * (`err`).
 */
export function writeCaptureErrorBestEffort(
  socket: Duplex,
  data: string | Uint8Array,
): Readonly<{ ok: boolean; err: unknown | null }> {
  if (isDestroyed(socket)) return { ok: false, err: new Error("socket destroyed") };
  try {
    return { ok: socket.write(data), err: null };
  } catch (err) {
    return { ok: false, err };
  }
}

/**
 * Half-closes the socket (optionally flushing `data` first) and destroys it if the peer has not
 * closed within `timeoutMs`.
 */
export function endThenDestroyQuietly(
  socket: Duplex | null | undefined,
  data?: string | Uint8Array,
  opts: Readonly<{ timeoutMs?: number }> = {},
): void {
  if (!socket || isDestroyed(socket)) return;

  const timer = setTimeout(() => destroyBestEffort(socket), opts.timeoutMs ?? DEFAULT_END_TIMEOUT_MS);
  timer.unref();
  socket.once("close", () => clearTimeout(timer));

  try {
    if (data === undefined) socket.end();
    else socket.end(data);
  } catch {
    clearTimeout(timer);
    destroyBestEffort(socket);
  }
}
