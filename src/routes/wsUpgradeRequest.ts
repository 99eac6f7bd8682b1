import type http from "node:http";

import { rawHeaderSingle } from "../rawHeaders.js";

export type WebSocketHandshakeDecision =
  | { ok: true; key: string }
  | { ok: false; status: 400 | 426; message: string };

// These headers are attacker-controlled.
const MAX_UPGRADE_HEADER_LEN = 256;
const MAX_CONNECTION_HEADER_LEN = 256;
const MAX_WS_VERSION_HEADER_LEN = 32;
const MAX_WS_KEY_HEADER_LEN = 256;

const INVALID_UPGRADE = { ok: false, status: 400, message: "Invalid WebSocket upgrade" } as const;

export function sanitizeWebSocketHandshakeKey(key: unknown): string | undefined {
  if (typeof key !== "string") return undefined;
  const trimmed = key.trim();
  if (trimmed === "") return undefined;
  if (trimmed.length > MAX_WS_KEY_HEADER_LEN) return undefined;
  return trimmed;
}

function headerSingle(headers: http.IncomingHttpHeaders, name: string): string | undefined {
  const v = headers[name];
  if (typeof v === "string") return v;
  // Repeated headers are ambiguous; the handshake requires single values.
  if (Array.isArray(v) && v.length === 1) return v[0];
  return undefined;
}

export function headerHasToken(raw: string, needleLower: string): boolean {
  // Header lists use comma-separated tokens (RFC 7230).
  let start = 0;
  while (start < raw.length) {
    let end = raw.indexOf(",", start);
    if (end === -1) end = raw.length;

    while (start < end && raw.charCodeAt(start) <= 0x20) start += 1;
    while (end > start && raw.charCodeAt(end - 1) <= 0x20) end -= 1;

    if (raw.slice(start, end).toLowerCase() === needleLower) return true;
    start = end + 1;
  }
  return false;
}

/**
 * Reads one handshake header, preferring `rawHeaders` (which exposes repeats) and falling back to
 * the parsed header map. `null` means present but unusable.
 */
function handshakeHeader(req: http.IncomingMessage, nameLower: string, maxLen: number): string | undefined | null {
  const raw = rawHeaderSingle(req.rawHeaders, nameLower, maxLen);
  if (raw === null) return null;
  const value = raw ?? headerSingle(req.headers ?? {}, nameLower);
  if (value !== undefined && value.length > maxLen) return null;
  return value;
}

/** True when the request asks for any protocol switch at all. */
export function isUpgradeRequest(req: http.IncomingMessage): boolean {
  const upgrade = handshakeHeader(req, "upgrade", MAX_UPGRADE_HEADER_LEN);
  return typeof upgrade === "string" && upgrade.trim() !== "";
}

export function validateWebSocketHandshakeRequest(req: http.IncomingMessage): WebSocketHandshakeDecision {
  const upgrade = handshakeHeader(req, "upgrade", MAX_UPGRADE_HEADER_LEN);
  if (!upgrade || !headerHasToken(upgrade, "websocket")) return INVALID_UPGRADE;

  const connection = handshakeHeader(req, "connection", MAX_CONNECTION_HEADER_LEN);
  if (!connection || !headerHasToken(connection, "upgrade")) return INVALID_UPGRADE;

  const version = handshakeHeader(req, "sec-websocket-version", MAX_WS_VERSION_HEADER_LEN);
  if (version === null) return INVALID_UPGRADE;
  if (!version || version.trim() !== "13") {
    return { ok: false, status: 426, message: "Unsupported WebSocket version (expected 13)" };
  }

  const key = handshakeHeader(req, "sec-websocket-key", MAX_WS_KEY_HEADER_LEN);
  if (key === null) return INVALID_UPGRADE;
  const keyTrimmed = sanitizeWebSocketHandshakeKey(key);
  if (!keyTrimmed) {
    return { ok: false, status: 400, message: "Missing required header: Sec-WebSocket-Key" };
  }

  return { ok: true, key: keyTrimmed };
}
