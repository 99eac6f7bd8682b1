import { createHash } from "node:crypto";
import type { Duplex } from "node:stream";

import { writeCaptureErrorBestEffort, destroyBestEffort } from "../socketSafe.js";

const WS_GUID = "258EAFA5-E914-47DA-95CA-C5AB0DC85B11";

export function webSocketAccept(key: string): string {
  return createHash("sha1").update(key + WS_GUID).digest("base64");
}

export function webSocketHandshakeResponse(key: string): string {
  return [
    "HTTP/1.1 101 Switching Protocols",
    "Upgrade: websocket",
    "Connection: Upgrade",
    `Sec-WebSocket-Accept: ${webSocketAccept(key)}`,
    "\r\n",
  ].join("\r\n");
}

/** Returns false when the socket could not take the response (it is destroyed in that case). */
export function writeWebSocketHandshake(socket: Duplex, opts: Readonly<{ key: string }>): boolean {
  const res = writeCaptureErrorBestEffort(socket, webSocketHandshakeResponse(opts.key));
  if (res.err) {
    destroyBestEffort(socket);
    return false;
  }
  return true;
}
