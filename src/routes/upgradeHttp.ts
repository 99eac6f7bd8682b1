import type { Duplex } from "node:stream";

import { endThenDestroyQuietly } from "../socketSafe.js";
import { formatOneLineUtf8 } from "../util/text.js";

function httpStatusText(status: number): string {
  switch (status) {
    case 400:
      return "Bad Request";
    case 404:
      return "Not Found";
    case 426:
      return "Upgrade Required";
    case 500:
      return "Internal Server Error";
    case 503:
      return "Service Unavailable";
    default:
      return "Error";
  }
}

/** Answers a rejected upgrade with a plain HTTP response and closes the socket. */
export function respondUpgradeHttp(socket: Duplex, status: number, message: string): void {
  const safeMessage = formatOneLineUtf8(message, 512) || httpStatusText(status);
  const body = `${safeMessage}\n`;
  endThenDestroyQuietly(
    socket,
    [
      `HTTP/1.1 ${status} ${httpStatusText(status)}`,
      "Content-Type: text/plain; charset=utf-8",
      `Content-Length: ${Buffer.byteLength(body)}`,
      "Connection: close",
      "",
      body,
    ].join("\r\n"),
  );
}
