import type { Duplex } from "node:stream";

import type { ClientTransport } from "./clientRegistry.js";
import {
  WS_OPCODE_CLOSE,
  encodeTextFrame,
  encodeWsClosePayload,
  encodeWsFrame,
} from "./routes/wsFrame.js";
import { WsMessageReceiver } from "./routes/wsMessage.js";
import { destroyBestEffort, endThenDestroyQuietly, writeCaptureErrorBestEffort } from "./socketSafe.js";

export const WS_CLOSE_NORMAL = 1000;
export const WS_CLOSE_GOING_AWAY = 1001;
export const WS_CLOSE_PROTOCOL_ERROR = 1002;
export const WS_CLOSE_UNSUPPORTED_DATA = 1003;
export const WS_CLOSE_MESSAGE_TOO_BIG = 1009;
export const WS_CLOSE_INTERNAL_ERROR = 1011;

export type ClientConnectionEndReason = "peer_closed" | "protocol_error" | "message_too_large" | "transport_error";

export type ClientConnectionOptions = Readonly<{
  maxMessageBytes: number;
  onMessage: (opcode: number, payload: Buffer) => void;
  /** Fired once when the channel ends for any reason other than a local `close()`. */
  onEnd: (reason: ClientConnectionEndReason, detail?: string) => void;
}>;

/**
 * The transport handle of one upgraded browser connection: owns the socket and its receive
 * state, writes outbound frames.
 */
export class ClientConnection implements ClientTransport {
  private readonly socket: Duplex;
  private readonly opts: ClientConnectionOptions;
  private readonly receiver: WsMessageReceiver;
  private closed = false;

  constructor(socket: Duplex, opts: ClientConnectionOptions) {
    this.socket = socket;
    this.opts = opts;
    this.receiver = new WsMessageReceiver({
      maxMessageBytes: opts.maxMessageBytes,
      onMessage: (opcode, payload) => this.opts.onMessage(opcode, payload),
      sendWsFrame: (opcode, payload) => this.writeFrame(encodeWsFrame(opcode, payload)),
      onClose: () => this.end("peer_closed"),
      closeWithProtocolError: (reason) => this.end("protocol_error", reason, WS_CLOSE_PROTOCOL_ERROR),
      closeWithMessageTooLarge: () => this.end("message_too_large", undefined, WS_CLOSE_MESSAGE_TOO_BIG),
    });
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  /** Starts consuming socket data; `head` holds bytes that arrived with the upgrade request. */
  start(head: Buffer): void {
    this.socket.on("data", (data: Buffer) => this.receiver.push(data));
    this.socket.on("error", (err: Error) => this.end("transport_error", err.message));
    this.socket.on("end", () =>
      this.end(
        "transport_error",
        this.receiver.pendingBytes > 0 ? "peer ended the connection mid-frame" : "peer ended the connection",
      ),
    );
    this.socket.on("close", () => this.end("transport_error", "socket closed"));
    if (head.length > 0) this.receiver.push(head);
  }

  sendText(text: string): boolean {
    return this.writeFrame(encodeTextFrame(text));
  }

  /**
   * Closes the channel locally. With a close code, a close frame is flushed before the socket
   * is released; without one the socket is destroyed at once.
   */
  close(code?: number): void {
    if (this.closed) return;
    this.closed = true;
    if (code === undefined) {
      destroyBestEffort(this.socket);
      return;
    }
    this.writeCloseFrame(code);
    endThenDestroyQuietly(this.socket);
  }

  private writeFrame(frame: Buffer): boolean {
    if (this.closed) return false;
    const res = writeCaptureErrorBestEffort(this.socket, frame);
    if (res.err) {
      this.end("transport_error", "write failed");
      return false;
    }
    return true;
  }

  private writeCloseFrame(code: number): void {
    writeCaptureErrorBestEffort(this.socket, encodeWsFrame(WS_OPCODE_CLOSE, encodeWsClosePayload(code)));
  }

  private end(reason: ClientConnectionEndReason, detail?: string, closeCode?: number): void {
    if (this.closed) return;
    this.closed = true;
    if (closeCode !== undefined) {
      this.writeCloseFrame(closeCode);
      endThenDestroyQuietly(this.socket);
    } else if (reason === "peer_closed") {
      // The receiver already echoed the peer's close frame.
      endThenDestroyQuietly(this.socket);
    } else {
      destroyBestEffort(this.socket);
    }
    this.opts.onEnd(reason, detail);
  }
}
