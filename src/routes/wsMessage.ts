import {
  WS_OPCODE_BINARY,
  WS_OPCODE_CLOSE,
  WS_OPCODE_CONTINUATION,
  WS_OPCODE_PING,
  WS_OPCODE_PONG,
  WS_OPCODE_TEXT,
  concat2,
  decodeWsFrame,
  type WsFrame,
} from "./wsFrame.js";

export type WsMessageHandler = (opcode: number, payload: Buffer) => void;

export type WsMessageReceiverOptions = Readonly<{
  maxMessageBytes: number;
  onMessage: WsMessageHandler;
  onClose: () => void;
  sendWsFrame: (opcode: number, payload: Buffer) => void;
  closeWithProtocolError: (reason: string) => void;
  closeWithMessageTooLarge: () => void;
}>;

function isControlOpcode(opcode: number): boolean {
  return opcode === WS_OPCODE_CLOSE || opcode === WS_OPCODE_PING || opcode === WS_OPCODE_PONG;
}

/**
 * Server-side message assembler: buffers partial frames across reads, joins fragmented
 * text/binary messages and answers control frames.
 */
export class WsMessageReceiver {
  private readonly opts: WsMessageReceiverOptions;

  private buffer: Buffer = Buffer.alloc(0);

  private fragmentedOpcode: number | null = null;
  private fragmentedChunks: Buffer[] = [];
  private fragmentedBytes = 0;

  private closed = false;

  constructor(opts: WsMessageReceiverOptions) {
    this.opts = opts;
  }

  get pendingBytes(): number {
    return this.buffer.length;
  }

  push(data: Buffer): void {
    if (this.closed) return;
    this.buffer = this.buffer.length === 0 ? data : concat2(this.buffer, data);
    this.drain();
  }

  private drain(): void {
    while (!this.closed) {
      const decoded = decodeWsFrame(this.buffer, this.opts.maxMessageBytes);
      if (!decoded.ok) {
        if (decoded.code === "INCOMPLETE_FRAME") return;
        this.buffer = Buffer.alloc(0);
        if (decoded.code === "FRAME_TOO_LARGE") {
          this.failTooLarge();
        } else {
          this.failProtocol(decoded.message);
        }
        return;
      }
      const { frame, bytesConsumed } = decoded.value;
      // If we consumed the entire buffer, avoid keeping a reference to the backing allocation
      // via an empty subarray view.
      this.buffer = bytesConsumed === this.buffer.length ? Buffer.alloc(0) : this.buffer.subarray(bytesConsumed);
      this.handleFrame(frame);
    }
  }

  private failProtocol(reason: string): void {
    this.closed = true;
    this.opts.closeWithProtocolError(reason);
  }

  private failTooLarge(): void {
    this.closed = true;
    this.opts.closeWithMessageTooLarge();
  }

  private handleFrame(frame: WsFrame): void {
    // RFC 6455: clients must mask frames, and RSV bits must be 0 since no extensions are negotiated.
    if (!frame.masked) {
      this.failProtocol("Client frames must be masked");
      return;
    }
    if (frame.rsv !== 0) {
      this.failProtocol("Unexpected RSV bits");
      return;
    }
    if (isControlOpcode(frame.opcode) && (!frame.fin || frame.payload.length > 125)) {
      this.failProtocol("Invalid control frame");
      return;
    }

    switch (frame.opcode) {
      case WS_OPCODE_CONTINUATION: {
        if (this.fragmentedOpcode === null) {
          this.failProtocol("Unexpected continuation frame");
          return;
        }
        this.fragmentedChunks.push(frame.payload);
        this.fragmentedBytes += frame.payload.length;
        if (this.fragmentedBytes > this.opts.maxMessageBytes) {
          this.failTooLarge();
          return;
        }
        if (frame.fin) {
          const payload = Buffer.concat(this.fragmentedChunks, this.fragmentedBytes);
          const opcode = this.fragmentedOpcode;
          this.fragmentedOpcode = null;
          this.fragmentedChunks = [];
          this.fragmentedBytes = 0;
          this.opts.onMessage(opcode, payload);
        }
        return;
      }
      case WS_OPCODE_TEXT:
      case WS_OPCODE_BINARY: {
        if (this.fragmentedOpcode !== null) {
          this.failProtocol("Expected continuation frame");
          return;
        }
        if (frame.fin) {
          this.opts.onMessage(frame.opcode, frame.payload);
          return;
        }
        this.fragmentedOpcode = frame.opcode;
        this.fragmentedChunks = [frame.payload];
        this.fragmentedBytes = frame.payload.length;
        return;
      }
      case WS_OPCODE_CLOSE: {
        this.closed = true;
        this.opts.sendWsFrame(WS_OPCODE_CLOSE, frame.payload);
        this.opts.onClose();
        return;
      }
      case WS_OPCODE_PING: {
        this.opts.sendWsFrame(WS_OPCODE_PONG, frame.payload);
        return;
      }
      case WS_OPCODE_PONG: {
        return;
      }
      default: {
        this.failProtocol(`Unknown opcode ${frame.opcode}`);
      }
    }
  }
}
