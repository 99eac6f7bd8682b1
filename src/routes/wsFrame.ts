import { err, ok, type Result } from "../result.js";

export const WS_OPCODE_CONTINUATION = 0x0;
export const WS_OPCODE_TEXT = 0x1;
export const WS_OPCODE_BINARY = 0x2;
export const WS_OPCODE_CLOSE = 0x8;
export const WS_OPCODE_PING = 0x9;
export const WS_OPCODE_PONG = 0xa;

export type WsFrame = Readonly<{
  fin: boolean;
  rsv: number;
  opcode: number;
  masked: boolean;
  payload: Buffer;
}>;

export type DecodedWsFrame = Readonly<{ frame: WsFrame; bytesConsumed: number }>;

const MAX_INLINE_LENGTH = 125;
const MAX_16BIT_LENGTH = 0xffff;

export function encodeWsClosePayload(code: number): Buffer {
  // `code` is a 16-bit unsigned int in network byte order.
  const c = Number.isInteger(code) ? code : 1002;
  const clamped = Math.max(0, Math.min(0xffff, c));
  return Buffer.from([(clamped >> 8) & 0xff, clamped & 0xff]);
}

/**
 * Header size implied by the first two bytes of a frame, or `null` when fewer than two bytes
 * are available.
 */
export function wsFrameHeaderLength(buffer: Buffer): number | null {
  if (buffer.length < 2) return null;
  const second = buffer[1];
  const lengthField = second & 0x7f;
  let headerLength = 2;
  if (lengthField === 126) headerLength += 2;
  else if (lengthField === 127) headerLength += 8;
  if ((second & 0x80) !== 0) headerLength += 4;
  return headerLength;
}

export function decodeWsFrame(buffer: Buffer, maxPayloadBytes = Number.MAX_SAFE_INTEGER): Result<DecodedWsFrame> {
  const headerLength = wsFrameHeaderLength(buffer);
  if (headerLength === null || buffer.length < headerLength) {
    return err("INCOMPLETE_FRAME", "Frame header is incomplete");
  }

  const first = buffer[0];
  const second = buffer[1];
  const fin = (first & 0x80) !== 0;
  const rsv = (first & 0x70) >> 4;
  const opcode = first & 0x0f;
  const masked = (second & 0x80) !== 0;

  let length = second & 0x7f;
  let offset = 2;
  if (length === 126) {
    length = buffer.readUInt16BE(offset);
    offset += 2;
  } else if (length === 127) {
    const hi = buffer.readUInt32BE(offset);
    const lo = buffer.readUInt32BE(offset + 4);
    offset += 8;
    const combined = hi * 2 ** 32 + lo;
    if (!Number.isSafeInteger(combined)) {
      return err("PROTOCOL_ERROR", "64-bit payload length is out of range");
    }
    length = combined;
  }

  if (length > maxPayloadBytes) {
    return err("FRAME_TOO_LARGE", `Frame payload of ${length} bytes exceeds ${maxPayloadBytes}`);
  }

  let maskKey: Buffer | null = null;
  if (masked) {
    maskKey = buffer.subarray(offset, offset + 4);
    offset += 4;
  }

  if (buffer.length < offset + length) {
    return err("INCOMPLETE_FRAME", "Frame payload is incomplete");
  }

  const raw = buffer.subarray(offset, offset + length);
  // Always copy so the decoded frame does not pin the caller's receive buffer.
  const payload = maskKey ? unmask(raw, maskKey) : Buffer.from(raw);
  return ok({ frame: { fin, rsv, opcode, masked, payload }, bytesConsumed: offset + length });
}

function unmask(payload: Buffer, key: Buffer): Buffer {
  const out = Buffer.allocUnsafe(payload.length);
  for (let i = 0; i < payload.length; i++) {
    out[i] = payload[i] ^ key[i % 4];
  }
  return out;
}

export function concat2(a: Buffer, b: Buffer): Buffer {
  const out = Buffer.allocUnsafe(a.length + b.length);
  a.copy(out, 0);
  b.copy(out, a.length);
  return out;
}

export function encodeWsFrame(opcode: number, payload: Buffer): Buffer {
  const finOpcode = 0x80 | (opcode & 0x0f);
  const length = payload.length;

  if (length <= MAX_INLINE_LENGTH) {
    const out = Buffer.allocUnsafe(2 + length);
    out[0] = finOpcode;
    out[1] = length;
    payload.copy(out, 2);
    return out;
  }

  if (length <= MAX_16BIT_LENGTH) {
    const out = Buffer.allocUnsafe(4 + length);
    out[0] = finOpcode;
    out[1] = 126;
    out.writeUInt16BE(length, 2);
    payload.copy(out, 4);
    return out;
  }

  const out = Buffer.allocUnsafe(10 + length);
  out[0] = finOpcode;
  out[1] = 127;
  out.writeUInt32BE(Math.floor(length / 2 ** 32), 2);
  out.writeUInt32BE(length >>> 0, 6);
  payload.copy(out, 10);
  return out;
}

/** Single unfragmented, unmasked text frame: the only frame kind the gateway emits for data. */
export function encodeTextFrame(payload: Buffer | string): Buffer {
  const bytes = typeof payload === "string" ? Buffer.from(payload, "utf8") : payload;
  return encodeWsFrame(WS_OPCODE_TEXT, bytes);
}

/** Builds a client-to-server (masked) frame. Used by tests and in-process clients. */
export function encodeMaskedWsFrame(opcode: number, payload: Buffer, maskKey: Buffer, fin = true): Buffer {
  if (maskKey.length !== 4) throw new RangeError("mask key must be 4 bytes");
  const unmasked = encodeWsFrame(opcode, payload);
  const headerLength = unmasked.length - payload.length;
  const out = Buffer.allocUnsafe(unmasked.length + 4);
  unmasked.copy(out, 0, 0, headerLength);
  if (!fin) out[0] &= 0x7f;
  out[1] |= 0x80;
  maskKey.copy(out, headerLength);
  const body = out.subarray(headerLength + 4);
  for (let i = 0; i < payload.length; i++) {
    body[i] = payload[i] ^ maskKey[i % 4];
  }
  return out;
}
