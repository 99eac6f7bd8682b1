import assert from "node:assert/strict";
import test from "node:test";

import {
  WS_OPCODE_BINARY,
  WS_OPCODE_CLOSE,
  WS_OPCODE_TEXT,
  decodeWsFrame,
  encodeMaskedWsFrame,
  encodeTextFrame,
  encodeWsClosePayload,
  encodeWsFrame,
  wsFrameHeaderLength,
} from "../src/routes/wsFrame.js";

test("encodeTextFrame writes a single unmasked FIN frame", () => {
  const frame = encodeTextFrame("hello");
  assert.deepEqual([...frame], [0x81, 0x05, 0x68, 0x65, 0x6c, 0x6c, 0x6f]);
});

test("encodeWsFrame picks the length encoding by payload size", () => {
  assert.deepEqual([...encodeWsFrame(WS_OPCODE_BINARY, Buffer.alloc(125)).subarray(0, 2)], [0x82, 125]);
  assert.deepEqual([...encodeWsFrame(WS_OPCODE_BINARY, Buffer.alloc(126)).subarray(0, 4)], [0x82, 126, 0x00, 0x7e]);
  assert.deepEqual([...encodeWsFrame(WS_OPCODE_BINARY, Buffer.alloc(65535)).subarray(0, 4)], [0x82, 126, 0xff, 0xff]);
  assert.deepEqual(
    [...encodeWsFrame(WS_OPCODE_BINARY, Buffer.alloc(65536)).subarray(0, 10)],
    [0x82, 127, 0, 0, 0, 0, 0, 1, 0, 0],
  );
});

test("decodeWsFrame round-trips frames across every length class", () => {
  for (const length of [0, 1, 125, 126, 65535, 65536, 70000]) {
    const payload = Buffer.alloc(length, length % 251);
    const encoded = encodeWsFrame(WS_OPCODE_BINARY, payload);
    const decoded = decodeWsFrame(encoded);
    assert.ok(decoded.ok, `length ${length}`);
    assert.equal(decoded.value.bytesConsumed, encoded.length);
    assert.equal(decoded.value.frame.opcode, WS_OPCODE_BINARY);
    assert.equal(decoded.value.frame.fin, true);
    assert.equal(decoded.value.frame.masked, false);
    assert.ok(decoded.value.frame.payload.equals(payload), `length ${length}`);
  }
});

test("decodeWsFrame unmasks client payloads", () => {
  const buf = Buffer.from([0x81, 0x83, 0x01, 0x02, 0x03, 0x04, 0x60, 0x60, 0x60]);
  const decoded = decodeWsFrame(buf);
  assert.ok(decoded.ok);
  assert.equal(decoded.value.frame.masked, true);
  assert.equal(decoded.value.frame.opcode, WS_OPCODE_TEXT);
  assert.equal(decoded.value.frame.payload.toString("utf8"), "abc");
  assert.equal(decoded.value.bytesConsumed, 9);
});

test("decodeWsFrame reports incomplete headers and payloads", () => {
  const one = decodeWsFrame(Buffer.from([0x81]));
  assert.equal(one.ok, false);
  assert.equal(!one.ok && one.code, "INCOMPLETE_FRAME");

  const extendedHeader = decodeWsFrame(Buffer.from([0x82, 126, 0x00]));
  assert.equal(!extendedHeader.ok && extendedHeader.code, "INCOMPLETE_FRAME");

  const shortPayload = decodeWsFrame(Buffer.from([0x81, 0x05, 0x68, 0x65]));
  assert.equal(!shortPayload.ok && shortPayload.code, "INCOMPLETE_FRAME");
});

test("decodeWsFrame rejects a declared length above the limit before the payload arrives", () => {
  const header = Buffer.from([0x82, 127, 0, 0, 0, 0, 0, 0x10, 0, 0]);
  const decoded = decodeWsFrame(header, 64 * 1024);
  assert.equal(decoded.ok, false);
  assert.equal(!decoded.ok && decoded.code, "FRAME_TOO_LARGE");
});

test("decodeWsFrame rejects 64-bit lengths beyond the safe integer range", () => {
  const header = Buffer.from([0x82, 127, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff]);
  const decoded = decodeWsFrame(header);
  assert.equal(!decoded.ok && decoded.code, "PROTOCOL_ERROR");
});

test("decodeWsFrame consumes only the first of two back-to-back frames", () => {
  const buf = Buffer.concat([encodeTextFrame("a"), encodeTextFrame("bc")]);
  const decoded = decodeWsFrame(buf);
  assert.ok(decoded.ok);
  assert.equal(decoded.value.bytesConsumed, 3);
  assert.equal(decoded.value.frame.payload.toString("utf8"), "a");
});

test("decodeWsFrame exposes RSV bits and the FIN flag", () => {
  const decoded = decodeWsFrame(Buffer.from([0x41, 0x00]));
  assert.ok(decoded.ok);
  assert.equal(decoded.value.frame.fin, false);
  assert.equal(decoded.value.frame.rsv, 4);
});

test("wsFrameHeaderLength accounts for extended lengths and the mask key", () => {
  assert.equal(wsFrameHeaderLength(Buffer.from([0x81])), null);
  assert.equal(wsFrameHeaderLength(Buffer.from([0x81, 0x05])), 2);
  assert.equal(wsFrameHeaderLength(Buffer.from([0x81, 0x85])), 6);
  assert.equal(wsFrameHeaderLength(Buffer.from([0x81, 0xfe])), 8);
  assert.equal(wsFrameHeaderLength(Buffer.from([0x81, 0xff])), 14);
});

test("encodeMaskedWsFrame produces frames decodeWsFrame unmasks", () => {
  const payload = Buffer.from("masked payload", "utf8");
  const frame = encodeMaskedWsFrame(WS_OPCODE_TEXT, payload, Buffer.from([9, 8, 7, 6]), false);
  assert.equal(frame[0], 0x01);
  assert.equal(frame[1], 0x80 | payload.length);
  const decoded = decodeWsFrame(frame);
  assert.ok(decoded.ok);
  assert.equal(decoded.value.frame.fin, false);
  assert.ok(decoded.value.frame.payload.equals(payload));

  assert.throws(() => encodeMaskedWsFrame(WS_OPCODE_TEXT, payload, Buffer.alloc(3)), RangeError);
});

test("encodeWsClosePayload writes the code in network byte order", () => {
  assert.deepEqual([...encodeWsClosePayload(1002)], [0x03, 0xea]);
  assert.deepEqual([...encodeWsFrame(WS_OPCODE_CLOSE, encodeWsClosePayload(1000))], [0x88, 0x02, 0x03, 0xe8]);
});
