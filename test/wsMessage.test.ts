import assert from "node:assert/strict";
import test from "node:test";

import {
  WS_OPCODE_BINARY,
  WS_OPCODE_CLOSE,
  WS_OPCODE_CONTINUATION,
  WS_OPCODE_PING,
  WS_OPCODE_PONG,
  WS_OPCODE_TEXT,
  encodeMaskedWsFrame,
  encodeWsFrame,
} from "../src/routes/wsFrame.js";
import { WsMessageReceiver } from "../src/routes/wsMessage.js";

const MASK = Buffer.from([0x11, 0x22, 0x33, 0x44]);

type Recorded = {
  messages: Array<{ opcode: number; text: string }>;
  sent: Array<{ opcode: number; payload: number[] }>;
  closed: number;
  protocolErrors: string[];
  tooLarge: number;
};

function makeReceiver(maxMessageBytes = 1024): { receiver: WsMessageReceiver; rec: Recorded } {
  const rec: Recorded = { messages: [], sent: [], closed: 0, protocolErrors: [], tooLarge: 0 };
  const receiver = new WsMessageReceiver({
    maxMessageBytes,
    onMessage: (opcode, payload) => rec.messages.push({ opcode, text: payload.toString("utf8") }),
    onClose: () => {
      rec.closed += 1;
    },
    sendWsFrame: (opcode, payload) => rec.sent.push({ opcode, payload: [...payload] }),
    closeWithProtocolError: (reason) => rec.protocolErrors.push(reason),
    closeWithMessageTooLarge: () => {
      rec.tooLarge += 1;
    },
  });
  return { receiver, rec };
}

function masked(opcode: number, text: string, fin = true): Buffer {
  return encodeMaskedWsFrame(opcode, Buffer.from(text, "utf8"), MASK, fin);
}

test("delivers a text message split across several reads", () => {
  const { receiver, rec } = makeReceiver();
  const frame = masked(WS_OPCODE_TEXT, '{"type":"request-offer"}');
  receiver.push(frame.subarray(0, 1));
  receiver.push(frame.subarray(1, 7));
  assert.equal(rec.messages.length, 0);
  assert.equal(receiver.pendingBytes, 7);
  receiver.push(frame.subarray(7));
  assert.deepEqual(rec.messages, [{ opcode: WS_OPCODE_TEXT, text: '{"type":"request-offer"}' }]);
  assert.equal(receiver.pendingBytes, 0);
});

test("delivers two messages that arrive in one read", () => {
  const { receiver, rec } = makeReceiver();
  receiver.push(Buffer.concat([masked(WS_OPCODE_TEXT, "one"), masked(WS_OPCODE_BINARY, "two")]));
  assert.deepEqual(rec.messages, [
    { opcode: WS_OPCODE_TEXT, text: "one" },
    { opcode: WS_OPCODE_BINARY, text: "two" },
  ]);
});

test("reassembles fragmented messages and answers pings in between", () => {
  const { receiver, rec } = makeReceiver();
  receiver.push(masked(WS_OPCODE_TEXT, "hel", false));
  receiver.push(masked(WS_OPCODE_PING, "p"));
  receiver.push(masked(WS_OPCODE_CONTINUATION, "lo"));
  assert.deepEqual(rec.messages, [{ opcode: WS_OPCODE_TEXT, text: "hello" }]);
  assert.deepEqual(rec.sent, [{ opcode: WS_OPCODE_PONG, payload: [0x70] }]);
});

test("echoes a close frame and reports the close", () => {
  const { receiver, rec } = makeReceiver();
  receiver.push(encodeMaskedWsFrame(WS_OPCODE_CLOSE, Buffer.from([0x03, 0xe8]), MASK));
  assert.deepEqual(rec.sent, [{ opcode: WS_OPCODE_CLOSE, payload: [0x03, 0xe8] }]);
  assert.equal(rec.closed, 1);

  receiver.push(masked(WS_OPCODE_TEXT, "late"));
  assert.equal(rec.messages.length, 0);
});

test("rejects unmasked client frames", () => {
  const { receiver, rec } = makeReceiver();
  receiver.push(encodeWsFrame(WS_OPCODE_TEXT, Buffer.from("x")));
  assert.deepEqual(rec.protocolErrors, ["Client frames must be masked"]);
  assert.equal(rec.messages.length, 0);
});

test("rejects continuation frames without a message in progress", () => {
  const { receiver, rec } = makeReceiver();
  receiver.push(masked(WS_OPCODE_CONTINUATION, "x"));
  assert.deepEqual(rec.protocolErrors, ["Unexpected continuation frame"]);
});

test("rejects a new data frame while a fragmented message is open", () => {
  const { receiver, rec } = makeReceiver();
  receiver.push(masked(WS_OPCODE_TEXT, "a", false));
  receiver.push(masked(WS_OPCODE_TEXT, "b"));
  assert.deepEqual(rec.protocolErrors, ["Expected continuation frame"]);
});

test("rejects fragmented control frames", () => {
  const { receiver, rec } = makeReceiver();
  receiver.push(masked(WS_OPCODE_PING, "x", false));
  assert.deepEqual(rec.protocolErrors, ["Invalid control frame"]);
});

test("rejects unknown opcodes", () => {
  const { receiver, rec } = makeReceiver();
  receiver.push(masked(0x3, "x"));
  assert.deepEqual(rec.protocolErrors, ["Unknown opcode 3"]);
});

test("rejects a single frame above the message limit from its header alone", () => {
  const { receiver, rec } = makeReceiver(16);
  const frame = masked(WS_OPCODE_TEXT, "x".repeat(17));
  receiver.push(frame.subarray(0, 6));
  assert.equal(rec.tooLarge, 1);
  assert.equal(receiver.pendingBytes, 0);
});

test("rejects fragmented messages whose total exceeds the limit", () => {
  const { receiver, rec } = makeReceiver(16);
  receiver.push(masked(WS_OPCODE_TEXT, "x".repeat(10), false));
  receiver.push(masked(WS_OPCODE_CONTINUATION, "y".repeat(10)));
  assert.equal(rec.tooLarge, 1);
  assert.equal(rec.messages.length, 0);
});
