import assert from "node:assert/strict";
import test from "node:test";

import { ClientRegistry, MAX_CLIENTS, type ClientTransport } from "../src/clientRegistry.js";

class FakeTransport implements ClientTransport {
  closeCalls = 0;
  constructor(readonly name: string) {}
  close(): void {
    this.closeCalls += 1;
  }
}

function fill(registry: ClientRegistry<FakeTransport, string>, n: number): FakeTransport[] {
  const transports: FakeTransport[] = [];
  for (let i = 0; i < n; i += 1) {
    const t = new FakeTransport(`t${i}`);
    const res = registry.add(t);
    assert.ok(res.ok);
    transports.push(t);
  }
  return transports;
}

test("hands out indexes in order up to the default capacity", () => {
  const registry = new ClientRegistry<FakeTransport, string>();
  assert.equal(registry.capacity, MAX_CLIENTS);

  const indexes: number[] = [];
  for (let i = 0; i < MAX_CLIENTS; i += 1) {
    const res = registry.add(new FakeTransport(`t${i}`));
    assert.ok(res.ok);
    indexes.push(res.value);
  }
  assert.deepEqual(indexes, [0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
  assert.equal(registry.size, 10);
});

test("rejects the client past capacity without changing the table", () => {
  const registry = new ClientRegistry<FakeTransport, string>({ capacity: 2 });
  fill(registry, 2);

  const res = registry.add(new FakeTransport("extra"));
  assert.equal(res.ok, false);
  assert.equal(!res.ok && res.code, "CAPACITY_EXCEEDED");
  assert.equal(registry.size, 2);
  assert.equal(registry.countConnected(), 2);
});

test("keeps allocating fresh indexes until every slot has been used once", () => {
  const registry = new ClientRegistry<FakeTransport, string>({ capacity: 4 });
  fill(registry, 2);
  registry.remove(0);

  const next = registry.add(new FakeTransport("c"));
  assert.ok(next.ok);
  assert.equal(next.value, 2);
});

test("reuses the lowest freed index once the table has wrapped", () => {
  const registry = new ClientRegistry<FakeTransport, string>({ capacity: 3 });
  fill(registry, 3);
  registry.remove(2);
  registry.remove(1);

  const a = registry.add(new FakeTransport("a"));
  const b = registry.add(new FakeTransport("b"));
  assert.ok(a.ok && b.ok);
  assert.deepEqual([a.value, b.value], [1, 2]);
});

test("remove closes the transport once and is idempotent", () => {
  const disconnected: Array<[number, string | null]> = [];
  const registry = new ClientRegistry<FakeTransport, string>({
    capacity: 3,
    onDisconnect: (index, session) => disconnected.push([index, session]),
  });
  const [t0] = fill(registry, 1);
  assert.equal(registry.attachSession(0, "session-0"), true);

  registry.remove(0);
  registry.remove(0);

  assert.equal(t0?.closeCalls, 1);
  assert.equal(registry.size, 0);
  assert.deepEqual(disconnected, [[0, "session-0"]]);
});

test("remove ignores out-of-range and never-used indexes", () => {
  const registry = new ClientRegistry<FakeTransport, string>({ capacity: 3 });
  fill(registry, 1);
  registry.remove(-1);
  registry.remove(2);
  registry.remove(1.5);
  registry.remove(99);
  assert.equal(registry.size, 1);
});

test("lookup returns a copy of the slot", () => {
  const registry = new ClientRegistry<FakeTransport, string>({ capacity: 2 });
  const [t0] = fill(registry, 1);

  const slot = registry.lookup(0);
  assert.equal(slot?.connected, true);
  assert.equal(slot?.transport, t0);
  assert.equal(slot?.session, null);

  registry.remove(0);
  assert.equal(slot?.connected, true);
  assert.equal(registry.lookup(0)?.connected, false);
  assert.equal(registry.lookup(0)?.transport, null);
  assert.equal(registry.lookup(7), undefined);
});

test("sessions are cleared when a slot is freed", () => {
  const registry = new ClientRegistry<FakeTransport, string>({ capacity: 1 });
  fill(registry, 1);
  registry.attachSession(0, "s");
  assert.equal(registry.sessionOf(0), "s");

  registry.remove(0);
  assert.equal(registry.sessionOf(0), null);
  assert.equal(registry.attachSession(0, "t"), false);

  fill(registry, 1);
  assert.equal(registry.sessionOf(0), null);
});

test("forEachConnected visits only connected slots in index order", () => {
  const registry = new ClientRegistry<FakeTransport, string>({ capacity: 4 });
  fill(registry, 4);
  registry.remove(1);

  const seen: Array<[number, string | undefined]> = [];
  registry.forEachConnected((slot) => seen.push([slot.index, slot.transport?.name]));
  assert.deepEqual(seen, [
    [0, "t0"],
    [2, "t2"],
    [3, "t3"],
  ]);
});

test("clear removes every client", () => {
  const disconnected: number[] = [];
  const registry = new ClientRegistry<FakeTransport, string>({
    capacity: 3,
    onDisconnect: (index) => disconnected.push(index),
  });
  const transports = fill(registry, 3);

  registry.clear();
  assert.equal(registry.size, 0);
  assert.deepEqual(disconnected, [0, 1, 2]);
  assert.deepEqual(
    transports.map((t) => t.closeCalls),
    [1, 1, 1],
  );
});

test("rejects invalid capacities", () => {
  assert.throws(() => new ClientRegistry({ capacity: 0 }), RangeError);
  assert.throws(() => new ClientRegistry({ capacity: 1.5 }), RangeError);
});
