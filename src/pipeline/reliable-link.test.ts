import { afterEach, describe, expect, it, vi } from "vitest";
import { EncodeError, LinkDegraded, SendSuperseded } from "./errors.js";
import { type LinkTransport, MemoryNetwork } from "./link-transport.js";
import { type GapSkip, ReliableLink, type RetryPolicy, type SendResult } from "./reliable-link.js";
import type { Message } from "./types.js";
import { decodeMessage, encodeMessage, MAX_PAYLOAD_SIZE } from "./wire-codec.js";

const quiet = { info: () => {}, warn: () => {}, error: () => {} };

class FakeTransport implements LinkTransport {
  readonly sent: Uint8Array[] = [];
  private handlers = new Set<(packet: Uint8Array) => void>();

  send(packet: Uint8Array): void {
    this.sent.push(packet);
  }

  onPacket(handler: (packet: Uint8Array) => void): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  inject(packet: Uint8Array): void {
    for (const handler of this.handlers) {
      handler(packet);
    }
  }

  async close(): Promise<void> {
    this.handlers.clear();
  }

  sentMessages(): Message[] {
    return this.sent.flatMap((frame) => {
      const decoded = decodeMessage(frame);
      return decoded.ok ? [decoded.message] : [];
    });
  }
}

function frame(sequence: number, overrides: Partial<Message> = {}): Uint8Array {
  return encodeMessage({
    sourceId: "a",
    destinationId: "b",
    epoch: 1,
    sequence,
    payloadType: "STATE",
    payload: new Uint8Array([sequence & 0xff]),
    createdAtMs: 0,
    ...overrides,
  });
}

async function linkPair(network: MemoryNetwork, retry?: Partial<RetryPolicy>) {
  const server = await network.listen("mem://b");
  const client = network.connect("mem://b");
  const sender = new ReliableLink({ localId: "a", peerId: "b", transport: client, retry, log: quiet });
  const receiver = new ReliableLink({ localId: "b", peerId: "a", transport: server, retry, log: quiet });
  return { sender, receiver };
}

describe("ReliableLink over a memory network", () => {
  let network: MemoryNetwork | null = null;

  afterEach(() => {
    network?.shutdown();
    network = null;
  });

  it("delivers sends in order on a clean network", async () => {
    network = new MemoryNetwork();
    const { sender, receiver } = await linkPair(network);
    const received: number[] = [];
    receiver.on("message", (message) => received.push(message.sequence));

    const results = await Promise.all(
      [10, 11, 12].map((value) => sender.send({ payloadType: "STATE", payload: new Uint8Array([value]) })),
    );

    expect(results.map((r) => r.ok)).toEqual([true, true, true]);
    expect(results.map((r) => r.sequence)).toEqual([0, 1, 2]);
    expect(received).toEqual([0, 1, 2]);
  });

  it("releases every sequence exactly once, in order, under loss, duplication and reordering", async () => {
    network = new MemoryNetwork({ lossRate: 0.5, duplicateRate: 0.2, maxDelayMs: 3, seed: 42 });
    const { sender, receiver } = await linkPair(network, { timeoutMs: 5, backoffFactor: 1, maxAttempts: 60 });
    const received: Array<{ sequence: number; value: number }> = [];
    receiver.on("message", (message) => received.push({ sequence: message.sequence, value: message.payload[0] }));

    const n = 40;
    const results = await Promise.all(
      Array.from({ length: n }, (_, i) => sender.send({ payloadType: "VECTOR", payload: new Uint8Array([i]) })),
    );

    expect(results.every((r) => r.ok)).toBe(true);
    expect(received.map((r) => r.sequence)).toEqual(Array.from({ length: n }, (_, i) => i));
    expect(received.map((r) => r.value)).toEqual(Array.from({ length: n }, (_, i) => i));
    expect(sender.stats.acknowledged).toBe(n);
    expect(receiver.stats.delivered).toBe(n);
    expect(network.stats.dropped).toBeGreaterThan(0);
  });

  it("serves messages through a restartable async iterator", async () => {
    network = new MemoryNetwork();
    const { sender, receiver } = await linkPair(network);
    const first = receiver.receive();

    await sender.send({ payloadType: "STATE", payload: new Uint8Array([1]) });
    await sender.send({ payloadType: "STATE", payload: new Uint8Array([2]) });

    const a = await first.next();
    const b = await receiver.receive().next();
    expect(a.done ? null : a.value.sequence).toBe(0);
    expect(b.done ? null : b.value.sequence).toBe(1);
  });

  it("delivers a restarted sender's messages from sequence 0 again", async () => {
    network = new MemoryNetwork();
    const server = await network.listen("mem://b");
    const receiver = new ReliableLink({ localId: "b", peerId: "a", transport: server, log: quiet });
    const received: number[] = [];
    receiver.on("message", (message) => received.push(message.payload[0]));

    const firstClient = network.connect("mem://b");
    const first = new ReliableLink({ localId: "a", peerId: "b", transport: firstClient, epoch: 1, log: quiet });
    for (let value = 0; value < 10; value++) {
      await first.send({ payloadType: "STATE", payload: new Uint8Array([value]) });
    }
    await first.close();
    await firstClient.close();

    const restarted = new ReliableLink({
      localId: "a",
      peerId: "b",
      transport: network.connect("mem://b"),
      epoch: 2,
      log: quiet,
    });
    const results: SendResult[] = [];
    for (let value = 100; value < 105; value++) {
      results.push(await restarted.send({ payloadType: "STATE", payload: new Uint8Array([value]) }));
    }

    expect(results.map((r) => [r.ok, r.sequence])).toEqual([
      [true, 0],
      [true, 1],
      [true, 2],
      [true, 3],
      [true, 4],
    ]);
    expect(received).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 100, 101, 102, 103, 104]);
    expect(receiver.stats.peerRestarts).toBe(1);
    expect(receiver.stats.duplicates).toBe(0);
  });
});

describe("ReliableLink receive side", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("acknowledges duplicates without releasing them twice", () => {
    const transport = new FakeTransport();
    const link = new ReliableLink({ localId: "b", peerId: "a", transport, log: quiet });
    const received: number[] = [];
    link.on("message", (message) => received.push(message.sequence));

    transport.inject(frame(0));
    transport.inject(frame(0));
    transport.inject(frame(1));

    expect(received).toEqual([0, 1]);
    expect(link.stats.duplicates).toBe(1);
    expect(transport.sentMessages().map((m) => [m.payloadType, m.sequence])).toEqual([
      ["ACK", 0],
      ["ACK", 0],
      ["ACK", 1],
    ]);
  });

  it("holds out-of-order frames until the hole fills", () => {
    const transport = new FakeTransport();
    const link = new ReliableLink({ localId: "b", peerId: "a", transport, log: quiet });
    const received: number[] = [];
    link.on("message", (message) => received.push(message.sequence));

    transport.inject(frame(2));
    transport.inject(frame(1));
    expect(received).toEqual([]);

    transport.inject(frame(0));
    expect(received).toEqual([0, 1, 2]);
  });

  it("skips a hole after the reorder timeout and raises gap-skip", () => {
    vi.useFakeTimers();
    const transport = new FakeTransport();
    const link = new ReliableLink({ localId: "b", peerId: "a", transport, reorderTimeoutMs: 20, log: quiet });
    const received: number[] = [];
    const gaps: GapSkip[] = [];
    link.on("message", (message) => received.push(message.sequence));
    link.on("gap-skip", (gap) => gaps.push(gap));

    transport.inject(frame(0));
    transport.inject(frame(3));
    transport.inject(frame(4));
    vi.advanceTimersByTime(19);
    expect(received).toEqual([0]);

    vi.advanceTimersByTime(1);
    expect(gaps).toEqual([{ peerId: "a", from: 1, resumedAt: 3 }]);
    expect(received).toEqual([0, 3, 4]);

    // A late frame from the skipped range is a duplicate now.
    transport.inject(frame(1));
    expect(received).toEqual([0, 3, 4]);
    expect(link.stats.gapSkips).toBe(1);
  });

  it("times a hole from when it opened, not from the latest arrival", () => {
    vi.useFakeTimers();
    const transport = new FakeTransport();
    const link = new ReliableLink({ localId: "b", peerId: "a", transport, reorderTimeoutMs: 20, log: quiet });
    const received: number[] = [];
    link.on("message", (message) => received.push(message.sequence));

    transport.inject(frame(1));
    vi.advanceTimersByTime(15);
    transport.inject(frame(2));
    vi.advanceTimersByTime(5);

    expect(received).toEqual([1, 2]);
  });

  it("drops undecodable frames and raises decode-error", () => {
    const transport = new FakeTransport();
    const link = new ReliableLink({ localId: "b", peerId: "a", transport, log: quiet });
    const codes: string[] = [];
    link.on("decode-error", (err) => codes.push(err.code));
    const corrupted = frame(0);
    corrupted[corrupted.length - 1] ^= 0xff;

    transport.inject(corrupted);
    transport.inject(new Uint8Array([1, 2]));

    expect(codes).toEqual(["CHECKSUM_MISMATCH", "TRUNCATED"]);
    expect(link.stats.delivered).toBe(0);
    expect(transport.sent).toHaveLength(0);
  });

  it("resets the receive order when the sender's epoch changes", () => {
    const transport = new FakeTransport();
    const link = new ReliableLink({ localId: "b", peerId: "a", transport, log: quiet });
    const received: Array<[number, number]> = [];
    link.on("message", (message) => received.push([message.epoch, message.sequence]));

    transport.inject(frame(0));
    transport.inject(frame(1));
    transport.inject(frame(3));
    transport.inject(frame(0, { epoch: 2 }));
    transport.inject(frame(1, { epoch: 2 }));

    expect(received).toEqual([
      [1, 0],
      [1, 1],
      [2, 0],
      [2, 1],
    ]);
    expect(link.stats.peerRestarts).toBe(1);
  });

  it("acknowledges but never releases frames from a replaced epoch", () => {
    const transport = new FakeTransport();
    const link = new ReliableLink({ localId: "b", peerId: "a", transport, log: quiet });
    const received: Array<[number, number]> = [];
    link.on("message", (message) => received.push([message.epoch, message.sequence]));

    transport.inject(frame(0));
    transport.inject(frame(0, { epoch: 2 }));
    transport.inject(frame(1));

    expect(received).toEqual([
      [1, 0],
      [2, 0],
    ]);
    expect(link.stats.duplicates).toBe(1);
    expect(link.stats.peerRestarts).toBe(1);
    expect(transport.sentMessages().map((m) => [m.payloadType, m.epoch, m.sequence])).toEqual([
      ["ACK", 1, 0],
      ["ACK", 2, 0],
      ["ACK", 1, 1],
    ]);
  });

  it("ignores frames addressed to another pair", () => {
    const transport = new FakeTransport();
    const link = new ReliableLink({ localId: "b", peerId: "a", transport, log: quiet });

    transport.inject(frame(0, { sourceId: "c" }));
    transport.inject(frame(0, { destinationId: "z" }));

    expect(link.stats.delivered).toBe(0);
    expect(transport.sent).toHaveLength(0);
  });
});

describe("ReliableLink send side", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("retries with backoff and reports degraded after the last attempt", async () => {
    vi.useFakeTimers();
    const transport = new FakeTransport();
    const link = new ReliableLink({
      localId: "a",
      peerId: "b",
      transport,
      retry: { timeoutMs: 10, backoffFactor: 2, maxAttempts: 3 },
      log: quiet,
    });
    const degraded: LinkDegraded[] = [];
    link.on("degraded", (err) => degraded.push(err));
    let settled = false;

    const pending = link.send({ payloadType: "STATE", payload: new Uint8Array([9]) });
    void pending.then(() => {
      settled = true;
    });
    expect(transport.sent).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(10);
    expect(transport.sent).toHaveLength(2);
    await vi.advanceTimersByTimeAsync(20);
    expect(transport.sent).toHaveLength(3);
    await vi.advanceTimersByTimeAsync(39);
    expect(settled).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    const result = await pending;
    expect(result.ok).toBe(false);
    expect(result.attempts).toBe(3);
    expect(!result.ok && result.error).toBeInstanceOf(LinkDegraded);
    expect(degraded.map((err) => err.sequence)).toEqual([0]);
    expect(link.stats.degraded).toBe(1);
  });

  it("moves to the next queued message once the head is acknowledged", () => {
    vi.useFakeTimers();
    const transport = new FakeTransport();
    const link = new ReliableLink({ localId: "a", peerId: "b", transport, epoch: 1, log: quiet });

    void link.send({ payloadType: "STATE", payload: new Uint8Array([1]) });
    void link.send({ payloadType: "STATE", payload: new Uint8Array([2]) });
    expect(transport.sentMessages().map((m) => m.sequence)).toEqual([0]);
    expect(link.pendingSends).toBe(2);

    transport.inject(frame(0, { sourceId: "b", destinationId: "a", payloadType: "ACK", payload: new Uint8Array(0) }));
    expect(transport.sentMessages().map((m) => m.sequence)).toEqual([0, 1]);
    expect(link.pendingSends).toBe(1);
    expect(link.stats.acknowledged).toBe(1);
  });

  it("ignores an ACK that carries another session's epoch", () => {
    vi.useFakeTimers();
    const transport = new FakeTransport();
    const link = new ReliableLink({ localId: "a", peerId: "b", transport, epoch: 1, log: quiet });

    void link.send({ payloadType: "STATE", payload: new Uint8Array([1]) });
    transport.inject(
      frame(0, { sourceId: "b", destinationId: "a", epoch: 7, payloadType: "ACK", payload: new Uint8Array(0) }),
    );

    expect(link.stats.acknowledged).toBe(0);
    expect(link.pendingSends).toBe(1);
  });

  it("keeps one queued message per coalesced type while the head is unacknowledged", async () => {
    vi.useFakeTimers();
    const transport = new FakeTransport();
    const link = new ReliableLink({
      localId: "a",
      peerId: "b",
      transport,
      epoch: 1,
      coalesce: ["STATE"],
      log: quiet,
    });

    const sends = Array.from({ length: 500 }, (_, i) =>
      link.send({ payloadType: "STATE", payload: new Uint8Array([i & 0xff]) }),
    );
    void link.send({ payloadType: "MODEL_UPDATE", payload: new Uint8Array([42]) });

    expect(link.pendingSends).toBe(3);
    expect(link.stats.superseded).toBe(498);
    const replaced = await sends[1];
    expect(replaced.ok).toBe(false);
    expect(!replaced.ok && replaced.error).toBeInstanceOf(SendSuperseded);
    expect(replaced.sequence).toBe(1);

    transport.inject(frame(0, { sourceId: "b", destinationId: "a", payloadType: "ACK", payload: new Uint8Array(0) }));
    const next = transport.sentMessages()[1];
    expect([next.sequence, next.payload[0]]).toEqual([1, 499 & 0xff]);

    transport.inject(frame(1, { sourceId: "b", destinationId: "a", payloadType: "ACK", payload: new Uint8Array(0) }));
    expect((await sends[499]).ok).toBe(true);
    expect(transport.sentMessages().map((m) => [m.payloadType, m.sequence])).toEqual([
      ["STATE", 0],
      ["STATE", 1],
      ["MODEL_UPDATE", 2],
    ]);
    expect(link.pendingSends).toBe(1);
  });

  it("returns an unframeable message as a failed send without using a sequence", async () => {
    const transport = new FakeTransport();
    const link = new ReliableLink({ localId: "a", peerId: "b", transport, log: quiet });

    const result = await link.send({ payloadType: "MODEL_UPDATE", payload: new Uint8Array(MAX_PAYLOAD_SIZE + 1) });

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error).toBeInstanceOf(EncodeError);
    expect(!result.ok && result.error.code).toBe("PAYLOAD_TOO_LARGE");
    expect(link.pendingSends).toBe(0);
    expect(transport.sent).toHaveLength(0);

    void link.send({ payloadType: "STATE", payload: new Uint8Array([1]) });
    expect(transport.sentMessages().map((m) => m.sequence)).toEqual([0]);
  });

  it("rejects sends after close and ends open iterators", async () => {
    const transport = new FakeTransport();
    const link = new ReliableLink({ localId: "a", peerId: "b", transport, log: quiet });
    const iterator = link.receive();
    const waiting = iterator.next();

    await link.close();

    const result = await link.send({ payloadType: "STATE", payload: new Uint8Array([1]) });
    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.code).toBe("LINK_CLOSED");
    expect((await waiting).done).toBe(true);
  });
});
