import { randomInt } from "node:crypto";
import { EventEmitter } from "node:events";
import { type DecodeError, EncodeError, LinkClosed, LinkDegraded, SendSuperseded } from "./errors.js";
import type { LinkTransport } from "./link-transport.js";
import { decodeMessage, encodeMessage } from "./wire-codec.js";
import type { Message, MessageDraft, PayloadType, PipelineLogger } from "./types.js";

export type RetryPolicy = {
  /** First retransmit delay. Default: 500. */
  timeoutMs: number;
  /** Multiplier applied to the delay after each attempt. Default: 2. */
  backoffFactor: number;
  /** Transmissions per sequence before giving up. Default: 5. */
  maxAttempts: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  timeoutMs: 500,
  backoffFactor: 2,
  maxAttempts: 5,
};

export type ReliableLinkOptions = {
  localId: string;
  peerId: string;
  transport: LinkTransport;
  retry?: Partial<RetryPolicy>;
  /** How long a hole in the sequence may block release. Default: 2000. */
  reorderTimeoutMs?: number;
  /** Size of the recent (sourceId, sequence) window used for duplicate suppression. Default: 1024. */
  dedupWindow?: number;
  /**
   * Payload types where a newer send replaces one still waiting in the queue,
   * so at most one of each is queued behind the in-flight message. Default: none.
   */
  coalesce?: ReadonlyArray<PayloadType>;
  /** Session id stamped on every outgoing frame. Default: random u32. */
  epoch?: number;
  now?: () => number;
  log?: PipelineLogger;
};

export type SendResult =
  | { ok: true; sequence: number; attempts: number }
  | {
      ok: false;
      sequence: number;
      attempts: number;
      error: LinkDegraded | LinkClosed | SendSuperseded | EncodeError;
    };

export type GapSkip = {
  peerId: string;
  /** First sequence treated as lost. */
  from: number;
  /** Sequence release resumed at. */
  resumedAt: number;
};

export type ReliableLinkEvents = {
  message: [message: Message];
  degraded: [error: LinkDegraded];
  "gap-skip": [gap: GapSkip];
  "decode-error": [error: DecodeError];
};

type PendingSend = {
  message: Message;
  frame: Uint8Array;
  attempts: number;
  resolve: (result: SendResult) => void;
};

export type ReliableLinkStats = {
  transmissions: number;
  acknowledged: number;
  degraded: number;
  delivered: number;
  duplicates: number;
  acksSent: number;
  gapSkips: number;
  decodeErrors: number;
  superseded: number;
  peerRestarts: number;
};

const RETIRED_EPOCHS = 8;

/**
 * Point-to-point channel between two adjacent nodes: at-least-once delivery on
 * the wire, exactly-once in-order release to the node.
 *
 * The send side is stop-and-wait: the head of the queue is retransmitted with
 * exponential backoff until its ACK arrives or the attempt budget runs out.
 * The receive side ACKs every data frame it sees, suppresses duplicates and
 * releases frames strictly in sequence order. Sequences restart at 0 for each
 * sender epoch; a frame carrying a new epoch resets the receive order, and
 * frames from an epoch already replaced are acknowledged but not released.
 */
export class ReliableLink extends EventEmitter<ReliableLinkEvents> {
  readonly localId: string;
  readonly peerId: string;
  readonly epoch: number;
  readonly stats: ReliableLinkStats = {
    transmissions: 0,
    acknowledged: 0,
    degraded: 0,
    delivered: 0,
    duplicates: 0,
    acksSent: 0,
    gapSkips: 0,
    decodeErrors: 0,
    superseded: 0,
    peerRestarts: 0,
  };

  private readonly transport: LinkTransport;
  private readonly retry: RetryPolicy;
  private readonly reorderTimeoutMs: number;
  private readonly dedupWindow: number;
  private readonly coalesce: ReadonlySet<PayloadType>;
  private readonly now: () => number;
  private readonly log?: PipelineLogger;
  private readonly unsubscribe: () => void;

  // send side
  private nextSendSequence = 0;
  private readonly sendQueue: PendingSend[] = [];
  private inFlight: PendingSend | null = null;
  private retryTimer: ReturnType<typeof setTimeout> | null = null;
  private idleWaiters: Array<() => void> = [];
  private closing = false;

  // receive side
  private peerEpoch: number | null = null;
  private readonly retiredEpochs: number[] = [];
  private nextExpected = 0;
  private readonly reorderBuffer = new Map<number, Message>();
  private readonly recent = new Set<string>();
  private reorderTimer: ReturnType<typeof setTimeout> | null = null;
  private readonly inbox: Message[] = [];
  /** The inbox only fills once someone has asked for an iterator; event listeners need no buffer. */
  private inboxEnabled = false;
  private readonly waiters: Array<(result: IteratorResult<Message>) => void> = [];
  private closed = false;

  constructor(opts: ReliableLinkOptions) {
    super();
    this.localId = opts.localId;
    this.peerId = opts.peerId;
    this.transport = opts.transport;
    this.retry = { ...DEFAULT_RETRY_POLICY, ...opts.retry };
    this.reorderTimeoutMs = opts.reorderTimeoutMs ?? 2000;
    this.dedupWindow = Math.max(1, opts.dedupWindow ?? 1024);
    this.coalesce = new Set(opts.coalesce ?? []);
    this.epoch = opts.epoch ?? randomInt(0, 0x1_0000_0000);
    this.now = opts.now ?? Date.now;
    this.log = opts.log;
    this.unsubscribe = this.transport.onPacket((packet) => this.handlePacket(packet));
  }

  /**
   * Queue a message for the peer. Resolves once the peer has acknowledged it,
   * the retry budget is exhausted, a newer message of a coalesced type took its
   * place, or the message cannot be framed; never rejects.
   */
  send(draft: MessageDraft): Promise<SendResult> {
    if (this.closing) {
      return Promise.resolve<SendResult>({
        ok: false,
        sequence: this.nextSendSequence,
        attempts: 0,
        error: new LinkClosed(this.peerId),
      });
    }
    const queued = this.coalesce.has(draft.payloadType)
      ? this.sendQueue.find((pending) => pending.message.payloadType === draft.payloadType)
      : undefined;
    const sequence = queued ? queued.message.sequence : this.nextSendSequence;
    const message: Message = {
      sourceId: this.localId,
      destinationId: this.peerId,
      epoch: this.epoch,
      sequence,
      payloadType: draft.payloadType,
      payload: draft.payload,
      createdAtMs: this.now(),
    };
    let frame: Uint8Array;
    try {
      frame = encodeMessage(message);
    } catch (err) {
      if (!(err instanceof EncodeError)) {
        throw err;
      }
      this.log?.warn(`link: cannot send ${draft.payloadType} to ${this.peerId}: ${err.message}`);
      return Promise.resolve<SendResult>({ ok: false, sequence, attempts: 0, error: err });
    }

    return new Promise<SendResult>((resolve) => {
      if (queued) {
        // The replacement keeps the queued sequence and position.
        const superseded = queued.resolve;
        queued.message = message;
        queued.frame = frame;
        queued.resolve = resolve;
        this.stats.superseded += 1;
        superseded({ ok: false, sequence, attempts: 0, error: new SendSuperseded(this.peerId, sequence) });
        return;
      }
      this.nextSendSequence += 1;
      this.sendQueue.push({ message, frame, attempts: 0, resolve });
      this.pump();
    });
  }

  /** Messages from the peer, in sequence order. Each call returns a fresh iterator over the same inbox. */
  receive(): AsyncIterableIterator<Message> {
    this.inboxEnabled = true;
    const iterator: AsyncIterableIterator<Message> = {
      next: () => {
        const queued = this.inbox.shift();
        if (queued) {
          return Promise.resolve<IteratorResult<Message>>({ value: queued, done: false });
        }
        if (this.closed) {
          return Promise.resolve<IteratorResult<Message>>({ value: undefined, done: true });
        }
        return new Promise<IteratorResult<Message>>((resolve) => {
          this.waiters.push(resolve);
        });
      },
      return: () => Promise.resolve<IteratorResult<Message>>({ value: undefined, done: true }),
      [Symbol.asyncIterator]: () => iterator,
    };
    return iterator;
  }

  get pendingSends(): number {
    return this.sendQueue.length + (this.inFlight ? 1 : 0);
  }

  /** Resolves when every accepted send has been acknowledged or exhausted. */
  async drain(): Promise<void> {
    if (this.pendingSends === 0) {
      return;
    }
    await new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stop accepting sends, let accepted sends finish within their retry budget,
   * then detach from the transport.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closing = true;
    await this.drain();
    this.closed = true;
    this.unsubscribe();
    if (this.reorderTimer) {
      clearTimeout(this.reorderTimer);
      this.reorderTimer = null;
    }
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  // ── send side ────────────────────────────────────────────

  private pump(): void {
    if (this.inFlight) {
      return;
    }
    const next = this.sendQueue.shift();
    if (!next) {
      for (const resolve of this.idleWaiters.splice(0)) {
        resolve();
      }
      return;
    }
    this.inFlight = next;
    this.transmit(next);
  }

  private transmit(pending: PendingSend): void {
    pending.attempts += 1;
    this.stats.transmissions += 1;
    this.transport.send(pending.frame);
    const delay = this.retry.timeoutMs * this.retry.backoffFactor ** (pending.attempts - 1);
    this.retryTimer = setTimeout(() => this.handleRetryTimeout(pending), delay);
  }

  private handleRetryTimeout(pending: PendingSend): void {
    this.retryTimer = null;
    if (this.inFlight !== pending) {
      return;
    }
    if (pending.attempts < this.retry.maxAttempts) {
      this.transmit(pending);
      return;
    }
    const error = new LinkDegraded({
      peerId: this.peerId,
      sequence: pending.message.sequence,
      attempts: pending.attempts,
    });
    this.stats.degraded += 1;
    this.log?.warn(`link: ${error.message}`);
    this.finishInFlight({
      ok: false,
      sequence: pending.message.sequence,
      attempts: pending.attempts,
      error,
    });
    this.emit("degraded", error);
  }

  private handleAck(ack: Message): void {
    const pending = this.inFlight;
    if (!pending || ack.epoch !== this.epoch || ack.sequence !== pending.message.sequence) {
      // Late ACK for a sequence already settled, or for an earlier session.
      return;
    }
    this.stats.acknowledged += 1;
    this.finishInFlight({ ok: true, sequence: ack.sequence, attempts: pending.attempts });
  }

  private finishInFlight(result: SendResult): void {
    const pending = this.inFlight;
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
    this.inFlight = null;
    pending?.resolve(result);
    this.pump();
  }

  // ── receive side ─────────────────────────────────────────

  private handlePacket(packet: Uint8Array): void {
    if (this.closed) {
      return;
    }
    const decoded = decodeMessage(packet);
    if (!decoded.ok) {
      this.stats.decodeErrors += 1;
      this.log?.warn(`link: dropped frame from ${this.peerId}: ${decoded.error.message}`);
      this.emit("decode-error", decoded.error);
      return;
    }
    const message = decoded.message;
    // Transports may be shared by several links; only frames on this pair belong here.
    if (message.sourceId !== this.peerId || message.destinationId !== this.localId) {
      return;
    }
    if (message.payloadType === "ACK") {
      this.handleAck(message);
      return;
    }
    this.sendAck(message);
    if (!this.admitEpoch(message.epoch)) {
      this.stats.duplicates += 1;
      return;
    }
    this.accept(message);
  }

  private sendAck(message: Message): void {
    this.stats.acksSent += 1;
    this.transport.send(
      encodeMessage({
        sourceId: this.localId,
        destinationId: this.peerId,
        epoch: message.epoch,
        sequence: message.sequence,
        payloadType: "ACK",
        payload: new Uint8Array(0),
        createdAtMs: this.now(),
      }),
    );
  }

  /** False for frames from a session the peer has already replaced. */
  private admitEpoch(epoch: number): boolean {
    if (this.peerEpoch === epoch) {
      return true;
    }
    if (this.retiredEpochs.includes(epoch)) {
      return false;
    }
    if (this.peerEpoch !== null) {
      this.retiredEpochs.push(this.peerEpoch);
      if (this.retiredEpochs.length > RETIRED_EPOCHS) {
        this.retiredEpochs.shift();
      }
      this.stats.peerRestarts += 1;
      this.log?.info(
        `link: ${this.peerId} restarted (epoch ${this.peerEpoch} -> ${epoch}); dropping ${this.reorderBuffer.size} held frames`,
      );
      this.nextExpected = 0;
      this.reorderBuffer.clear();
      this.recent.clear();
      if (this.reorderTimer) {
        clearTimeout(this.reorderTimer);
        this.reorderTimer = null;
      }
    }
    this.peerEpoch = epoch;
    return true;
  }

  private recentKey(message: Message): string {
    return `${message.sourceId}#${message.sequence}`;
  }

  private accept(message: Message): void {
    if (
      message.sequence < this.nextExpected ||
      this.reorderBuffer.has(message.sequence) ||
      this.recent.has(this.recentKey(message))
    ) {
      this.stats.duplicates += 1;
      return;
    }
    this.reorderBuffer.set(message.sequence, message);
    this.release();
  }

  private release(): void {
    const start = this.nextExpected;
    let next = this.reorderBuffer.get(this.nextExpected);
    while (next) {
      this.reorderBuffer.delete(this.nextExpected);
      this.nextExpected += 1;
      this.deliver(next);
      next = this.reorderBuffer.get(this.nextExpected);
    }

    // The reorder clock runs from when the current hole opened.
    const progressed = this.nextExpected !== start;
    if (this.reorderTimer && (progressed || this.reorderBuffer.size === 0)) {
      clearTimeout(this.reorderTimer);
      this.reorderTimer = null;
    }
    if (this.reorderBuffer.size > 0 && !this.reorderTimer) {
      this.reorderTimer = setTimeout(() => this.skipGap(), this.reorderTimeoutMs);
    }
  }

  private skipGap(): void {
    this.reorderTimer = null;
    if (this.reorderBuffer.size === 0) {
      return;
    }
    const resumedAt = Math.min(...this.reorderBuffer.keys());
    const gap: GapSkip = { peerId: this.peerId, from: this.nextExpected, resumedAt };
    this.stats.gapSkips += 1;
    this.log?.warn(
      `link: gap from ${this.peerId} seq ${gap.from}..${resumedAt - 1} treated as lost`,
    );
    this.nextExpected = resumedAt;
    this.emit("gap-skip", gap);
    this.release();
  }

  private deliver(message: Message): void {
    this.recent.add(this.recentKey(message));
    if (this.recent.size > this.dedupWindow) {
      const oldest = this.recent.values().next();
      if (!oldest.done) {
        this.recent.delete(oldest.value);
      }
    }
    this.stats.delivered += 1;
    this.emit("message", message);
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: message, done: false });
    } else if (this.inboxEnabled) {
      this.inbox.push(message);
    }
  }
}
