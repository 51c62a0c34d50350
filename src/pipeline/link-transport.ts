import { WebSocket, WebSocketServer } from "ws";
import { rawDataToBytes } from "../infra/ws.js";
import { createRng, type Rng } from "./rng.js";
import type { PipelineLogger } from "./types.js";

/**
 * Best-effort datagram endpoint. Packets may be lost, duplicated or reordered;
 * ReliableLink provides ordering and delivery on top.
 */
export interface LinkTransport {
  send(packet: Uint8Array): void;
  /** Subscribe to inbound packets. Returns an unsubscribe function. */
  onPacket(handler: (packet: Uint8Array) => void): () => void;
  close(): Promise<void>;
}

export interface LinkTransportFactory {
  /** Accept upstream links on a listen address. */
  listen(address: string): Promise<LinkTransport>;
  /** Open a link to a downstream listen address. */
  connect(address: string): LinkTransport;
}

class PacketFanout {
  private handlers = new Set<(packet: Uint8Array) => void>();

  add(handler: (packet: Uint8Array) => void): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  emit(packet: Uint8Array): void {
    for (const handler of this.handlers) {
      handler(packet);
    }
  }

  clear(): void {
    this.handlers.clear();
  }
}

// ── in-process network ──────────────────────────────────────

export type MemoryNetworkOptions = {
  /** Probability that a packet is dropped (0..1). */
  lossRate?: number;
  /** Probability that a delivered packet is delivered twice. */
  duplicateRate?: number;
  /** Each delivery is delayed by a random 0..maxDelayMs, which reorders packets. */
  maxDelayMs?: number;
  seed?: number;
};

class MemoryEndpoint implements LinkTransport {
  private readonly fanout = new PacketFanout();
  /** Endpoints that packets from this endpoint are delivered to. */
  readonly peers = new Set<MemoryEndpoint>();
  private closed = false;

  /**
   * @param network owning network
   * @param targetAddress listen address to attach to on first send (client side only)
   */
  constructor(
    private readonly network: MemoryNetwork,
    private readonly targetAddress?: string,
  ) {}

  send(packet: Uint8Array): void {
    if (this.closed) {
      return;
    }
    if (this.targetAddress && this.peers.size === 0) {
      const server = this.network.lookup(this.targetAddress);
      if (server) {
        this.peers.add(server);
        server.peers.add(this);
      }
    }
    for (const peer of this.peers) {
      this.network.deliver(peer, packet);
    }
  }

  receive(packet: Uint8Array): void {
    if (!this.closed) {
      this.fanout.emit(packet);
    }
  }

  onPacket(handler: (packet: Uint8Array) => void): () => void {
    return this.fanout.add(handler);
  }

  async close(): Promise<void> {
    this.closed = true;
    this.fanout.clear();
    for (const peer of this.peers) {
      peer.peers.delete(this);
    }
    this.peers.clear();
  }
}

/**
 * Lossy in-process network keyed by listen address. Used by tests and the
 * `simulate` command in place of WebSocket links.
 */
export class MemoryNetwork implements LinkTransportFactory {
  private readonly listeners = new Map<string, MemoryEndpoint>();
  private readonly rng: Rng;
  private readonly timers = new Set<ReturnType<typeof setTimeout>>();
  private readonly lossRate: number;
  private readonly duplicateRate: number;
  private readonly maxDelayMs: number;
  readonly stats = { sent: 0, dropped: 0, duplicated: 0 };

  constructor(opts: MemoryNetworkOptions = {}) {
    this.lossRate = opts.lossRate ?? 0;
    this.duplicateRate = opts.duplicateRate ?? 0;
    this.maxDelayMs = opts.maxDelayMs ?? 0;
    this.rng = createRng(opts.seed ?? 1);
  }

  async listen(address: string): Promise<LinkTransport> {
    if (this.listeners.has(address)) {
      throw new Error(`address already in use: ${address}`);
    }
    const endpoint = new MemoryEndpoint(this);
    this.listeners.set(address, endpoint);
    return {
      send: (packet) => endpoint.send(packet),
      onPacket: (handler) => endpoint.onPacket(handler),
      close: async () => {
        this.listeners.delete(address);
        await endpoint.close();
      },
    };
  }

  connect(address: string): LinkTransport {
    return new MemoryEndpoint(this, address);
  }

  lookup(address: string): MemoryEndpoint | undefined {
    return this.listeners.get(address);
  }

  deliver(target: MemoryEndpoint, packet: Uint8Array): void {
    this.stats.sent += 1;
    if (this.rng() < this.lossRate) {
      this.stats.dropped += 1;
      return;
    }
    const copies = this.rng() < this.duplicateRate ? 2 : 1;
    if (copies > 1) {
      this.stats.duplicated += 1;
    }
    for (let i = 0; i < copies; i++) {
      const bytes = packet.slice();
      const delayMs = this.maxDelayMs > 0 ? this.rng() * this.maxDelayMs : 0;
      const timer = setTimeout(() => {
        this.timers.delete(timer);
        target.receive(bytes);
      }, delayMs);
      this.timers.add(timer);
    }
  }

  /** Cancel packets still in flight. */
  shutdown(): void {
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }
}

// ── WebSocket transport ─────────────────────────────────────

type WsTransportOptions = {
  log?: PipelineLogger;
};

export function parseListenAddress(address: string): { host: string; port: number } {
  const url = new URL(address);
  if (url.protocol !== "ws:" && url.protocol !== "wss:") {
    throw new Error(`unsupported link address ${address} (expected ws://host:port)`);
  }
  const port = Number(url.port);
  if (url.port === "" || !Number.isInteger(port)) {
    throw new Error(`link address ${address} has no port`);
  }
  return { host: url.hostname, port };
}

/** Accepts upstream connections; outbound packets go to every open socket. */
export class WsServerTransport implements LinkTransport {
  private readonly fanout = new PacketFanout();
  private readonly sockets = new Set<WebSocket>();

  private constructor(
    private readonly wss: WebSocketServer,
    private readonly log?: PipelineLogger,
  ) {
    wss.on("connection", (socket) => {
      this.sockets.add(socket);
      socket.on("message", (raw) => {
        this.fanout.emit(rawDataToBytes(raw));
      });
      socket.on("close", () => {
        this.sockets.delete(socket);
      });
      socket.on("error", (err) => {
        this.log?.warn(`link: inbound socket error: ${String(err)}`);
      });
    });
  }

  static async listen(address: string, opts: WsTransportOptions = {}): Promise<WsServerTransport> {
    const { host, port } = parseListenAddress(address);
    const wss = await new Promise<WebSocketServer>((resolve, reject) => {
      const server = new WebSocketServer({ host, port, maxPayload: 1024 * 1024 });
      const onError = (err: Error) => {
        server.off("listening", onListening);
        reject(err);
      };
      const onListening = () => {
        server.off("error", onError);
        resolve(server);
      };
      server.once("error", onError);
      server.once("listening", onListening);
    });
    return new WsServerTransport(wss, opts.log);
  }

  /** Bound port (useful when listening on port 0). */
  get port(): number {
    const addr = this.wss.address();
    return typeof addr === "string" ? 0 : addr.port;
  }

  send(packet: Uint8Array): void {
    for (const socket of this.sockets) {
      if (socket.readyState === WebSocket.OPEN) {
        socket.send(packet);
      }
    }
  }

  onPacket(handler: (packet: Uint8Array) => void): () => void {
    return this.fanout.add(handler);
  }

  async close(): Promise<void> {
    this.fanout.clear();
    for (const socket of this.sockets) {
      socket.terminate();
    }
    this.sockets.clear();
    await new Promise<void>((resolve) => {
      this.wss.close(() => resolve());
    });
  }
}

/**
 * Connects to a downstream listen address and reconnects with exponential
 * backoff. Packets sent while disconnected are dropped; the reliable link retries.
 */
export class WsClientTransport implements LinkTransport {
  private ws: WebSocket | null = null;
  private readonly fanout = new PacketFanout();
  private backoffMs = 500;
  private closed = false;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    private readonly url: string,
    private readonly opts: WsTransportOptions = {},
  ) {
    this.start();
  }

  private start(): void {
    if (this.closed) {
      return;
    }
    const ws = new WebSocket(this.url, { maxPayload: 1024 * 1024 });
    this.ws = ws;
    ws.on("open", () => {
      this.backoffMs = 500;
      this.opts.log?.info(`link: connected to ${this.url}`);
    });
    ws.on("message", (raw) => {
      this.fanout.emit(rawDataToBytes(raw));
    });
    ws.on("close", () => {
      if (this.ws === ws) {
        this.ws = null;
      }
      this.scheduleReconnect();
    });
    ws.on("error", (err) => {
      this.opts.log?.warn(`link: ${this.url} socket error: ${String(err)}`);
    });
  }

  private scheduleReconnect(): void {
    if (this.closed || this.reconnectTimer) {
      return;
    }
    const delay = this.backoffMs;
    this.backoffMs = Math.min(this.backoffMs * 2, 30_000);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.start();
    }, delay);
    this.reconnectTimer.unref();
  }

  get connected(): boolean {
    return this.ws?.readyState === WebSocket.OPEN;
  }

  send(packet: Uint8Array): void {
    if (this.ws?.readyState === WebSocket.OPEN) {
      this.ws.send(packet);
    }
  }

  onPacket(handler: (packet: Uint8Array) => void): () => void {
    return this.fanout.add(handler);
  }

  async close(): Promise<void> {
    this.closed = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.fanout.clear();
    const ws = this.ws;
    this.ws = null;
    if (ws && ws.readyState !== WebSocket.CLOSED) {
      await new Promise<void>((resolve) => {
        ws.once("close", () => resolve());
        ws.terminate();
      });
    }
  }
}

export function createWsTransportFactory(opts: WsTransportOptions = {}): LinkTransportFactory {
  return {
    listen: async (address) => await WsServerTransport.listen(address, opts),
    connect: (address) => new WsClientTransport(address, opts),
  };
}
