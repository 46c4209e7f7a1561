// src/server.ts

import { EventEmitter } from "events";
import { MessageCatalog } from "./catalog";
import { MuxConfig, resolveConfig } from "./config";
import { DecodedMessage, EnvelopeCodec } from "./envelope";
import { PeerAlreadyAttachedError, PeerNotFoundError } from "./errors";
import { HealthReport, buildHealthReport } from "./health";
import { Logger, createLogger } from "./logger";
import { createDefaultCatalog } from "./messages";
import { PayloadHandler, PeerConnection } from "./peer_connection";
import { FrameLink } from "./transport";
import { UpdateCategory } from "./update_interest";

export interface MuxServerOptions {
  /** Payload kinds to decode. Default: createDefaultCatalog() */
  catalog?: MessageCatalog;
  config?: Partial<MuxConfig>;
  /** Clock used for transaction expiry. Default: Date.now */
  now?: () => number;
}

/**
 * Serves many peers at once. Each attached link gets its own
 * PeerConnection; nothing is shared between peers except the catalog.
 *
 * Events:
 * - 'peer_attached': `(peerId)`
 * - 'peer_detached': `(peerId)`
 *
 * @example
 * ```typescript
 * const server = new MuxServer({ config: { reassemblyTtlMs: 10_000 } });
 * server.onPayload((peerId, message) => {
 *   console.log(`${peerId} sent tag ${message.tag}`);
 * });
 * server.start();
 * server.attach(link);
 * ```
 */
export class MuxServer extends EventEmitter {
  readonly codec: EnvelopeCodec;
  readonly config: MuxConfig;

  private readonly now: () => number;
  private readonly log: Logger;
  private readonly connections = new Map<string, PeerConnection>();
  private readonly handlers: PayloadHandler[] = [];
  private readonly startTime = Date.now();
  private sweepTimer?: NodeJS.Timeout;

  constructor(options: MuxServerOptions = {}) {
    super();
    this.codec = new EnvelopeCodec(options.catalog ?? createDefaultCatalog());
    this.config = resolveConfig(options.config);
    this.now = options.now ?? Date.now;
    this.log = createLogger("MuxServer");
  }

  get isRunning(): boolean {
    return this.sweepTimer !== undefined;
  }

  /**
   * Registers a delivery handler. Handlers run in registration order, one
   * message at a time per peer.
   */
  onPayload(handler: PayloadHandler): void {
    this.handlers.push(handler);
  }

  /**
   * Starts the periodic expiry sweep.
   */
  start(): void {
    if (this.sweepTimer) {
      this.log.warn("MuxServer already running");
      return;
    }
    this.sweepTimer = setInterval(() => {
      this.sweep();
    }, this.config.sweepIntervalMs);
    this.sweepTimer.unref();
    this.log.info("Started", {
      reassemblyTtlMs: this.config.reassemblyTtlMs,
      sweepIntervalMs: this.config.sweepIntervalMs,
    });
  }

  /**
   * Stops the sweep and closes every connection.
   */
  async stop(): Promise<void> {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
    await Promise.all(
      Array.from(this.connections.keys()).map((peerId) => this.detach(peerId)),
    );
    this.log.info("Stopped");
  }

  /**
   * Creates the connection for a newly connected peer.
   */
  attach(link: FrameLink): PeerConnection {
    if (this.connections.has(link.peerId)) {
      throw new PeerAlreadyAttachedError(link.peerId);
    }

    const connection = new PeerConnection(link, {
      codec: this.codec,
      config: this.config,
      now: this.now,
      onPayload: (peerId, message) => this.deliver(peerId, message),
    });
    connection.once("closed", () => {
      if (this.connections.get(link.peerId) === connection) {
        this.connections.delete(link.peerId);
        this.log.info("Peer detached", { peerId: link.peerId });
        this.emit("peer_detached", link.peerId);
      }
    });

    this.connections.set(link.peerId, connection);
    this.log.info("Peer attached", { peerId: link.peerId });
    this.emit("peer_attached", link.peerId);
    return connection;
  }

  /**
   * Closes a peer's connection and discards its state.
   */
  async detach(peerId: string, reason = "detached by server"): Promise<void> {
    const connection = this.connections.get(peerId);
    if (!connection) {
      throw new PeerNotFoundError(peerId);
    }
    await connection.close(reason);
  }

  getConnection(peerId: string): PeerConnection | undefined {
    return this.connections.get(peerId);
  }

  peers(): string[] {
    return Array.from(this.connections.keys());
  }

  /**
   * Whether a peer asked for updates of a category. Unknown peers are not
   * interested in anything.
   */
  isInterested(peerId: string, category: UpdateCategory): boolean {
    return this.connections.get(peerId)?.interests.isInterested(category) ?? false;
  }

  /**
   * Sends a push update to every interested peer. Resolves with the peers
   * it was sent to; a peer whose send fails is logged and left out.
   */
  async notify(
    category: UpdateCategory,
    tag: number,
    payload: unknown,
  ): Promise<string[]> {
    const interested = Array.from(this.connections.values()).filter(
      (connection) => connection.interests.isInterested(category),
    );
    const results = await Promise.allSettled(
      interested.map((connection) => connection.notify(category, tag, payload)),
    );

    const notified: string[] = [];
    results.forEach((result, index) => {
      const peerId = interested[index].peerId;
      if (result.status === "fulfilled") {
        notified.push(peerId);
        return;
      }
      const error =
        result.reason instanceof Error ? result.reason : new Error(String(result.reason));
      this.log.warn("Failed to send update", { peerId, category, tag }, error);
    });
    return notified;
  }

  /**
   * Aborts idle transactions on every connection. Returns how many were
   * aborted.
   */
  sweep(now = this.now()): number {
    let expired = 0;
    for (const connection of this.connections.values()) {
      expired += connection.expire(now).length;
    }
    if (expired > 0) {
      this.log.info("Expired idle transactions", { expired });
    }
    return expired;
  }

  getHealth(): HealthReport {
    return buildHealthReport(
      Array.from(this.connections.entries()),
      this.startTime,
    );
  }

  private async deliver(peerId: string, message: DecodedMessage): Promise<void> {
    for (const handler of this.handlers) {
      await handler(peerId, message);
    }
  }
}
