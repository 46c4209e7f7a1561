// src/in_memory_transport.ts

import { EventEmitter } from "events";
import { ConnectionClosedError } from "./errors";
import { CloseHandler, Frame, FrameHandler, FrameLink } from "./transport";

/**
 * An in-memory implementation of FrameLink, useful for testing and for
 * wiring a client and a server inside one process. Each end delivers what
 * it sends to the other end's frame handler through an EventEmitter.
 *
 * Create connected ends with `InMemoryLink.pair()`.
 */
export class InMemoryLink implements FrameLink {
  private readonly bus = new EventEmitter();
  private remote?: InMemoryLink;
  private closed = false;

  /** Frames this end has sent, in order. */
  readonly sent: Frame[] = [];

  constructor(readonly peerId: string) {}

  /**
   * Creates two connected ends. `a.peerId` names the peer `a` talks to.
   */
  static pair(aPeerId: string, bPeerId: string): [InMemoryLink, InMemoryLink] {
    const a = new InMemoryLink(aPeerId);
    const b = new InMemoryLink(bPeerId);
    a.remote = b;
    b.remote = a;
    return [a, b];
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async send(frame: Frame): Promise<void> {
    if (this.closed) {
      throw new ConnectionClosedError(this.peerId);
    }
    this.sent.push(frame);
    this.remote?.deliver(frame);
  }

  /**
   * Injects a frame as if the peer had sent it.
   */
  deliver(frame: Frame): void {
    if (!this.closed) {
      this.bus.emit("frame", frame);
    }
  }

  onFrame(handler: FrameHandler): void {
    this.bus.on("frame", handler);
  }

  onClose(handler: CloseHandler): void {
    this.bus.once("close", handler);
  }

  async close(): Promise<void> {
    this.shutdown();
    this.remote?.shutdown();
  }

  private shutdown(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.bus.emit("close");
    this.bus.removeAllListeners();
  }
}
