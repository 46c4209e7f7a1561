// src/transport.ts

import type { TransactionFragment } from "./reassembler";

/**
 * One deframed, decrypted message as handed over by the transport. The
 * transport decides whether it is a whole envelope or a transaction
 * fragment it has already unpacked.
 */
export type Frame =
  | { kind: "envelope"; data: Uint8Array }
  | { kind: "fragment"; fragment: TransactionFragment };

/**
 * The handler for an incoming frame.
 */
export type FrameHandler = (frame: Frame) => void;

/**
 * The handler called once when the link goes down.
 */
export type CloseHandler = () => void;

/**
 * A connection to a single peer, as seen from above the transport.
 *
 * Framing, encryption and sockets live below this interface; the
 * multiplexer only exchanges frames through it.
 */
export interface FrameLink {
  /**
   * Identifier of the remote peer.
   */
  readonly peerId: string;

  /**
   * Sends a frame to the peer.
   * @param frame The frame to send.
   */
  send(frame: Frame): Promise<void>;

  /**
   * Sets the handler for frames arriving from the peer, in arrival order.
   * @param handler The handler for incoming frames.
   */
  onFrame(handler: FrameHandler): void;

  /**
   * Sets the handler called when the link closes, from either side.
   * @param handler The handler for link teardown.
   */
  onClose(handler: CloseHandler): void;

  /**
   * Closes the link.
   */
  close(): Promise<void>;
}
