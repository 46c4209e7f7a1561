// src/peer_connection.ts

import { EventEmitter } from "events";
import { v4 as uuidv4 } from "uuid";
import { MuxConfig, resolveConfig } from "./config";
import { DeviceSetNegotiator } from "./device_set";
import { DecodedMessage, EnvelopeCodec, isPayload } from "./envelope";
import { ConnectionClosedError, ProtocolViolationError } from "./errors";
import { ComponentHealth } from "./health";
import { Logger, createLogger, formatBytes } from "./logger";
import {
  CLIENT_UPDATES_CONFIG,
  MODIFY_OUTPUT_CONTEXT_REQUEST,
  TRANSACTION,
  TransactionPacket,
} from "./messages";
import {
  TransactionFragment,
  TransactionKey,
  TransactionReassembler,
  describeKey,
  splitTransaction,
} from "./reassembler";
import { Frame, FrameLink } from "./transport";
import { UpdateCategory, UpdateInterestTracker } from "./update_interest";

/**
 * Called once per fully decoded top-level message from a peer, whether it
 * arrived whole or through a transaction.
 */
export type PayloadHandler = (
  peerId: string,
  message: DecodedMessage,
) => void | Promise<void>;

export interface PeerConnectionOptions {
  codec: EnvelopeCodec;
  config?: Partial<MuxConfig>;
  onPayload?: PayloadHandler;
  now?: () => number;
}

export interface SendTransactionOptions {
  /** Transaction identifier. Default: a random UUID */
  transactionId?: string;
  userData?: Uint8Array;
  /** Envelope correlation identifier of the wrapped payload. */
  identifier?: string;
  /** Bytes per fragment. Default: config.transactionChunkSize */
  chunkSize?: number;
}

function packetToFragment(packet: TransactionPacket): TransactionFragment {
  return {
    key: packet.key,
    data: packet.packetData,
    totalLength: packet.totalLength,
    writePosition: packet.totalWritePosition,
  };
}

/**
 * Everything the multiplexer knows about one peer: its in-flight
 * transactions, its update interests and its output devices.
 *
 * Frames are queued in a mailbox and processed one at a time in arrival
 * order; the delivery handler is awaited before the next frame starts.
 * Protocol violations reject the offending message or transaction only.
 *
 * Events:
 * - 'payload': `(message)` for every delivered message
 * - 'transaction_complete': `(key, data)` when a transaction is assembled
 * - 'interests_changed': `(interests)` after a client updates config
 * - 'devices_changed': `(result)` after an output context request changed a view
 * - 'violation': `(error)` for each protocol violation
 * - 'closed': `()` once, on teardown
 */
export class PeerConnection extends EventEmitter {
  readonly peerId: string;
  readonly config: MuxConfig;
  readonly reassembler: TransactionReassembler;
  readonly interests = new UpdateInterestTracker();
  readonly devices = new DeviceSetNegotiator();

  private readonly codec: EnvelopeCodec;
  private readonly onPayload?: PayloadHandler;
  private readonly log: Logger;
  private readonly mailbox: Frame[] = [];
  private draining?: Promise<void>;
  private closed = false;
  private violations = 0;

  constructor(
    private readonly link: FrameLink,
    options: PeerConnectionOptions,
  ) {
    super();
    this.peerId = link.peerId;
    this.codec = options.codec;
    this.config = resolveConfig(options.config);
    this.onPayload = options.onPayload;
    this.log = createLogger("PeerConnection", this.peerId);
    this.reassembler = new TransactionReassembler(
      {
        maxTransactionBytes: this.config.maxTransactionBytes,
        maxPendingTransactions: this.config.maxPendingTransactions,
        now: options.now ?? Date.now,
      },
      this.log.child({ component: "TransactionReassembler" }),
    );

    this.reassembler.on("complete", (key: TransactionKey, data: Uint8Array) => {
      this.emit("transaction_complete", key, data);
    });

    link.onFrame((frame) => this.receive(frame));
    link.onClose(() => this.teardown("link closed"));
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Protocol violations seen on this connection so far.
   */
  get violationCount(): number {
    return this.violations;
  }

  /**
   * Queues a frame for processing.
   */
  receive(frame: Frame): void {
    if (this.closed) {
      throw new ConnectionClosedError(this.peerId);
    }
    this.mailbox.push(frame);
    this.schedule();
  }

  /**
   * Resolves once every queued frame has been processed and delivered.
   */
  async flush(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  /**
   * Sends a payload in a single envelope.
   */
  async send(tag: number, payload: unknown, identifier?: string): Promise<void> {
    this.ensureOpen();
    const data = this.codec.encodeBytes(tag, payload, { identifier });
    this.traceFrame("Sending envelope", data);
    await this.link.send({ kind: "envelope", data });
  }

  /**
   * Sends a payload split into transaction messages of at most `chunkSize`
   * payload bytes each. Resolves with the transaction key once every
   * fragment has been handed to the link.
   */
  async sendTransaction(
    tag: number,
    payload: unknown,
    options: SendTransactionOptions = {},
  ): Promise<TransactionKey> {
    this.ensureOpen();
    const blob = this.codec.encodeBytes(tag, payload, {
      identifier: options.identifier,
    });
    const key: TransactionKey = {
      identifier: options.transactionId ?? uuidv4(),
      userData: options.userData ?? new Uint8Array(0),
    };
    const fragments = splitTransaction(
      key,
      blob,
      options.chunkSize ?? this.config.transactionChunkSize,
    );

    this.log.debug("Sending transaction", {
      transaction: describeKey(key),
      totalLength: blob.length,
      fragments: fragments.length,
    });

    for (const fragment of fragments) {
      const data = this.codec.encodeBytes(TRANSACTION.tag, {
        packets: [
          {
            key: fragment.key,
            packetData: fragment.data,
            totalLength: fragment.totalLength,
            totalWritePosition: fragment.writePosition,
          },
        ],
      });
      await this.link.send({ kind: "envelope", data });
    }
    return key;
  }

  /**
   * Sends a push update if the peer asked for its category. Resolves with
   * whether it was sent; suppressed updates are dropped, not queued.
   */
  async notify(
    category: UpdateCategory,
    tag: number,
    payload: unknown,
  ): Promise<boolean> {
    if (!this.interests.isInterested(category)) {
      return false;
    }
    await this.send(tag, payload);
    return true;
  }

  /**
   * Aborts transactions idle longer than the configured TTL.
   */
  expire(now: number): TransactionKey[] {
    return this.reassembler.expire(now, this.config.reassemblyTtlMs);
  }

  /**
   * Discards in-flight transactions and closes the link.
   */
  async close(reason = "connection closed"): Promise<void> {
    this.teardown(reason);
    await this.link.close();
  }

  getHealth(): ComponentHealth {
    const reassembler = this.reassembler.getHealth();
    return {
      name: `PeerConnection:${this.peerId}`,
      status: this.closed ? "unhealthy" : reassembler.status,
      message: this.closed ? "Connection closed" : reassembler.message,
      details: {
        ...reassembler.details,
        queued: this.mailbox.length,
        violations: this.violations,
      },
    };
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new ConnectionClosedError(this.peerId);
    }
  }

  private teardown(reason: string): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.mailbox.length = 0;
    this.reassembler.cancelAll(reason);
    this.log.info("Connection closed", { reason });
    this.emit("closed");
  }

  private schedule(): void {
    if (this.draining || this.closed || this.mailbox.length === 0) {
      return;
    }
    this.draining = this.drain().finally(() => {
      this.draining = undefined;
      this.schedule();
    });
  }

  private async drain(): Promise<void> {
    let frame = this.mailbox.shift();
    while (frame && !this.closed) {
      try {
        await this.process(frame);
      } catch (err) {
        this.recordFailure(err);
      }
      frame = this.mailbox.shift();
    }
  }

  private async process(frame: Frame): Promise<void> {
    const messages =
      frame.kind === "fragment"
        ? this.acceptFragment(frame.fragment)
        : this.acceptEnvelope(frame.data);

    for (const message of messages) {
      await this.dispatch(message);
    }
  }

  /**
   * Decodes an envelope. Transaction carriers are unpacked into the
   * reassembler and yield whatever their packets complete.
   */
  private acceptEnvelope(data: Uint8Array): DecodedMessage[] {
    this.traceFrame("Received envelope", data);

    let message: DecodedMessage;
    try {
      message = this.codec.decodeBytes(data);
    } catch (err) {
      this.recordFailure(err);
      return [];
    }

    if (!isPayload(message, TRANSACTION)) {
      return [message];
    }

    return message.payload.packets.flatMap((packet) =>
      this.acceptFragment(packetToFragment(packet)),
    );
  }

  private acceptFragment(fragment: TransactionFragment): DecodedMessage[] {
    try {
      const outcome = this.reassembler.submit(fragment);
      if (outcome.status === "pending") {
        return [];
      }
      return this.acceptEnvelope(outcome.data);
    } catch (err) {
      this.recordFailure(err);
      return [];
    }
  }

  private async dispatch(message: DecodedMessage): Promise<void> {
    if (isPayload(message, CLIENT_UPDATES_CONFIG)) {
      const interests = this.interests.applyMessage(message.payload);
      this.log.debug("Update interests changed", { ...interests });
      this.emit("interests_changed", interests);
    } else if (isPayload(message, MODIFY_OUTPUT_CONTEXT_REQUEST)) {
      const result = this.devices.applyMessage(message.payload);
      if (DeviceSetNegotiator.changed(result)) {
        this.log.debug("Output devices changed", {
          devices: result.devices.join(","),
          clusterDevices: result.clusterDevices.join(","),
        });
        this.emit("devices_changed", result);
      }
    } else if (message.kind === "opaque") {
      this.log.debug("Passing through unknown payload", { tag: message.tag });
    }

    this.emit("payload", message);

    if (!this.onPayload) {
      return;
    }
    try {
      await this.onPayload(this.peerId, message);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.log.error("Payload handler failed", error, { tag: message.tag });
    }
  }

  private recordFailure(err: unknown): void {
    if (err instanceof ProtocolViolationError) {
      this.violations++;
      this.log.warn("Protocol violation", { code: err.code, reason: err.message });
      this.emit("violation", err);
      return;
    }
    const error = err instanceof Error ? err : new Error(String(err));
    this.log.error("Failed to process frame", error);
  }

  private traceFrame(message: string, data: Uint8Array): void {
    if (this.log.isEnabled("debug")) {
      this.log.debug(message, {
        length: data.length,
        bytes: formatBytes(data, this.config.debugBytesLimit),
      });
    }
  }
}
