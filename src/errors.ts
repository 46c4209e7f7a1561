// src/errors.ts

/**
 * Base error class for all multiplexer errors.
 */
export class MuxError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "MuxError";
  }
}

/**
 * Errors caused by a peer sending something the protocol does not allow.
 * They reject a single message or abort a single transaction; the
 * connection itself stays open.
 */
export class ProtocolViolationError extends MuxError {
  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = "ProtocolViolationError";
  }
}

/**
 * Error thrown when a tag falls outside the envelope extension range.
 */
export class InvalidTagError extends MuxError {
  constructor(tag: number) {
    super(`Invalid payload tag: ${tag}`, "INVALID_TAG", { tag });
    this.name = "InvalidTagError";
  }
}

/**
 * Error thrown when a tag is registered twice in a catalog.
 */
export class DuplicateTagError extends MuxError {
  constructor(tag: number, existing: string) {
    super(`Tag ${tag} is already registered as ${existing}`, "DUPLICATE_TAG", {
      tag,
      existing,
    });
    this.name = "DuplicateTagError";
  }
}

/**
 * Error thrown when encoding for a tag the catalog does not know,
 * without asking for opaque passthrough.
 */
export class UnknownTagError extends MuxError {
  constructor(tag: number) {
    super(
      `No payload registered for tag ${tag}. Pass { opaque: true } to forward raw bytes.`,
      "UNKNOWN_TAG",
      { tag },
    );
    this.name = "UnknownTagError";
  }
}

/**
 * Error thrown when bytes do not match the shape of the payload they claim to be.
 */
export class MalformedPayloadError extends ProtocolViolationError {
  readonly originalCause?: Error;

  constructor(payload: string, reason: string, cause?: Error) {
    super(`Malformed ${payload}: ${reason}`, "MALFORMED_PAYLOAD", {
      payload,
      reason,
    });
    this.name = "MalformedPayloadError";
    this.originalCause = cause;
  }
}

/**
 * Error thrown when fragments of one transaction disagree on its total length.
 */
export class TotalLengthMismatchError extends ProtocolViolationError {
  constructor(transaction: string, expected: number, actual: number) {
    super(
      `Transaction ${transaction} declared total length ${actual}, expected ${expected}`,
      "TOTAL_LENGTH_MISMATCH",
      { transaction, expected, actual },
    );
    this.name = "TotalLengthMismatchError";
  }
}

/**
 * Error thrown when a fragment overwrites already received bytes with different ones.
 */
export class ConflictingFragmentError extends ProtocolViolationError {
  constructor(transaction: string, offset: number) {
    super(
      `Transaction ${transaction} received conflicting bytes at offset ${offset}`,
      "CONFLICTING_FRAGMENT",
      { transaction, offset },
    );
    this.name = "ConflictingFragmentError";
  }
}

/**
 * Error thrown when a fragment would be written outside its transaction buffer.
 */
export class FragmentOutOfBoundsError extends ProtocolViolationError {
  constructor(
    transaction: string,
    writePosition: number,
    length: number,
    totalLength: number,
  ) {
    super(
      `Transaction ${transaction} fragment [${writePosition}, +${length}) exceeds total length ${totalLength}`,
      "FRAGMENT_OUT_OF_BOUNDS",
      { transaction, writePosition, length, totalLength },
    );
    this.name = "FragmentOutOfBoundsError";
  }
}

/**
 * Error thrown when a transaction declares more bytes than allowed.
 */
export class TransactionTooLargeError extends ProtocolViolationError {
  constructor(transaction: string, totalLength: number, limit: number) {
    super(
      `Transaction ${transaction} declares ${totalLength} bytes, limit is ${limit}`,
      "TRANSACTION_TOO_LARGE",
      { transaction, totalLength, limit },
    );
    this.name = "TransactionTooLargeError";
  }
}

/**
 * Error thrown when a peer opens more concurrent transactions than allowed.
 */
export class TooManyTransactionsError extends ProtocolViolationError {
  constructor(limit: number) {
    super(
      `Too many concurrent transactions (limit ${limit})`,
      "TOO_MANY_TRANSACTIONS",
      { limit },
    );
    this.name = "TooManyTransactionsError";
  }
}

/**
 * Error used to abort a transaction that saw no fragments for too long.
 */
export class ReassemblyTimeoutError extends MuxError {
  constructor(transaction: string, ttlMs: number) {
    super(
      `Transaction ${transaction} timed out after ${ttlMs}ms without new fragments`,
      "REASSEMBLY_TIMEOUT",
      { transaction, ttlMs },
    );
    this.name = "ReassemblyTimeoutError";
  }
}

/**
 * Error used to abort a transaction cancelled by the peer or the application.
 */
export class TransactionCancelledError extends MuxError {
  constructor(transaction: string, reason: string) {
    super(
      `Transaction ${transaction} cancelled: ${reason}`,
      "TRANSACTION_CANCELLED",
      { transaction, reason },
    );
    this.name = "TransactionCancelledError";
  }
}

/**
 * Error thrown when using a connection that has been closed.
 */
export class ConnectionClosedError extends MuxError {
  constructor(peerId: string) {
    super(`Connection to peer ${peerId} is closed`, "CONNECTION_CLOSED", {
      peerId,
    });
    this.name = "ConnectionClosedError";
  }
}

/**
 * Error thrown when attaching a second link for a peer that is already attached.
 */
export class PeerAlreadyAttachedError extends MuxError {
  constructor(peerId: string) {
    super(`Peer ${peerId} is already attached`, "PEER_ALREADY_ATTACHED", {
      peerId,
    });
    this.name = "PeerAlreadyAttachedError";
  }
}

/**
 * Error thrown when a peer is not attached to the server.
 */
export class PeerNotFoundError extends MuxError {
  constructor(peerId: string) {
    super(`No connection for peer ${peerId}`, "PEER_NOT_FOUND", { peerId });
    this.name = "PeerNotFoundError";
  }
}
