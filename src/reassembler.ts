// src/reassembler.ts

import { EventEmitter } from "events";
import { DEFAULT_MUX_CONFIG } from "./config";
import {
  ConflictingFragmentError,
  FragmentOutOfBoundsError,
  MuxError,
  ReassemblyTimeoutError,
  TooManyTransactionsError,
  TotalLengthMismatchError,
  TransactionCancelledError,
  TransactionTooLargeError,
} from "./errors";
import { ComponentHealth } from "./health";
import { Logger, createLogger } from "./logger";

/**
 * Identifies one multi-fragment transfer. Two keys are equal when both
 * fields match exactly.
 */
export interface TransactionKey {
  identifier: string;
  userData: Uint8Array;
}

export interface TransactionFragment {
  key: TransactionKey;
  data: Uint8Array;
  totalLength: number;
  writePosition: number;
}

export type ReassemblyOutcome =
  | {
      status: "pending";
      key: TransactionKey;
      received: number;
      totalLength: number;
      /** True when the fragment added no new bytes. */
      duplicate: boolean;
    }
  | { status: "complete"; key: TransactionKey; data: Uint8Array };

export interface TransactionProgress {
  key: TransactionKey;
  totalLength: number;
  received: number;
  /** Bytes filled without gaps from offset 0. */
  contiguous: number;
  createdAt: number;
  lastActivityAt: number;
}

export interface ReassemblerOptions {
  maxTransactionBytes: number;
  maxPendingTransactions: number;
  now: () => number;
}

/** Half-open byte range [start, end). */
interface FilledRange {
  start: number;
  end: number;
}

interface ReassemblyState {
  key: TransactionKey;
  totalLength: number;
  buffer: Uint8Array;
  filled: FilledRange[];
  received: number;
  createdAt: number;
  lastActivityAt: number;
}

interface CompletionWaiter {
  name: string;
  registeredAt: number;
  resolve: (data: Uint8Array) => void;
  reject: (error: Error) => void;
}

/** Left behind by a completed transaction so late fragments stay no-ops. */
interface CompletedTransaction {
  key: TransactionKey;
  totalLength: number;
  completedAt: number;
}

/**
 * Map key for a transaction key. The identifier is length-prefixed so no
 * identifier can run into the user data.
 */
export function transactionKeyId(key: TransactionKey): string {
  return `${key.identifier.length}:${key.identifier}:${Buffer.from(key.userData).toString("hex")}`;
}

/**
 * Human-readable form used in logs and error messages.
 */
export function describeKey(key: TransactionKey): string {
  return key.userData.length > 0
    ? `${key.identifier}/${Buffer.from(key.userData).toString("hex")}`
    : key.identifier;
}

export function sameKey(a: TransactionKey, b: TransactionKey): boolean {
  return transactionKeyId(a) === transactionKeyId(b);
}

/**
 * Cuts `data` into fragments of at most `chunkSize` bytes, all addressed to
 * `key`. An empty blob still yields one empty fragment.
 */
export function splitTransaction(
  key: TransactionKey,
  data: Uint8Array,
  chunkSize: number,
): TransactionFragment[] {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`Invalid chunk size: ${chunkSize}`);
  }

  const fragments: TransactionFragment[] = [];
  for (let offset = 0; offset < data.length; offset += chunkSize) {
    fragments.push({
      key,
      data: data.subarray(offset, Math.min(offset + chunkSize, data.length)),
      totalLength: data.length,
      writePosition: offset,
    });
  }
  if (fragments.length === 0) {
    fragments.push({ key, data, totalLength: 0, writePosition: 0 });
  }
  return fragments;
}

/**
 * Accumulates positional fragments per transaction key until every byte of
 * the declared total length is present, then hands back the assembled blob
 * exactly once.
 *
 * Fragments may arrive in any order. Re-sending identical bytes is a no-op;
 * different bytes at an already filled offset abort the transaction. Every
 * abort frees the buffer before the error reaches the caller.
 *
 * A completed key is remembered until `expire` evicts it, so fragments
 * retransmitted after completion are reported as duplicates and never
 * assemble the blob a second time.
 *
 * Events:
 * - 'complete': `(key, data)` when a transaction is assembled
 * - 'aborted': `(key, error)` when a transaction is discarded
 *
 * @example
 * ```typescript
 * const reassembler = new TransactionReassembler();
 * const key = { identifier: "xfer-1", userData: new Uint8Array(0) };
 * reassembler.submit({ key, data: bytes("def"), totalLength: 6, writePosition: 3 });
 * const outcome = reassembler.submit({ key, data: bytes("abc"), totalLength: 6, writePosition: 0 });
 * // outcome.status === "complete"
 * ```
 */
export class TransactionReassembler extends EventEmitter {
  private readonly options: ReassemblerOptions;
  private readonly log: Logger;
  private readonly states = new Map<string, ReassemblyState>();
  private readonly waiters = new Map<string, CompletionWaiter[]>();
  private readonly completed = new Map<string, CompletedTransaction>();

  constructor(options: Partial<ReassemblerOptions> = {}, log?: Logger) {
    super();
    this.options = {
      maxTransactionBytes: DEFAULT_MUX_CONFIG.maxTransactionBytes,
      maxPendingTransactions: DEFAULT_MUX_CONFIG.maxPendingTransactions,
      now: Date.now,
      ...options,
    };
    this.log = log ?? createLogger("TransactionReassembler");
  }

  /**
   * Writes one fragment into its transaction.
   *
   * @throws TotalLengthMismatchError, ConflictingFragmentError or
   * FragmentOutOfBoundsError after discarding the transaction;
   * TransactionTooLargeError or TooManyTransactionsError before creating one.
   */
  submit(fragment: TransactionFragment): ReassemblyOutcome {
    const id = transactionKeyId(fragment.key);
    const name = describeKey(fragment.key);
    const existing = this.states.get(id);
    const { data, totalLength, writePosition } = fragment;

    const done = existing ? undefined : this.completed.get(id);
    if (done) {
      this.log.debug("Fragment for completed transaction ignored", {
        transaction: name,
        writePosition,
        length: data.length,
      });
      return {
        status: "pending",
        key: done.key,
        received: done.totalLength,
        totalLength: done.totalLength,
        duplicate: true,
      };
    }

    if (existing && existing.totalLength !== totalLength) {
      throw this.abort(
        id,
        new TotalLengthMismatchError(name, existing.totalLength, totalLength),
      );
    }

    if (
      !Number.isInteger(totalLength) ||
      !Number.isInteger(writePosition) ||
      totalLength < 0 ||
      writePosition < 0 ||
      writePosition + data.length > totalLength
    ) {
      const error = new FragmentOutOfBoundsError(
        name,
        writePosition,
        data.length,
        totalLength,
      );
      throw existing ? this.abort(id, error) : error;
    }

    const state = existing ?? this.open(id, fragment.key, totalLength);
    state.lastActivityAt = this.options.now();

    let written: number;
    try {
      written = this.write(state, data, writePosition);
    } catch (err) {
      if (err instanceof MuxError) {
        throw this.abort(id, err);
      }
      throw err;
    }

    if (state.received === state.totalLength) {
      return this.complete(id, state);
    }

    if (written > 0) {
      this.log.debug("Fragment accepted", {
        transaction: name,
        writePosition,
        length: data.length,
        received: state.received,
        totalLength: state.totalLength,
      });
    }

    return {
      status: "pending",
      key: state.key,
      received: state.received,
      totalLength: state.totalLength,
      duplicate: written === 0,
    };
  }

  /**
   * Aborts every transaction idle for longer than `ttlMs` at time `now`.
   * Returns the keys that were evicted.
   *
   * Completed keys older than `ttlMs` are forgotten, and waiters registered
   * longer than `ttlMs` ago for a transaction that never started are
   * rejected with ReassemblyTimeoutError.
   */
  expire(now: number, ttlMs: number): TransactionKey[] {
    const expired: TransactionKey[] = [];
    for (const [id, state] of Array.from(this.states)) {
      if (now - state.lastActivityAt > ttlMs) {
        expired.push(state.key);
        this.abort(id, new ReassemblyTimeoutError(describeKey(state.key), ttlMs));
      }
    }

    for (const [id, done] of Array.from(this.completed)) {
      if (now - done.completedAt > ttlMs) {
        this.completed.delete(id);
      }
    }

    for (const [id, waiters] of Array.from(this.waiters)) {
      if (this.states.has(id)) {
        continue;
      }
      const stale = waiters.filter((waiter) => now - waiter.registeredAt > ttlMs);
      if (stale.length === 0) {
        continue;
      }
      const remaining = waiters.filter((waiter) => !stale.includes(waiter));
      if (remaining.length > 0) {
        this.waiters.set(id, remaining);
      } else {
        this.waiters.delete(id);
      }
      for (const waiter of stale) {
        waiter.reject(new ReassemblyTimeoutError(waiter.name, ttlMs));
      }
    }
    return expired;
  }

  /**
   * Discards one transaction. Returns false when it was not in flight.
   */
  cancel(key: TransactionKey, reason = "cancelled by peer"): boolean {
    const id = transactionKeyId(key);
    if (!this.states.has(id)) {
      return false;
    }
    this.abort(id, new TransactionCancelledError(describeKey(key), reason));
    return true;
  }

  /**
   * Discards every transaction and rejects every waiter, including those
   * waiting for transactions that never started.
   */
  cancelAll(reason = "reassembler closed"): void {
    for (const [id, state] of Array.from(this.states)) {
      this.abort(id, new TransactionCancelledError(describeKey(state.key), reason));
    }
    for (const [id, waiters] of Array.from(this.waiters)) {
      this.waiters.delete(id);
      for (const waiter of waiters) {
        waiter.reject(new TransactionCancelledError(waiter.name, reason));
      }
    }
    this.completed.clear();
  }

  /**
   * Resolves with the assembled blob when the transaction completes, or
   * rejects when it is aborted. May be called before the first fragment;
   * if none arrives within the TTL, `expire` rejects the waiter.
   */
  whenComplete(key: TransactionKey): Promise<Uint8Array> {
    const id = transactionKeyId(key);
    return new Promise((resolve, reject) => {
      const waiters = this.waiters.get(id) ?? [];
      waiters.push({
        name: describeKey(key),
        registeredAt: this.options.now(),
        resolve,
        reject,
      });
      this.waiters.set(id, waiters);
    });
  }

  getProgress(key: TransactionKey): TransactionProgress | undefined {
    const state = this.states.get(transactionKeyId(key));
    if (!state) {
      return undefined;
    }
    return {
      key: state.key,
      totalLength: state.totalLength,
      received: state.received,
      contiguous: state.filled[0]?.start === 0 ? state.filled[0].end : 0,
      createdAt: state.createdAt,
      lastActivityAt: state.lastActivityAt,
    };
  }

  get pendingCount(): number {
    return this.states.size;
  }

  /**
   * Bytes currently held in transaction buffers.
   */
  get bufferedBytes(): number {
    let total = 0;
    for (const state of this.states.values()) {
      total += state.buffer.byteLength;
    }
    return total;
  }

  getHealth(): ComponentHealth {
    const limit = this.options.maxPendingTransactions;
    const pending = this.states.size;
    const status = pending >= limit * 0.75 ? "degraded" : "healthy";
    return {
      name: "TransactionReassembler",
      status,
      message:
        status === "degraded"
          ? "Close to the concurrent transaction limit"
          : "Reassembler is healthy",
      details: { pending, limit, bufferedBytes: this.bufferedBytes },
    };
  }

  private open(id: string, key: TransactionKey, totalLength: number): ReassemblyState {
    const name = describeKey(key);
    if (totalLength > this.options.maxTransactionBytes) {
      throw new TransactionTooLargeError(
        name,
        totalLength,
        this.options.maxTransactionBytes,
      );
    }
    if (this.states.size >= this.options.maxPendingTransactions) {
      throw new TooManyTransactionsError(this.options.maxPendingTransactions);
    }

    const now = this.options.now();
    const state: ReassemblyState = {
      key: { identifier: key.identifier, userData: new Uint8Array(key.userData) },
      totalLength,
      buffer: new Uint8Array(totalLength),
      filled: [],
      received: 0,
      createdAt: now,
      lastActivityAt: now,
    };
    this.states.set(id, state);
    this.log.debug("Transaction started", { transaction: name, totalLength });
    return state;
  }

  /**
   * Copies `data` to `position`, checking overlaps against bytes already
   * present. Returns how many previously empty bytes were filled.
   */
  private write(state: ReassemblyState, data: Uint8Array, position: number): number {
    const start = position;
    const end = position + data.length;
    if (start === end) {
      return 0;
    }

    for (const range of state.filled) {
      if (range.start >= end) {
        break;
      }
      const overlapStart = Math.max(start, range.start);
      const overlapEnd = Math.min(end, range.end);
      for (let offset = overlapStart; offset < overlapEnd; offset++) {
        if (state.buffer[offset] !== data[offset - start]) {
          throw new ConflictingFragmentError(describeKey(state.key), offset);
        }
      }
    }

    state.buffer.set(data, start);

    const before = state.received;
    state.filled = mergeRange(state.filled, { start, end });
    state.received = state.filled.reduce((sum, r) => sum + (r.end - r.start), 0);
    return state.received - before;
  }

  private complete(id: string, state: ReassemblyState): ReassemblyOutcome {
    this.states.delete(id);
    this.completed.set(id, {
      key: state.key,
      totalLength: state.totalLength,
      completedAt: this.options.now(),
    });
    const data = state.buffer;

    this.log.debug("Transaction complete", {
      transaction: describeKey(state.key),
      totalLength: state.totalLength,
    });

    const waiters = this.waiters.get(id) ?? [];
    this.waiters.delete(id);
    for (const waiter of waiters) {
      waiter.resolve(data);
    }
    this.emit("complete", state.key, data);

    return { status: "complete", key: state.key, data };
  }

  /**
   * Drops the transaction's state, rejects its waiters and returns the error
   * so callers can throw it.
   */
  private abort<E extends Error>(id: string, error: E): E {
    const state = this.states.get(id);
    this.states.delete(id);

    const waiters = this.waiters.get(id) ?? [];
    this.waiters.delete(id);
    for (const waiter of waiters) {
      waiter.reject(error);
    }

    if (state) {
      this.log.warn("Transaction aborted", {
        transaction: describeKey(state.key),
        reason: error.message,
      });
      this.emit("aborted", state.key, error);
    }
    return error;
  }
}

/**
 * Inserts `range` into a sorted list of disjoint ranges, merging ranges
 * that overlap or touch.
 */
function mergeRange(ranges: FilledRange[], range: FilledRange): FilledRange[] {
  const merged: FilledRange[] = [];
  let current = { ...range };
  let placed = false;

  for (const existing of ranges) {
    if (existing.end < current.start) {
      merged.push(existing);
    } else if (existing.start > current.end) {
      if (!placed) {
        merged.push(current);
        placed = true;
      }
      merged.push(existing);
    } else {
      current = {
        start: Math.min(existing.start, current.start),
        end: Math.max(existing.end, current.end),
      };
    }
  }

  if (!placed) {
    merged.push(current);
  }
  return merged;
}
