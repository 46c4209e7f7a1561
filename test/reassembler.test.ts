// test/reassembler.test.ts

import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  TransactionReassembler,
  TransactionKey,
  TransactionFragment,
  ConflictingFragmentError,
  FragmentOutOfBoundsError,
  ReassemblyTimeoutError,
  TooManyTransactionsError,
  TotalLengthMismatchError,
  TransactionCancelledError,
  TransactionTooLargeError,
  describeKey,
  sameKey,
  splitTransaction,
  transactionKeyId,
  loggerConfig,
} from "../src";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

const KEY: TransactionKey = { identifier: "xfer-1", userData: new Uint8Array(0) };

function fragment(
  writePosition: number,
  text: string,
  totalLength = 9,
  key: TransactionKey = KEY,
): TransactionFragment {
  return { key, data: encoder.encode(text), totalLength, writePosition };
}

describe("TransactionReassembler", () => {
  let clock: number;
  let reassembler: TransactionReassembler;

  beforeEach(() => {
    loggerConfig.level = "none";
    clock = 1_000;
    reassembler = new TransactionReassembler({
      maxTransactionBytes: 1024,
      maxPendingTransactions: 4,
      now: () => clock,
    });
  });

  it("should assemble out-of-order fragments into one blob", () => {
    const first = reassembler.submit(fragment(3, "def"));
    const second = reassembler.submit(fragment(0, "abc"));
    const third = reassembler.submit(fragment(6, "ghi"));

    expect(first).toMatchObject({ status: "pending", received: 3, totalLength: 9 });
    expect(second).toMatchObject({ status: "pending", received: 6, totalLength: 9 });
    expect(third.status).toBe("complete");
    if (third.status === "complete") {
      expect(decoder.decode(third.data)).toBe("abcdefghi");
      expect(third.key.identifier).toBe("xfer-1");
    }
    expect(reassembler.pendingCount).toBe(0);
  });

  it("should yield the same blob for every arrival order", () => {
    const orders = [
      [0, 3, 6],
      [6, 3, 0],
      [3, 6, 0],
      [6, 0, 3],
    ];
    const texts: Record<number, string> = { 0: "abc", 3: "def", 6: "ghi" };

    orders.forEach((order, index) => {
      const key = { identifier: `order-${index}`, userData: new Uint8Array(0) };
      const outcomes = order.map((pos) => reassembler.submit(fragment(pos, texts[pos], 9, key)));
      const last = outcomes[outcomes.length - 1];
      expect(outcomes.filter((o) => o.status === "complete")).toHaveLength(1);
      expect(last.status === "complete" && decoder.decode(last.data)).toBe("abcdefghi");
    });
  });

  it("should complete a zero-length transaction immediately", () => {
    const outcome = reassembler.submit(fragment(0, "", 0));

    expect(outcome.status).toBe("complete");
    expect(outcome.status === "complete" && outcome.data.length).toBe(0);
    expect(reassembler.pendingCount).toBe(0);
  });

  it("should emit complete exactly once", () => {
    const onComplete = vi.fn();
    reassembler.on("complete", onComplete);

    reassembler.submit(fragment(0, "abcdef"));
    reassembler.submit(fragment(6, "ghi"));
    const late = reassembler.submit(fragment(6, "ghi"));

    expect(onComplete).toHaveBeenCalledTimes(1);
    expect(decoder.decode(onComplete.mock.calls[0][1])).toBe("abcdefghi");
    expect(late).toEqual({
      status: "pending",
      key: KEY,
      received: 9,
      totalLength: 9,
      duplicate: true,
    });
    expect(reassembler.pendingCount).toBe(0);
    expect(reassembler.bufferedBytes).toBe(0);
  });

  it("should not complete a retransmitted whole blob a second time", () => {
    const first = reassembler.submit(fragment(0, "abcdefghi"));
    const again = reassembler.submit(fragment(0, "abcdefghi"));

    expect(first.status).toBe("complete");
    expect(again).toMatchObject({ status: "pending", duplicate: true });
    expect(reassembler.pendingCount).toBe(0);
  });

  it("should treat an identical fragment as a no-op", () => {
    reassembler.submit(fragment(0, "abc"));
    const repeat = reassembler.submit(fragment(0, "abc"));

    expect(repeat).toEqual({
      status: "pending",
      key: KEY,
      received: 3,
      totalLength: 9,
      duplicate: true,
    });
  });

  it("should accept overlapping fragments with matching bytes", () => {
    reassembler.submit(fragment(0, "abcd"));
    const overlap = reassembler.submit(fragment(2, "cdef"));

    expect(overlap).toMatchObject({ status: "pending", received: 6, duplicate: false });
    expect(reassembler.getProgress(KEY)?.contiguous).toBe(6);
  });

  it("should abort on a total length mismatch", () => {
    const onAborted = vi.fn();
    reassembler.on("aborted", onAborted);
    reassembler.submit(fragment(0, "abc"));

    expect(() => reassembler.submit(fragment(3, "def", 10))).toThrow(
      TotalLengthMismatchError,
    );
    expect(reassembler.pendingCount).toBe(0);
    expect(reassembler.bufferedBytes).toBe(0);
    expect(onAborted).toHaveBeenCalledTimes(1);
    expect(onAborted.mock.calls[0][1]).toBeInstanceOf(TotalLengthMismatchError);
  });

  it("should abort on conflicting bytes", () => {
    reassembler.submit(fragment(0, "abc"));

    expect(() => reassembler.submit(fragment(1, "xc"))).toThrow(
      "Transaction xfer-1 received conflicting bytes at offset 1",
    );
    expect(reassembler.pendingCount).toBe(0);
  });

  it("should reject fragments past the total length", () => {
    expect(() => reassembler.submit(fragment(8, "hi"))).toThrow(FragmentOutOfBoundsError);
    expect(reassembler.pendingCount).toBe(0);
  });

  it("should abort an open transaction on an out-of-bounds fragment", () => {
    reassembler.submit(fragment(0, "abc"));
    expect(() => reassembler.submit(fragment(-1, "a"))).toThrow(FragmentOutOfBoundsError);
    expect(reassembler.pendingCount).toBe(0);
  });

  it("should refuse transactions above the size limit", () => {
    expect(() => reassembler.submit(fragment(0, "a", 2048))).toThrow(
      TransactionTooLargeError,
    );
    expect(reassembler.pendingCount).toBe(0);
  });

  it("should refuse more concurrent transactions than allowed", () => {
    for (let i = 0; i < 4; i++) {
      reassembler.submit(fragment(0, "a", 9, { identifier: `t${i}`, userData: new Uint8Array(0) }));
    }

    expect(() =>
      reassembler.submit(fragment(0, "a", 9, { identifier: "t4", userData: new Uint8Array(0) })),
    ).toThrow(TooManyTransactionsError);
    expect(reassembler.pendingCount).toBe(4);
  });

  it("should keep keys that differ only in user data apart", () => {
    const other = { identifier: "xfer-1", userData: new Uint8Array([1]) };
    reassembler.submit(fragment(0, "abc"));
    reassembler.submit(fragment(0, "xyz", 9, other));

    expect(reassembler.pendingCount).toBe(2);
    expect(reassembler.getProgress(other)?.received).toBe(3);
  });

  describe("expiry", () => {
    it("should evict transactions idle past the TTL", () => {
      const onAborted = vi.fn();
      reassembler.on("aborted", onAborted);
      reassembler.submit(fragment(0, "abc"));
      expect(reassembler.bufferedBytes).toBe(9);

      clock += 5_001;
      const expired = reassembler.expire(clock, 5_000);

      expect(expired).toEqual([KEY]);
      expect(reassembler.pendingCount).toBe(0);
      expect(reassembler.bufferedBytes).toBe(0);
      expect(onAborted.mock.calls[0][1]).toBeInstanceOf(ReassemblyTimeoutError);
    });

    it("should measure idle time from the last fragment", () => {
      reassembler.submit(fragment(0, "abc"));
      clock += 4_000;
      reassembler.submit(fragment(3, "def"));
      clock += 4_000;

      expect(reassembler.expire(clock, 5_000)).toEqual([]);
      expect(reassembler.getProgress(KEY)).toMatchObject({
        received: 6,
        createdAt: 1_000,
        lastActivityAt: 5_000,
      });
    });

    it("should forget completed keys once the TTL has passed", () => {
      reassembler.submit(fragment(0, "abcdefghi"));

      reassembler.expire(clock + 5_000, 5_000);
      expect(reassembler.submit(fragment(0, "abc"))).toMatchObject({ duplicate: true });

      reassembler.expire(clock + 5_001, 5_000);
      const reused = reassembler.submit(fragment(0, "abc"));
      expect(reused).toMatchObject({ status: "pending", received: 3, duplicate: false });
      expect(reassembler.pendingCount).toBe(1);
    });

    it("should reject waiters whose transaction never starts", async () => {
      const ghost = { identifier: "ghost", userData: new Uint8Array(0) };
      const done = reassembler.whenComplete(ghost);
      const rejected = expect(done).rejects.toThrow(
        "Transaction ghost timed out after 5000ms without new fragments",
      );

      reassembler.expire(clock + 5_000, 5_000);
      reassembler.expire(clock + 5_001, 5_000);

      await rejected;
    });

    it("should keep waiters of transactions that are still in flight", async () => {
      const done = reassembler.whenComplete(KEY);
      clock += 4_000;
      reassembler.submit(fragment(0, "abc"));
      clock += 2_000;

      expect(reassembler.expire(clock, 5_000)).toEqual([]);
      reassembler.submit(fragment(3, "defghi"));

      expect(decoder.decode(await done)).toBe("abcdefghi");
    });

    it("should start over when fragments arrive after eviction", () => {
      reassembler.submit(fragment(0, "abc"));
      reassembler.expire(clock + 10_000, 5_000);

      const outcome = reassembler.submit(fragment(3, "def"));
      expect(outcome).toMatchObject({ status: "pending", received: 3 });
    });
  });

  describe("waiting and cancellation", () => {
    it("should resolve whenComplete registered before the first fragment", async () => {
      const done = reassembler.whenComplete(KEY);
      reassembler.submit(fragment(0, "abcdefghi"));

      expect(decoder.decode(await done)).toBe("abcdefghi");
    });

    it("should reject whenComplete when the transaction is aborted", async () => {
      reassembler.submit(fragment(0, "abc"));
      const done = reassembler.whenComplete(KEY);
      reassembler.expire(clock + 10_000, 5_000);

      await expect(done).rejects.toBeInstanceOf(ReassemblyTimeoutError);
    });

    it("should cancel a single transaction", () => {
      reassembler.submit(fragment(0, "abc"));

      expect(reassembler.cancel(KEY, "peer gave up")).toBe(true);
      expect(reassembler.cancel(KEY)).toBe(false);
      expect(reassembler.pendingCount).toBe(0);
    });

    it("should cancel everything, including waiters for unknown keys", async () => {
      reassembler.submit(fragment(0, "abc"));
      const inFlight = reassembler.whenComplete(KEY);
      const neverStarted = reassembler.whenComplete({
        identifier: "ghost",
        userData: new Uint8Array(0),
      });

      const outcomes = Promise.allSettled([inFlight, neverStarted]);

      reassembler.cancelAll("shutting down");

      const [first, second] = await outcomes;
      expect(first.status === "rejected" && first.reason.message).toBe(
        "Transaction xfer-1 cancelled: shutting down",
      );
      expect(second.status === "rejected" && second.reason).toBeInstanceOf(
        TransactionCancelledError,
      );
      expect(reassembler.pendingCount).toBe(0);
    });
  });

  describe("getHealth", () => {
    it("should report degraded near the concurrency limit", () => {
      expect(reassembler.getHealth().status).toBe("healthy");

      for (let i = 0; i < 3; i++) {
        reassembler.submit(fragment(0, "a", 9, { identifier: `t${i}`, userData: new Uint8Array(0) }));
      }

      const health = reassembler.getHealth();
      expect(health.status).toBe("degraded");
      expect(health.details).toEqual({ pending: 3, limit: 4, bufferedBytes: 27 });
    });
  });
});

describe("transaction keys", () => {
  it("should compare both fields", () => {
    const a = { identifier: "x", userData: new Uint8Array([1, 2]) };
    const b = { identifier: "x", userData: new Uint8Array([1, 2]) };
    const c = { identifier: "x", userData: new Uint8Array([1, 3]) };

    expect(sameKey(a, b)).toBe(true);
    expect(sameKey(a, c)).toBe(false);
  });

  it("should not let the identifier run into the user data", () => {
    const a = { identifier: "ab", userData: new Uint8Array(0) };
    const b = { identifier: "a", userData: new Uint8Array([0x62]) };

    expect(transactionKeyId(a)).not.toBe(transactionKeyId(b));
  });

  it("should describe keys with and without user data", () => {
    expect(describeKey(KEY)).toBe("xfer-1");
    expect(describeKey({ identifier: "xfer-1", userData: new Uint8Array([0xca, 0xfe]) })).toBe(
      "xfer-1/cafe",
    );
  });
});

describe("splitTransaction", () => {
  it("should cut a blob into positioned chunks", () => {
    const fragments = splitTransaction(KEY, encoder.encode("abcdefghij"), 4);

    expect(fragments.map((f) => [f.writePosition, decoder.decode(f.data)])).toEqual([
      [0, "abcd"],
      [4, "efgh"],
      [8, "ij"],
    ]);
    expect(fragments.every((f) => f.totalLength === 10)).toBe(true);
  });

  it("should produce one empty fragment for an empty blob", () => {
    const fragments = splitTransaction(KEY, new Uint8Array(0), 4);
    expect(fragments).toHaveLength(1);
    expect(fragments[0]).toMatchObject({ totalLength: 0, writePosition: 0 });
  });

  it("should reject chunk sizes that are not positive integers", () => {
    expect(() => splitTransaction(KEY, new Uint8Array(1), 0)).toThrow(
      "Invalid chunk size: 0",
    );
  });

  it("should feed back into the reassembler", () => {
    const reassembler = new TransactionReassembler();
    const fragments = splitTransaction(KEY, encoder.encode("hello world"), 3).reverse();

    const outcomes = fragments.map((f) => reassembler.submit(f));
    const last = outcomes[outcomes.length - 1];
    expect(last.status === "complete" && decoder.decode(last.data)).toBe("hello world");
  });
});
