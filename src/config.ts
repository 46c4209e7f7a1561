// src/config.ts

/**
 * Tunables shared by the server, its connections and their reassemblers.
 */
export interface MuxConfig {
  /** Abort a transaction after this long without new fragments (ms). Default: 30000 */
  reassemblyTtlMs: number;

  /** How often the server sweeps connections for expired transactions (ms). Default: 5000 */
  sweepIntervalMs: number;

  /** Largest total length a single transaction may declare. Default: 16 MiB */
  maxTransactionBytes: number;

  /** Concurrent in-flight transactions allowed per connection. Default: 64 */
  maxPendingTransactions: number;

  /** Fragment size used when sending a payload as a transaction. Default: 1024 */
  transactionChunkSize: number;

  /** Bytes shown in debug logs of raw frames. Default: 64 */
  debugBytesLimit: number;
}

/**
 * Default multiplexer configuration.
 */
export const DEFAULT_MUX_CONFIG: MuxConfig = {
  reassemblyTtlMs: 30_000,
  sweepIntervalMs: 5_000,
  maxTransactionBytes: 16 * 1024 * 1024,
  maxPendingTransactions: 64,
  transactionChunkSize: 1024,
  debugBytesLimit: 64,
};

/**
 * Merges overrides onto the defaults. Throws a RangeError for values that
 * are not positive integers (`debugBytesLimit` may be zero).
 */
export function resolveConfig(overrides: Partial<MuxConfig> = {}): MuxConfig {
  const config: MuxConfig = { ...DEFAULT_MUX_CONFIG, ...overrides };

  for (const [name, value] of Object.entries(config)) {
    const min = name === "debugBytesLimit" ? 0 : 1;
    if (!Number.isInteger(value) || value < min) {
      throw new RangeError(`Invalid ${name}: ${value}`);
    }
  }

  return config;
}
