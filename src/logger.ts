// src/logger.ts

export type LogLevel = "debug" | "info" | "warn" | "error" | "none";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  none: 4,
};

/**
 * Structured fields attached to an entry. `component` and `peerId` come
 * from the logger, anything else from the call site.
 */
export interface LogContext {
  component?: string;
  peerId?: string;
  transaction?: string;
  [key: string]: string | number | boolean | undefined;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: LogContext;
  timestamp: Date;
  error?: Error;
}

export type LogHandler = (entry: LogEntry) => void;

/**
 * Writes entries to the console as
 * `<iso time> <LEVEL> <component>@<peer> <message> key=value ...`.
 */
export const consoleLogHandler: LogHandler = (entry: LogEntry) => {
  const { component, peerId, ...fields } = entry.context;
  const source = peerId ? `${component ?? "-"}@${peerId}` : (component ?? "-");
  const extra = Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([name, value]) => `${name}=${value}`);

  const line = [
    entry.timestamp.toISOString(),
    entry.level.toUpperCase().padEnd(5),
    source,
    entry.message,
    ...extra,
  ].join(" ");

  switch (entry.level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.log(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
  if (entry.error && (entry.level === "warn" || entry.level === "error")) {
    console.error(entry.error);
  }
};

/**
 * Process-wide logging settings. Every Logger reads them on each call, so
 * changes apply to loggers that already exist.
 */
class LoggerConfig {
  level: LogLevel = "info";
  handler: LogHandler = consoleLogHandler;

  configure(options: { level?: LogLevel; handler?: LogHandler }): void {
    this.level = options.level ?? this.level;
    this.handler = options.handler ?? this.handler;
  }

  /**
   * Restores the console handler at "info".
   */
  reset(): void {
    this.level = "info";
    this.handler = consoleLogHandler;
  }
}

export const loggerConfig = new LoggerConfig();

/**
 * Renders bytes as lowercase hex, truncated to `limit` bytes.
 *
 * @example
 * ```typescript
 * formatBytes(new Uint8Array([0xca, 0xfe, 0x01]), 2); // "cafe...(3 bytes)"
 * ```
 */
export function formatBytes(data: Uint8Array, limit: number): string {
  const shown = data.subarray(0, Math.max(0, limit));
  const hex = Buffer.from(shown).toString("hex");
  if (shown.length < data.length) {
    return `${hex}...(${data.length} bytes)`;
  }
  return hex;
}

/**
 * A logger bound to a fixed context, usually a component and the peer it
 * serves.
 */
export class Logger {
  constructor(private readonly context: LogContext = {}) {}

  child(additionalContext: LogContext): Logger {
    return new Logger({ ...this.context, ...additionalContext });
  }

  /**
   * Whether entries at `level` currently reach the handler. Lets callers
   * skip building expensive messages such as byte dumps.
   */
  isEnabled(level: LogLevel): boolean {
    return (
      level !== "none" && LOG_LEVELS[level] >= LOG_LEVELS[loggerConfig.level]
    );
  }

  debug(message: string, extra?: LogContext): void {
    this.write("debug", message, extra);
  }

  info(message: string, extra?: LogContext): void {
    this.write("info", message, extra);
  }

  warn(message: string, extra?: LogContext, error?: Error): void {
    this.write("warn", message, extra, error);
  }

  error(message: string, error?: Error, extra?: LogContext): void {
    this.write("error", message, extra, error);
  }

  private write(
    level: LogLevel,
    message: string,
    extra?: LogContext,
    error?: Error,
  ): void {
    if (!this.isEnabled(level)) {
      return;
    }
    loggerConfig.handler({
      level,
      message,
      context: { ...this.context, ...extra },
      timestamp: new Date(),
      error,
    });
  }
}

export function createLogger(component: string, peerId?: string): Logger {
  return new Logger({ component, peerId });
}
