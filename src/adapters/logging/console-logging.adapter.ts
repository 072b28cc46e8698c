// =============================================================================
// ConsoleLoggingAdapter — LoggingPort over the console with a level threshold
// =============================================================================

import type { LogEntry, LogLevel, LoggingPort } from "../../ports/logging.port.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface ConsoleLoggingOptions {
  /** Entries below this level are dropped (default: "info") */
  level?: LogLevel;
  /** Prefix added to every line (default: "[memory]") */
  prefix?: string;
  /** Custom sink; defaults to the console method matching the level */
  sink?: (entry: LogEntry) => void;
}

export class ConsoleLoggingAdapter implements LoggingPort {
  private readonly threshold: number;
  private readonly prefix: string;
  private readonly sink: (entry: LogEntry) => void;

  constructor(options: ConsoleLoggingOptions = {}) {
    this.threshold = LEVEL_ORDER[options.level ?? "info"];
    this.prefix = options.prefix ?? "[memory]";
    this.sink = options.sink ?? ((entry) => this.write(entry));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < this.threshold) return;
    this.sink({ timestamp: Date.now(), level, message, data });
  }

  private write(entry: LogEntry): void {
    const line = `${this.prefix} [${new Date(entry.timestamp).toISOString()}] [${entry.level}] ${entry.message}`;
    // eslint-disable-next-line no-console
    const method = console[entry.level];
    if (entry.data) {
      method(line, entry.data);
    } else {
      method(line);
    }
  }
}

/** Logger that discards everything; the default when none is injected. */
export const silentLogger: LoggingPort = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
