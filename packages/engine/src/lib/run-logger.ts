export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  ts: string;
  level: LogLevel;
  msg: string;
  data?: Record<string, unknown>;
}

export interface LogWriter {
  log(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface RunLoggerOptions {
  writer?: LogWriter;
  /** Forward debug entries to the writer. They are always recorded. */
  debug?: boolean;
  maxEntries?: number;
  now?: () => Date;
}

/**
 * RunLogger accumulates structured log entries for one palette run and
 * forwards them to a console-like writer.
 */
export class RunLogger {
  private readonly writer: LogWriter;
  private readonly entries: LogEntry[] = [];
  private readonly maxEntries: number;
  private readonly debugEnabled: boolean;
  private readonly now: () => Date;

  constructor(options: RunLoggerOptions = {}) {
    this.writer = options.writer ?? console;
    this.debugEnabled = options.debug ?? false;
    this.maxEntries = options.maxEntries || 500;
    this.now = options.now ?? (() => new Date());
  }

  private addEntry(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
    const entry: LogEntry = {
      ts: this.now().toISOString(),
      level,
      msg,
    };

    if (data && Object.keys(data).length > 0) {
      entry.data = data;
    }

    // Trim old entries if we hit max
    if (this.entries.length >= this.maxEntries) {
      const removeCount = Math.max(1, Math.floor(this.maxEntries * 0.2));
      this.entries.splice(0, removeCount);
    }

    this.entries.push(entry);
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.addEntry("debug", msg, data);
    if (!this.debugEnabled) return;
    if (data) {
      this.writer.log(`[DEBUG] ${msg}`, data);
    } else {
      this.writer.log(`[DEBUG] ${msg}`);
    }
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.addEntry("info", msg, data);
    if (data) {
      this.writer.log(`[INFO] ${msg}`, data);
    } else {
      this.writer.log(`[INFO] ${msg}`);
    }
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.addEntry("warn", msg, data);
    if (data) {
      this.writer.warn(`[WARN] ${msg}`, data);
    } else {
      this.writer.warn(`[WARN] ${msg}`);
    }
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.addEntry("error", msg, data);
    if (data) {
      this.writer.error(`[ERROR] ${msg}`, data);
    } else {
      this.writer.error(`[ERROR] ${msg}`);
    }
  }

  /**
   * Get current log entries.
   */
  getEntries(): LogEntry[] {
    return [...this.entries];
  }
}
