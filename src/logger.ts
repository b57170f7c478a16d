import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import process from "node:process";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Accepted levels, ordered from the most to the least verbose. */
export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

export interface LoggerOptions {
  /** Minimum level emitted; entries below it are dropped. Defaults to `debug`. */
  readonly level?: LogLevel;
  readonly logFile?: string | null;
  /** Suppresses the stdout mirror, leaving the file and the listener. */
  readonly silent?: boolean;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
}

/**
 * Structured logger that emits JSON lines on stdout and optionally mirrors them
 * to a file. File writes are queued sequentially to guarantee ordering.
 */
export class StructuredLogger {
  readonly level: LogLevel;
  private readonly logFile?: string;
  readonly silent: boolean;
  private readonly entryListener?: (entry: LogEntry) => void;
  private writeQueue: Promise<void> = Promise.resolve();
  /**
   * Tracks whether the directory containing {@link logFile} has already been
   * created so `mkdir` only runs once per logger.
   */
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "debug";
    this.logFile = options.logFile ?? undefined;
    this.silent = options.silent ?? false;
    this.entryListener = options.onEntry;
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  /** Whether an entry at {@link level} would be emitted. */
  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  /**
   * Waits for all pending log writes to be flushed. Tests rely on this helper
   * to deterministically assert the content of mirrored log files.
   */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(payload !== undefined ? { payload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    if (!this.silent) {
      process.stdout.write(line);
    }
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }
    const logFile = this.logFile;
    if (!logFile) {
      return;
    }
    this.writeQueue = this.writeQueue
      .then(async () => {
        try {
          await this.ensureLogDestination(logFile);
          await appendFile(logFile, line, "utf8");
        } catch (err) {
          const errorEntry: LogEntry = {
            timestamp: new Date().toISOString(),
            level: "error",
            message: "log_file_write_failed",
            payload: err instanceof Error ? { message: err.message } : { error: String(err) },
          };
          process.stderr.write(`${JSON.stringify(errorEntry)}\n`);
          // Allow future attempts to retry directory creation after a failure.
          this.logDirectoryReady = false;
        }
      })
      .catch((err: unknown) => {
        process.stderr.write(`${JSON.stringify({ level: "error", message: "log_queue_failed", error: String(err) })}\n`);
        this.writeQueue = Promise.resolve();
      });
  }

  private async ensureLogDestination(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }
}
