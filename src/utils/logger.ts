// src/utils/logger.ts
//
// Kestrel Logger (structured, lightweight)
// ----------------------------------------
// Used by the compile pipeline (stage timings at debug level) and the
// language server. Routes through a pluggable sink so the server can forward
// lines to the client console and tests can capture them.
//
// Levels:
//   silent < error < warn < info < debug < trace

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug" | "trace";

export type LogSink = {
  error: (msg: string) => void;
  warn: (msg: string) => void;
  info: (msg: string) => void;
  debug: (msg: string) => void;
};

export type LoggerOptions = {
  name?: string;
  level?: LogLevel;
  /** Defaults to the console. */
  sink?: LogSink;
  timestamp?: boolean;
  /** Append the JSON payload after the message. */
  includePayload?: boolean;
};

export type Timer = {
  /** Logs the elapsed time and returns it in milliseconds. */
  end: (payload?: unknown) => number;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

const CONSOLE_SINK: LogSink = {
  error: (msg) => console.error(msg),
  warn: (msg) => console.warn(msg),
  info: (msg) => console.log(msg),
  debug: (msg) => console.debug(msg),
};

export class Logger {
  private readonly name: string;
  private level: LogLevel;
  private readonly sink: LogSink;
  private readonly timestamp: boolean;
  private readonly includePayload: boolean;

  private readonly onceKeys = new Set<string>();

  constructor(options: LoggerOptions = {}) {
    this.name = options.name ?? "kestrel";
    this.level = options.level ?? "info";
    this.timestamp = options.timestamp ?? true;
    this.includePayload = options.includePayload ?? true;
    this.sink = options.sink ?? CONSOLE_SINK;
  }

  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  public getLevel(): LogLevel {
    return this.level;
  }

  public error(msg: string, payload?: unknown): void {
    this.emit("error", msg, payload);
  }

  public warn(msg: string, payload?: unknown): void {
    this.emit("warn", msg, payload);
  }

  public info(msg: string, payload?: unknown): void {
    this.emit("info", msg, payload);
  }

  public debug(msg: string, payload?: unknown): void {
    this.emit("debug", msg, payload);
  }

  public trace(msg: string, payload?: unknown): void {
    this.emit("trace", msg, payload);
  }

  public logOnce(level: Exclude<LogLevel, "silent">, key: string, msg: string, payload?: unknown): void {
    if (this.onceKeys.has(key)) return;
    this.onceKeys.add(key);
    this.emit(level, msg, payload);
  }

  public time(label: string): Timer {
    const start = performance.now();
    this.trace(`start ${label}`);

    return {
      end: (payload?: unknown) => {
        const ms = performance.now() - start;
        this.debug(`${label} took ${ms.toFixed(2)}ms`, payload);
        return ms;
      },
    };
  }

  private emit(level: Exclude<LogLevel, "silent">, msg: string, payload?: unknown): void {
    if (LEVEL_ORDER[level] > LEVEL_ORDER[this.level]) return;

    const line = this.formatLine(level, msg, payload);
    switch (level) {
      case "error":
        this.sink.error(line);
        return;
      case "warn":
        this.sink.warn(line);
        return;
      case "info":
        this.sink.info(line);
        return;
      case "debug":
      case "trace":
        this.sink.debug(line);
        return;
    }
  }

  private formatLine(level: string, msg: string, payload?: unknown): string {
    const ts = this.timestamp ? `${isoTime()} ` : "";
    const head = `${ts}[${this.name}] ${level.toUpperCase()}: ${msg}`;
    if (payload === undefined || !this.includePayload) return head;
    return `${head} ${safeStringify(payload)}`;
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}

/** A logger that drops everything; the default for library calls. */
export const SILENT_LOGGER = new Logger({ level: "silent" });

/* =========================================================
   Utilities
   ========================================================= */

export function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value, (_key, v: unknown) => (typeof v === "bigint" ? v.toString() : v)) ?? String(value);
  } catch (err) {
    return `[unserializable: ${err instanceof Error ? err.message : String(err)}]`;
  }
}

function isoTime(): string {
  // compact ISO without ms
  return new Date().toISOString().replace(/\.\d{3}Z$/, "Z");
}
