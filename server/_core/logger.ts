/**
 * Lightweight structured logger.
 *
 * JSON mode emits newline-delimited JSON, one entry per line, for log
 * aggregators. Otherwise output is human-readable and prefixed. Entry points
 * call `logger.configure({ json: config.isProduction })` once the config is
 * loaded; until then NODE_ENV decides.
 *
 * Entries below LOG_LEVEL are dropped (default "debug" outside JSON mode,
 * "info" in it).
 *
 * Usage:
 *   const log = logger.child({ component: "storage" });
 *   log.info("Photo stored", { key });
 *   log.error("Backup failed", errorMeta(err));
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

type Meta = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

export interface LoggerOptions {
  json?: boolean;
  level?: LogLevel;
}

function envLevel(): LogLevel | undefined {
  const value = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(value) ? value : undefined;
}

function resolveOptions(options: LoggerOptions): Required<LoggerOptions> {
  const json = options.json ?? process.env.NODE_ENV === "production";
  return { json, level: options.level ?? envLevel() ?? (json ? "info" : "debug") };
}

export class Logger {
  private readonly base: Meta;
  /** Shared with every child, so `configure` reaches loggers created earlier. */
  private readonly options: Required<LoggerOptions>;

  constructor(base: Meta = {}, options: LoggerOptions = {}, shared?: Required<LoggerOptions>) {
    this.base = base;
    this.options = shared ?? resolveOptions(options);
  }

  /** Create a child logger that merges additional fields into every log entry. */
  child(fields: Meta): Logger {
    return new Logger({ ...this.base, ...fields }, {}, this.options);
  }

  /**
   * Switch output mode for this logger and all of its children. The level
   * follows the new mode unless LOG_LEVEL or `options.level` sets it.
   */
  configure(options: LoggerOptions): void {
    Object.assign(this.options, resolveOptions(options));
  }

  debug(msg: string, meta?: Meta): void {
    this.emit("debug", msg, meta);
  }

  info(msg: string, meta?: Meta): void {
    this.emit("info", msg, meta);
  }

  warn(msg: string, meta?: Meta): void {
    this.emit("warn", msg, meta);
  }

  error(msg: string, meta?: Meta): void {
    this.emit("error", msg, meta);
  }

  private emit(level: LogLevel, msg: string, meta?: Meta): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.options.level]) return;
    const fields = { ...this.base, ...meta };

    if (this.options.json) {
      const entry = JSON.stringify({ time: new Date().toISOString(), level, msg, ...fields });
      // warn/error go to stderr so they map to the aggregator's error stream
      if (level === "error" || level === "warn") {
        console.error(entry);
      } else {
        console.log(entry);
      }
      return;
    }

    const metaStr = Object.keys(fields).length > 0 ? " " + JSON.stringify(fields) : "";
    const line = `[${level.toUpperCase()}] ${msg}${metaStr}`;
    if (level === "error") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

/** Flatten a thrown value into loggable fields. */
export function errorMeta(error: unknown): Meta {
  if (error instanceof Error) {
    const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
    return code ? { err: error.message, code } : { err: error.message };
  }
  return { err: String(error) };
}

export const logger = new Logger();
