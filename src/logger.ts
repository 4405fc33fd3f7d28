/**
 * Console logger for the command-line tool.
 *
 * Text output by default; one JSON object per line when
 * CBORSCOPE_LOG_FORMAT=json. The codec itself never logs.
 */

export type LogFormat = "text" | "json";

export type LogMeta = Record<string, unknown>;

export interface LoggerOptions {
  /** Emit debug lines. */
  verbose?: boolean;
  format?: LogFormat;
}

function formatFromEnv(): LogFormat {
  return process.env.CBORSCOPE_LOG_FORMAT === "json" ? "json" : "text";
}

// bigint has no JSON form
function replacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

export class Logger {
  readonly verbose: boolean;
  readonly format: LogFormat;

  constructor(options: LoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.format = options.format ?? formatFromEnv();
  }

  debug(message: string, meta?: LogMeta): void {
    if (!this.verbose) return;
    console.info(this.formatLog("DEBUG", message, meta));
  }

  info(message: string, meta?: LogMeta): void {
    console.info(this.formatLog("INFO", message, meta));
  }

  warn(message: string, meta?: LogMeta): void {
    console.warn(this.formatLog("WARN", message, meta));
  }

  error(message: string, meta?: LogMeta): void {
    console.error(this.formatLog("ERROR", message, meta));
  }

  /** Same format, verbosity changed; this logger when it already matches. */
  withVerbose(verbose: boolean): Logger {
    if (verbose === this.verbose) return this;
    return new Logger({ verbose, format: this.format });
  }

  private formatLog(level: string, message: string, meta?: LogMeta): string {
    if (this.format === "json") {
      return JSON.stringify({ timestamp: new Date().toISOString(), level, message, ...meta }, replacer);
    }
    const metaStr = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta, replacer)}` : "";
    return `${level} ${message}${metaStr}`;
  }
}

export const logger = new Logger();
