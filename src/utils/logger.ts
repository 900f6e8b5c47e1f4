/**
 * Console logger with levels and structured context.
 *
 * Production output is one JSON object per line; otherwise lines are
 * formatted for reading in a terminal.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

export class Logger {
  private minLevel: number;

  constructor(
    level: string | undefined = process.env.LOG_LEVEL,
    private readonly json: boolean = process.env.NODE_ENV === "production",
    private readonly baseContext: LogContext = {}
  ) {
    this.minLevel = LOG_LEVELS[isLogLevel(level) ? level : "info"];
  }

  setLevel(level: LogLevel): void {
    this.minLevel = LOG_LEVELS[level];
  }

  debug(message: string, context?: LogContext): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log("warn", message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log("error", message, context);
  }

  /**
   * Logger that adds `context` to every entry, e.g. the component name.
   */
  child(context: LogContext): Logger {
    const child = new Logger(undefined, this.json, {
      ...this.baseContext,
      ...context,
    });
    child.minLevel = this.minLevel;
    return child;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVELS[level] < this.minLevel) return;

    const merged = { ...this.baseContext, ...context };
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(Object.keys(merged).length > 0 ? { context: merged } : {}),
    };

    const line = this.json
      ? JSON.stringify(entry, replacer)
      : this.format(entry);

    switch (level) {
      case "error":
        console.error(line);
        break;
      case "warn":
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }

  private format(entry: LogEntry): string {
    let output = `${entry.timestamp} [${entry.level.toUpperCase()}] ${entry.message}`;
    if (entry.context) {
      output += ` ${JSON.stringify(entry.context, replacer)}`;
    }
    return output;
  }
}

// Error objects and bigints do not serialize on their own
function replacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  return value;
}

export const logger = new Logger();
