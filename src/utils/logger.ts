export type LogLevel = "error" | "warn" | "info" | "debug";

export type LogMeta = Record<string, unknown>;

const LEVEL_RANK: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export interface LogWriter {
  write(line: string): unknown;
}

export class Logger {
  constructor(
    private level: LogLevel = "info",
    private readonly writer: LogWriter = process.stderr,
  ) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] <= LEVEL_RANK[this.level];
  }

  error(message: string, meta?: LogMeta): void {
    this.log("error", message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log("warn", message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log("info", message, meta);
  }

  debug(message: string, meta?: LogMeta): void {
    this.log("debug", message, meta);
  }

  private log(level: LogLevel, message: string, meta?: LogMeta): void {
    if (!this.isEnabled(level)) return;

    const timestamp = new Date().toISOString();
    const suffix = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta, replaceErrors)}` : "";
    this.writer.write(`[${timestamp}] ${level.toUpperCase()} ${message}${suffix}\n`);
  }
}

// JSON.stringify drops Error fields (they are not enumerable)
function replaceErrors(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

function levelFromEnv(raw: string | undefined): LogLevel {
  switch (raw) {
    case "error":
    case "warn":
    case "info":
    case "debug":
      return raw;
    default:
      return "info";
  }
}

export const logger = new Logger(levelFromEnv(process.env.LOG_LEVEL));
