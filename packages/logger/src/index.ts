export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = {
  readonly requestId?: string;
} & Record<string, unknown>;

export interface Logger {
  readonly module: string;
  readonly level: LogLevel;
  log(level: LogLevel, msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
}

export interface CreateLoggerOptions {
  /** Entries below this level are dropped. Defaults to LOG_LEVEL, then "info". */
  readonly level?: LogLevel;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const isLogLevel = (value: unknown): value is LogLevel => {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
};

const resolveLevel = (level?: LogLevel): LogLevel => {
  if (level) {
    return level;
  }
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : "info";
};

const writeLine = (level: LogLevel, line: string): void => {
  const output = level === "error" ? process.stderr : process.stdout;
  output.write(`${line}\n`);
};

const buildEntry = (moduleName: string, level: LogLevel, msg: string, meta?: LogMeta) => {
  const { requestId, ...rest } = meta ?? {};

  return {
    ts: new Date().toISOString(),
    level,
    module: moduleName,
    msg,
    ...(typeof requestId === "string" ? { requestId } : {}),
    ...rest,
  };
};

export const createLogger = (moduleName: string, options: CreateLoggerOptions = {}): Logger => {
  const threshold = resolveLevel(options.level);

  const log = (level: LogLevel, msg: string, meta?: LogMeta): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
      return;
    }
    const entry = buildEntry(moduleName, level, msg, meta);
    writeLine(level, JSON.stringify(entry));
  };

  return {
    module: moduleName,
    level: threshold,
    log,
    debug: (msg, meta) => log("debug", msg, meta),
    info: (msg, meta) => log("info", msg, meta),
    warn: (msg, meta) => log("warn", msg, meta),
    error: (msg, meta) => log("error", msg, meta),
  };
};
