export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = {
  readonly runId?: string;
} & Record<string, unknown>;

export interface Logger {
  readonly module: string;
  readonly level: LogLevel;
  log(level: LogLevel, msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  /** Returns a logger that merges `meta` into every entry it writes. */
  child(meta: LogMeta): Logger;
}

export interface LoggerOptions {
  /** Minimum level written; defaults to `LOG_LEVEL` or "info". */
  readonly level?: LogLevel;
  readonly bindings?: LogMeta;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === "string" && value in LEVEL_ORDER;

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

const serialiseValue = (value: unknown): unknown => {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
};

const buildEntry = (moduleName: string, level: LogLevel, msg: string, meta: LogMeta) => {
  const { runId, ...rest } = meta;
  const extra = Object.fromEntries(
    Object.entries(rest).map(([key, value]) => [key, serialiseValue(value)]),
  );

  return {
    ts: new Date().toISOString(),
    level,
    module: moduleName,
    msg,
    ...(typeof runId === "string" ? { runId } : {}),
    ...extra,
  };
};

export const createLogger = (moduleName: string, options: LoggerOptions = {}): Logger => {
  const threshold = resolveLevel(options.level);
  const bindings = options.bindings ?? {};

  const log = (level: LogLevel, msg: string, meta?: LogMeta): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
      return;
    }
    const entry = buildEntry(moduleName, level, msg, { ...bindings, ...meta });
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
    child: (meta) =>
      createLogger(moduleName, { level: threshold, bindings: { ...bindings, ...meta } }),
  };
};

/**
 * Logger that drops every entry. Handy default for library callers that did not pass one.
 */
export const createSilentLogger = (moduleName = "silent"): Logger => {
  const silent: Logger = {
    module: moduleName,
    level: "error",
    log: () => undefined,
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
    child: () => silent,
  };
  return silent;
};
