interface LogMeta {
  [key: string]: unknown;
}

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogThreshold = LogLevel | "silent";

const LEVEL_RANK: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const isThreshold = (value: unknown): value is LogThreshold =>
  typeof value === "string" && value in LEVEL_RANK;

const initialLevel = process.env.LOG_LEVEL;
let threshold: LogThreshold = isThreshold(initialLevel) ? initialLevel : "info";

export const setLogLevel = (level: LogThreshold): void => {
  threshold = level;
};

const write = (level: LogLevel, event: string, meta: LogMeta = {}) => {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) {
    return;
  }

  const payload = {
    timestamp: new Date().toISOString(),
    level,
    event,
    ...meta,
  };

  const line = JSON.stringify(payload);

  switch (level) {
    case "error":
      console.error(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "debug":
      console.debug(line);
      break;
    default:
      console.info(line);
  }
};

/** Flattens an unknown thrown value into fields that survive JSON.stringify. */
export const errorMeta = (error: unknown): LogMeta => {
  if (error instanceof Error) {
    return { error: error.message, errorName: error.name };
  }

  return { error };
};

export const logger = {
  info: (event: string, meta?: LogMeta) => write("info", event, meta),
  warn: (event: string, meta?: LogMeta) => write("warn", event, meta),
  error: (event: string, meta?: LogMeta) => write("error", event, meta),
  debug: (event: string, meta?: LogMeta) => write("debug", event, meta),
};
