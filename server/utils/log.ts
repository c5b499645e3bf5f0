type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const isLevelName = (value: string): value is LogLevel | "silent" =>
  Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);

const threshold = (): number => {
  const raw = (process.env.LOG_LEVEL ?? "info").trim().toLowerCase();
  return isLevelName(raw) ? LEVEL_ORDER[raw] : LEVEL_ORDER.info;
};

export type Logger = Record<LogLevel, (message: string, ...details: unknown[]) => void>;

export const createLogger = (source: string): Logger => {
  const emit =
    (level: LogLevel, sink: (...args: unknown[]) => void) =>
    (message: string, ...details: unknown[]) => {
      if (LEVEL_ORDER[level] < threshold()) return;
      sink(`[${source}] ${message}`, ...details);
    };
  return {
    debug: emit("debug", console.debug),
    info: emit("info", console.info),
    warn: emit("warn", console.warn),
    error: emit("error", console.error),
  };
};
