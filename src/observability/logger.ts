export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug: (msg: string | object) => void;
  info: (msg: string | object) => void;
  warn: (msg: string | object) => void;
  error: (msg: string | object) => void;
}

export interface LoggerConfig {
  level?: LogLevel;
  service?: string;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const format = (level: LogLevel, service: string, msg: string | object): string =>
  JSON.stringify({
    level,
    service,
    timestamp: new Date().toISOString(),
    ...(typeof msg === "string" ? { msg } : msg),
  });

export const createLogger = (config: LoggerConfig = {}): Logger => {
  const minPriority = LEVEL_PRIORITY[config.level ?? "info"];
  const service = config.service ?? "entry-status-sync";

  const enabled = (level: LogLevel): boolean => LEVEL_PRIORITY[level] >= minPriority;

  return {
    debug: (msg) => {
      if (enabled("debug")) console.debug(format("debug", service, msg));
    },
    info: (msg) => {
      if (enabled("info")) console.log(format("info", service, msg));
    },
    warn: (msg) => {
      if (enabled("warn")) console.warn(format("warn", service, msg));
    },
    error: (msg) => {
      if (enabled("error")) console.error(format("error", service, msg));
    },
  };
};

export const createSilentLogger = (): Logger => ({
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
});

export const defaultLogger: Logger = createLogger({
  level: process.env.NODE_ENV === "production" ? "info" : "debug",
});
