import { config } from "../config";

type LogLevel = "debug" | "info" | "warn" | "error";
type LogMeta = Record<string, unknown>;

const levelPriority: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const formatMessage = (level: LogLevel, scope: string | undefined, message: string, meta?: LogMeta) => {
  const timestamp = new Date().toISOString();
  const prefix = scope ? `[${timestamp}] [${level.toUpperCase()}] [${scope}]` : `[${timestamp}] [${level.toUpperCase()}]`;
  const base = `${prefix} ${message}`;
  if (!meta || Object.keys(meta).length === 0) return base;
  return `${base} ${JSON.stringify(meta)}`;
};

const shouldLog = (level: LogLevel): boolean => levelPriority[level] >= levelPriority[config.logLevel];

const log = (level: LogLevel, scope: string | undefined, message: string, meta?: LogMeta) => {
  if (!shouldLog(level)) return;
  const line = formatMessage(level, scope, message, meta);
  if (level === "error") {
    console.error(line);
    return;
  }
  if (level === "warn") {
    console.warn(line);
    return;
  }
  if (level === "debug") {
    console.debug(line);
    return;
  }
  console.log(line);
};

const buildLogger = (scope?: string) => ({
  debug: (message: string, meta?: LogMeta) => log("debug", scope, message, meta),
  info: (message: string, meta?: LogMeta) => log("info", scope, message, meta),
  warn: (message: string, meta?: LogMeta) => log("warn", scope, message, meta),
  error: (message: string, meta?: LogMeta) => log("error", scope, message, meta),
});

export const logger = buildLogger();

// Scoped loggers tag each line with the component name, e.g. `[refresh]`.
export const createLogger = (scope: string) => buildLogger(scope);

export type Logger = ReturnType<typeof buildLogger>;
