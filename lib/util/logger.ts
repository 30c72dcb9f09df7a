type LogLevel = "debug" | "info" | "warn" | "error";

type LogContext = Record<string, unknown>;

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogContext;
}

export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function getMinLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) return envLevel;
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

function formatEntry(entry: LogEntry): string {
  const base = `[${entry.timestamp}] ${entry.level.toUpperCase()}: ${entry.message}`;
  if (entry.context && Object.keys(entry.context).length > 0) {
    return `${base} ${JSON.stringify(entry.context)}`;
  }
  return base;
}

function log(level: LogLevel, message: string, context?: LogContext) {
  if (LOG_LEVELS[level] < LOG_LEVELS[getMinLevel()]) return;

  const formatted = formatEntry({
    level,
    message,
    timestamp: new Date().toISOString(),
    context,
  });

  switch (level) {
    case "error":
      console.error(formatted);
      break;
    case "warn":
      console.warn(formatted);
      break;
    default:
      console.log(formatted);
  }
}

/**
 * Create a logger whose entries all carry the given context
 */
export function createLogger(baseContext: LogContext = {}): Logger {
  return {
    debug: (message, context) => log("debug", message, { ...baseContext, ...context }),
    info: (message, context) => log("info", message, { ...baseContext, ...context }),
    warn: (message, context) => log("warn", message, { ...baseContext, ...context }),
    error: (message, context) => log("error", message, { ...baseContext, ...context }),
  };
}

export const logger: Logger = createLogger();

/**
 * Timer utility for performance logging
 */
export function createTimer(label: string, target: Logger = logger) {
  const start = performance.now();
  return {
    end: (context?: LogContext) => {
      const duration = performance.now() - start;
      target.debug(`${label} completed`, { durationMs: duration.toFixed(2), ...context });
      return duration;
    },
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
