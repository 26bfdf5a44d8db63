export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function log(minLevel: LogLevel, level: LogLevel, message: string, context?: LogContext): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) {
    return;
  }

  const payload = {
    ts: new Date().toISOString(),
    level,
    message,
    ...(context ?? {})
  };

  const line = JSON.stringify(payload);
  if (level === "error") {
    console.error(line);
    return;
  }

  console.log(line);
}

export function createLogger(minLevel: LogLevel = "info"): Logger {
  return {
    debug: (message: string, context?: LogContext): void => log(minLevel, "debug", message, context),
    info: (message: string, context?: LogContext): void => log(minLevel, "info", message, context),
    warn: (message: string, context?: LogContext): void => log(minLevel, "warn", message, context),
    error: (message: string, context?: LogContext): void => log(minLevel, "error", message, context)
  };
}

export const logger: Logger = createLogger();
