export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  readonly component?: string;
  readonly uid?: string;
  readonly namespace?: string;
  readonly operation?: string;
  readonly [key: string]: unknown;
}

export interface Logger {
  child(context: LogContext): Logger;
  debug(message: string, fields?: LogContext): void;
  info(message: string, fields?: LogContext): void;
  warn(message: string, fields?: LogContext): void;
  error(message: string, fields?: LogContext): void;
}

export interface LoggerOptions {
  readonly level?: LogLevel;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(raw: string | undefined): LogLevel | undefined {
  const value = raw?.trim().toLowerCase();
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return undefined;
}

export function createLogger(
  context: LogContext = {},
  options: LoggerOptions = {},
): Logger {
  const threshold = LEVEL_RANK[options.level ?? "info"];
  const write = (level: LogLevel, message: string, fields?: LogContext) => {
    if (LEVEL_RANK[level] < threshold) {
      return;
    }
    writeLog(level, message, context, fields);
  };

  return {
    child(childContext: LogContext): Logger {
      return createLogger(
        {
          ...context,
          ...compact(childContext),
        },
        options,
      );
    },
    debug(message: string, fields?: LogContext): void {
      write("debug", message, fields);
    },
    info(message: string, fields?: LogContext): void {
      write("info", message, fields);
    },
    warn(message: string, fields?: LogContext): void {
      write("warn", message, fields);
    },
    error(message: string, fields?: LogContext): void {
      write("error", message, fields);
    },
  };
}

function writeLog(
  level: LogLevel,
  message: string,
  context: LogContext,
  fields?: LogContext,
): void {
  const record = {
    ts: new Date().toISOString(),
    level,
    message,
    ...compact(context),
    ...compact(fields),
  };

  const serialized = JSON.stringify(record);
  switch (level) {
    case "error":
      console.error(serialized);
      return;
    case "warn":
      console.warn(serialized);
      return;
    case "debug":
      console.debug(serialized);
      return;
    case "info":
      console.log(serialized);
      return;
  }
}

function compact(input: LogContext | undefined): LogContext {
  if (!input) {
    return {};
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}
