export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEntry = {
  level: LogLevel;
  module: string;
  message: string;
  data?: Record<string, unknown>;
  timestamp: number;
};

type LogHandler = (entry: LogEntry) => void;

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let minLevel: LogLevel = "info";

let handler: LogHandler = (entry) => {
  const prefix = `[${entry.level.toUpperCase()}] [${entry.module}]`;
  const msg = `${prefix} ${entry.message}`;
  // stdout is left to the process owner; gateway logs go to stderr
  if (entry.data && Object.keys(entry.data).length > 0) {
    console.error(msg, JSON.stringify(entry.data));
  } else {
    console.error(msg);
  }
};

export function setLogHandler(h: LogHandler): void {
  handler = h;
}

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export type Logger = ReturnType<typeof createLogger>;

export function createLogger(module: string) {
  const log = (level: LogLevel, message: string, data?: Record<string, unknown>) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
    handler({ level, module, message, data, timestamp: Date.now() });
  };

  return {
    debug: (msg: string, data?: Record<string, unknown>) => log("debug", msg, data),
    info: (msg: string, data?: Record<string, unknown>) => log("info", msg, data),
    warn: (msg: string, data?: Record<string, unknown>) => log("warn", msg, data),
    error: (msg: string, data?: Record<string, unknown>) => log("error", msg, data),
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
