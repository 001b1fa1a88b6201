// Tagged logging to stderr. stdout belongs to the MCP stdio transport and CLI output.

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface Logger {
  debug: (message: string, data?: Record<string, unknown>) => void;
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
}

export function createLogger(tag: string): Logger {
  const log = (level: Exclude<LogLevel, "silent">) => {
    return (message: string, data?: Record<string, unknown>) => {
      if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
      const line = `[${tag}] ${message}`;
      const write = level === "warn" ? console.warn : console.error;
      if (data) {
        write(line, JSON.stringify(data));
      } else {
        write(line);
      }
    };
  };

  return {
    debug: log("debug"),
    info: log("info"),
    warn: log("warn"),
    error: log("error"),
  };
}
