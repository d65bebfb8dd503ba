import config, { LogLevel } from "../config";

// Console logger with a level threshold taken from LOG_LEVEL.

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function format(level: string, args: unknown[]): string {
  const time = new Date().toISOString();
  const processedArgs = args.map((arg) => {
    if (arg instanceof Error) {
      return arg.stack ?? `${arg.name}: ${arg.message}`;
    }
    if (typeof arg === "object" && arg !== null) {
      try {
        return JSON.stringify(arg);
      } catch {
        return String(arg);
      }
    }
    return String(arg);
  });
  return `[${time}] [${level}]` + (processedArgs.length ? " " : "") + processedArgs.join(" ");
}

export type Logger = Record<Exclude<LogLevel, "silent">, (...args: unknown[]) => void>;

export function createLogger(threshold: LogLevel): Logger {
  const enabled = (level: LogLevel) => SEVERITY[level] >= SEVERITY[threshold];
  return {
    debug: (...args) => {
      if (enabled("debug")) console.debug(format("DEBUG", args));
    },
    info: (...args) => {
      if (enabled("info")) console.info(format("INFO", args));
    },
    warn: (...args) => {
      if (enabled("warn")) console.warn(format("WARN", args));
    },
    error: (...args) => {
      if (enabled("error")) console.error(format("ERROR", args));
    },
  };
}

export const logger = createLogger(config.logLevel);
