import { Logger, type ILogObj } from "tslog";

export type LogLevel = "silly" | "trace" | "debug" | "info" | "warn" | "error" | "fatal";

const LEVEL_ORDER: Record<LogLevel, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

const DEFAULT_LEVEL: LogLevel = "warn";

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export function parseLogLevel(raw: string | undefined): LogLevel | undefined {
  const normalized = raw?.trim().toLowerCase();
  if (!normalized || !isLogLevel(normalized)) {
    return undefined;
  }
  return normalized;
}

let activeLevel: LogLevel = parseLogLevel(process.env.QRSTYLE_LOG_LEVEL) ?? DEFAULT_LEVEL;

const rootLogger = new Logger<ILogObj>({
  name: "qr-styler",
  type: "pretty",
  minLevel: LEVEL_ORDER.silly,
  hideLogPositionForProduction: true,
});

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[activeLevel];
}

export type SubsystemLogger = {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
};

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const logger = rootLogger.getSubLogger({ name: subsystem });
  const emit =
    (level: "debug" | "info" | "warn" | "error") =>
    (message: string, meta?: Record<string, unknown>) => {
      if (!enabled(level)) {
        return;
      }
      if (meta) {
        logger[level](message, meta);
      } else {
        logger[level](message);
      }
    };
  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}
