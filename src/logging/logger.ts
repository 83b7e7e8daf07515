import pino from "pino";

export type ReportLogger = {
  debug: (obj: Record<string, unknown>, msg?: string) => void;
  info: (obj: Record<string, unknown>, msg?: string) => void;
  warn: (obj: Record<string, unknown>, msg?: string) => void;
  error: (obj: Record<string, unknown>, msg?: string) => void;
};

const isDev = process.env.NODE_ENV !== "production";

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (process.env.NODE_ENV === "test") return "silent";
  return isDev ? "debug" : "info";
}

export function createLogger(options: { level?: string; name?: string } = {}): pino.Logger {
  return pino({
    name: options.name,
    level: options.level ?? resolveLevel(),
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(isDev && process.env.PINO_PRETTY === "1"
      ? {
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              singleLine: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          },
        }
      : {}),
  });
}

let defaultLogger: pino.Logger | null = null;

export function getDefaultLogger(): ReportLogger {
  if (!defaultLogger) {
    defaultLogger = createLogger({ name: "rank-trace-report" });
  }
  return defaultLogger;
}
