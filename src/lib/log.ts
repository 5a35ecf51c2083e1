import pino from "pino";

export type RelayLogger = {
  debug: (obj: Record<string, unknown>, msg?: string) => void;
  info: (obj: Record<string, unknown>, msg?: string) => void;
  warn: (obj: Record<string, unknown>, msg?: string) => void;
  error: (obj: Record<string, unknown>, msg?: string) => void;
};

export function createLogger(opts: { level?: string; pretty?: boolean } = {}): pino.Logger {
  const isDev = process.env.NODE_ENV !== "production";
  const level =
    opts.level ?? process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : isDev ? "debug" : "info");

  return pino({
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(isDev && opts.pretty
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

export const createDefaultLogger = (): RelayLogger =>
  pino({
    level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : "info"),
  });

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
