import pino from "pino";

export interface ILogger {
  debug: (...a: unknown[]) => void;
  info: (...a: unknown[]) => void;
  warn: (...a: unknown[]) => void;
  error: (...a: unknown[]) => void;
}

export type LogLevel = pino.Level | "silent";

export const makeLogger = (
  level: LogLevel = "info",
  opts: { pretty?: boolean } = {},
): ILogger =>
  pino({
    name: "honk-verifier",
    level,
    ...(opts.pretty
      ? {
          transport: {
            target: "pino-pretty",
            options: { colorize: true, translateTime: "HH:MM:ss.l" },
          },
        }
      : {}),
  });

export const silentLogger: ILogger = makeLogger("silent");
