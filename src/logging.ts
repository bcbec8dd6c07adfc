import pino from "pino";

export type Logger = pino.Logger;
export type LogLevel = pino.LevelWithSilent;

export const makeLogger = (
  level: LogLevel = "info",
  opts: { pretty?: boolean; name?: string } = {},
): Logger =>
  pino({
    name: opts.name ?? "bridge",
    level,
    // bigint amounts are logged as decimal strings
    serializers: { amount: (v: unknown) => (typeof v === "bigint" ? v.toString() : v) },
    ...(opts.pretty && level !== "silent"
      ? {
          transport: {
            target: "pino-pretty",
            options: { colorize: true, translateTime: "HH:MM:ss.l" },
          },
        }
      : {}),
  });

export const silentLogger = (): Logger => makeLogger("silent");
