import pino from "pino";

const pretty = Boolean(process.stdout.isTTY) && process.env.NODE_ENV !== "production";

export const logger = pino({
  name: "tweet-relay",
  level: process.env.LOG_LEVEL ?? "info",
  transport: pretty
    ? {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "SYS:standard", ignore: "pid,hostname" },
      }
    : undefined,
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = pino.Logger;

export const errorMessage = (err: unknown): string => {
  if (err instanceof Error) return err.message;
  return String(err);
};
