import pino from "pino";
import type { BaseLogger, Level, DestinationStream } from "pino";

/**
 * The subset of pino every package logs through.
 * Fastify's request logger satisfies it, so the gateway can pass `app.log` down.
 */
export type Logger = Pick<BaseLogger, "debug" | "info" | "warn" | "error">;

export type LogLevel = Level | "silent";

/** JSON lines on stderr, so stdout stays clean for generated text. */
export function createLogger(name: string, level: LogLevel = "info", destination?: DestinationStream): Logger {
  return pino({ name, level }, destination ?? pino.destination(2));
}

export const silentLogger: Logger = pino({ level: "silent" });
