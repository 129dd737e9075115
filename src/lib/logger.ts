import pino from "pino";
import type { DestinationStream, Logger } from "pino";

export type { Logger } from "pino";

/** JSON to stdout (or the given destination); no transports, no pretty-print. */
export function createLogger(
  options: { level?: string; destination?: DestinationStream } = {},
): Logger {
  const level = options.level ?? process.env.LOG_LEVEL ?? "info";
  return options.destination ? pino({ level }, options.destination) : pino({ level });
}

export function createChildLogger(
  logger: Logger,
  context: { deliveryId?: string; eventName?: string; [key: string]: unknown },
): Logger {
  return logger.child(context);
}
