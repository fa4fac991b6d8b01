import pino, { type Logger } from "pino";
import { env } from "./env";

export type { Logger };

export const logger: Logger = pino({
  level: env.LOG_LEVEL,
  base: { service: "trip-packer" },
  timestamp: pino.stdTimeFunctions.isoTime
});

export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
