import pino from "pino";
import { loadLoggerConfig } from "../config.js";

const config = loadLoggerConfig();

export const logger = pino({
  level: config.LOG_LEVEL,
  base: { service: "roster" },
  // Context objects carry failures under `error`
  serializers: { error: pino.stdSerializers.err },
  transport:
    config.NODE_ENV === "development"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        }
      : undefined,
});

/**
 * Create a child logger scoped to a module
 *
 * @example
 * ```typescript
 * const log = createLogger({ module: "roster" });
 * log.info({ userId }, "User signed in");
 * ```
 */
export function createLogger(context: Record<string, unknown>) {
  return logger.child(context);
}
