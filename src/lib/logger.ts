import { type ILogObj, Logger } from "tslog";

import { env } from "@/lib/env";

const LOG_LEVELS = {
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
} as const;

const rootLogger = new Logger<ILogObj>({
  name: "endpoint-rules",
  minLevel: LOG_LEVELS[env.LOG_LEVEL],
  type: env.NODE_ENV === "test" ? "hidden" : env.NODE_ENV === "production" ? "json" : "pretty",
});

export type AppLogger = Logger<ILogObj>;

/**
 * Create a named logger.
 *
 * Usage: `logger.info("Rule model loaded", { conditions: 12 })`
 */
export function createLogger(name: string): AppLogger {
  return rootLogger.getSubLogger({ name });
}
