/**
 * Centralized pino logger.
 * Pretty output in development, JSON lines in production, silent in tests.
 */
import pino from "pino";
import type { Logger, LoggerOptions } from "pino";
import { env } from "../config/env";

const isDev = env.NODE_ENV === "development";

const options: LoggerOptions = {
  level: env.LOG_LEVEL ?? (env.NODE_ENV === "test" ? "silent" : isDev ? "debug" : "info"),
  formatters: isDev
    ? {}
    : {
        level: (label: string) => ({ level: label }),
      },
};

const logger: Logger = isDev
  ? pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      },
    })
  : pino(options);

export const httpLogger: Logger = logger.child({ module: "http" });
export const queryLogger: Logger = logger.child({ module: "query" });
export const orderLogger: Logger = logger.child({ module: "orders" });
export const eventLogger: Logger = logger.child({ module: "events" });

export default logger;
