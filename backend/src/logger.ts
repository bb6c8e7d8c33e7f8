import pino from "pino";
import { getConfig } from "./config/env.js";

const config = getConfig();

const isDevelopment = config.nodeEnv === "development";

export type Logger = pino.Logger;

export const logger = pino({
  level: config.logLevel,
  transport: isDevelopment
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss Z",
          ignore: "pid,hostname",
        },
      }
    : undefined,
});

export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
