import pino from "pino";

import { config } from "./config.js";

const isProd = process.env.NODE_ENV === "production";

export const logger = pino({
  level: config.logLevel,
  base: { service: config.serviceName },
  transport:
    isProd || config.isTestEnvironment
      ? undefined
      : {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
          },
        },
});

export const withConnection = (connectionId?: string) =>
  connectionId ? logger.child({ connectionId }) : logger;
