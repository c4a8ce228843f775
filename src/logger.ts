import pino, { type Logger } from "pino";

import type { AppConfig } from "./config/app_config";

export function createLogger(config: Pick<AppConfig, "nodeEnv" | "logLevel" | "prettyLogs">): Logger {
  const isDev = config.nodeEnv !== "production";
  const fallbackLevel = config.nodeEnv === "test" ? "silent" : isDev ? "debug" : "info";

  return pino({
    level: config.logLevel ?? fallbackLevel,
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(isDev && config.prettyLogs
      ? {
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              singleLine: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          },
        }
      : {}),
  });
}
