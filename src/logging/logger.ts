import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

export function createLogger(config?: LoggingConfig): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  // pino-pretty cannot share a worker transport with a file destination
  const transport = isJson || config?.file
    ? undefined
    : {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss", ignore: "pid,hostname" },
      };

  const options: pino.LoggerOptions = {
    name: "murmur",
    level,
    ...(transport ? { transport } : {}),
  };

  if (config?.file) {
    return pino(options, pino.destination({ dest: config.file, mkdir: true }));
  }

  return pino(options);
}

/** Scoped logger for one engine component. */
export function componentLogger(logger: Logger, component: string): Logger {
  return logger.child({ component });
}

/** Logger that drops everything; used when no logger is injected. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
