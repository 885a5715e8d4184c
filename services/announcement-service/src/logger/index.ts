import pino, { Logger, LoggerOptions } from "pino";
import dotenv from "dotenv";

dotenv.config();

const isDev = process.env.NODE_ENV === "development";

const options: LoggerOptions = {
    level: process.env.LOG_LEVEL || (isDev ? "debug" : "info"),
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { pid: process.pid },
};

// stderr keeps stdout free for the CLI's JSON output
export const logger: Logger = isDev
    ? pino({
          ...options,
          transport: {
              target: "pino-pretty",
              options: {
                  colorize: true,
                  translateTime: "yyyy-mm-dd HH:MM:ss",
                  ignore: "pid,hostname",
                  destination: 2,
              },
          },
      })
    : pino(options, pino.destination(2));

/**
 * Child logger that emits debug lines regardless of the global level.
 * Used by verbose and probe runs.
 */
export function diagnosticLogger(enabled: boolean): Logger {
    return enabled ? logger.child({ diag: true }, { level: "debug" }) : logger;
}
