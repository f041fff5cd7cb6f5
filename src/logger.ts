// Module logger. Debug output is off unless `debug` is set in the config
// (or KOMPRESS_DEBUG in the environment).

import { LoggerImpl, type Logger } from "@adviser/cement";

export const LOGGER_MODULE = "kompress";

const rootLogger: Logger = new LoggerImpl().With().Module(LOGGER_MODULE).Logger();

export function ensureLogger(opts?: { logger?: Logger; debug?: boolean }): Logger {
  const logger = opts?.logger ?? rootLogger;
  return opts?.debug ? logger.SetDebug(LOGGER_MODULE) : logger;
}
