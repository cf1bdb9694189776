/***
 * Logger — Root pino instance for the library.
 *
 * Silent unless GROWBUF_LOG_LEVEL is set, so embedding applications
 * see nothing by default. Buffers log through child loggers; callers
 * can hand in their own pino logger via BufferOptions.logger.
 *
 ***/

import { pino, type Logger } from "pino";
import { DEFAULT_LOG_LEVEL, LOG_LEVEL_ENV } from "./constants";

export type { Logger };

export const logger: Logger = pino({
  name: "growbuf",
  level: process.env[LOG_LEVEL_ENV] ?? DEFAULT_LOG_LEVEL,
});

export function child_logger(module: string, parent: Logger = logger): Logger {
  return parent.child({ module });
}
