import pino from 'pino';
import type { Logger } from 'pino';
import type { AppConfig } from '../config/Config.js';

export type { Logger };

/**
 * JSON lines on stderr. Stdout is left to the tools, which write converted
 * records and reports there.
 */
export const createLogger = (config: AppConfig): Logger => {
  return pino(
    {
      level: config.app.logLevel,
      base: { service: 'tx-format-converter', env: config.app.env },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2),
  );
};
