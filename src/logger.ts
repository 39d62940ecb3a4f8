/**
 * Structured logging with pino.
 *
 * JSON lines with ISO timestamps; level from LOG_LEVEL (default 'info').
 * Components take an injected logger and fall back to a child of this one.
 */

import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

export const logger: Logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'failure-similarity' },
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export function createLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}
