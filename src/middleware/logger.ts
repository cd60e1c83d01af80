/**
 * Shared structured logger.
 *
 * Every module logs through this instance so level and formatting are
 * controlled in one place (LOG_LEVEL). Call style is pino's:
 * `logger.info({ groupId }, 'Safety check started')`, errors under `err`.
 */

import pino from 'pino';
import { config } from '../utils/config.js';

export const logger = pino({
  name: 'safety-circle',
  level: config.LOG_LEVEL,
  base: { pid: process.pid },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
  },
});

export type Logger = typeof logger;
