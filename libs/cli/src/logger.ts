/**
 * CLI logger
 *
 * pino writing JSON lines to stderr, so command output on stdout stays
 * pipeable.
 */

import { pino, destination as pinoDestination } from 'pino';
import type { DestinationStream, Logger } from 'pino';
import type { LogLevel } from './config/index.js';

export type { Logger } from 'pino';

export function createLogger(level: LogLevel, destination?: DestinationStream): Logger {
  return pino({ name: 'devnotes', level }, destination ?? pinoDestination({ fd: 2, sync: true }));
}
