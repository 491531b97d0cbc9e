// src/services/logger.ts: structured logging for the resolver service
import { Logger } from 'tslog';
import type { LogLevelName } from '@/config/app.config';

const LEVEL_IDS: Record<LogLevelName, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export const logger = new Logger({
  name: 'ticket-resolver',
  minLevel: LEVEL_IDS.info,
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} ',
  type: 'pretty',
});

export function setLogLevel(level: LogLevelName): void {
  logger.settings.minLevel = LEVEL_IDS[level];
}

/** Log-safe view of ticket text: length plus a short preview. */
export function previewText(text: string, max = 100): { length: number; preview: string } {
  return { length: text.length, preview: text.slice(0, max) };
}
