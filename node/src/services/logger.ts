// node/src/services/logger.ts — structured logging for backend
import { Logger } from 'tslog';
import type { LogLevelName } from '../config/app.config';

const LEVELS: Record<LogLevelName, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

function isLevelName(value: string | undefined): value is LogLevelName {
  return value !== undefined && value in LEVELS;
}

const envLevel = process.env.LOG_LEVEL;

export const logger = new Logger({
  name: 'hybrid-reasoning',
  minLevel: LEVELS[isLevelName(envLevel) ? envLevel : 'info'],
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} ',
  type: 'pretty',
});

export function setLogLevel(level: LogLevelName): void {
  logger.settings.minLevel = LEVELS[level];
}
