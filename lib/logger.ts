import pino from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((l) => l === value);
}

const envLevel = process.env.LOG_LEVEL;

// stdout carries results, so logs always go to stderr.
const logger = pino(
  { name: 'subsift', level: isLogLevel(envLevel) ? envLevel : 'warn' },
  pino.destination(2),
);

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

export default logger;
