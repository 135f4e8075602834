/**
 * Logger
 *
 * pino loggers for the secret-sharing layer. Field arithmetic and
 * interpolation never log.
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

export type { Logger } from 'pino';

export interface LoggerOptions {
  /** Minimum level to emit (default: GF256_LOG_LEVEL, else 'silent') */
  level?: LevelWithSilent;

  /** Logger name attached to every record */
  name?: string;
}

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLevel(value: string): value is LevelWithSilent {
  return LEVELS.some((level) => level === value);
}

/**
 * Level from the GF256_LOG_LEVEL environment variable, if it names one
 */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LevelWithSilent | undefined {
  const value = env.GF256_LOG_LEVEL?.trim().toLowerCase();
  return value !== undefined && isLevel(value) ? value : undefined;
}

/**
 * Create a logger
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = levelFromEnv() ?? 'silent', name = 'gf256' } = options;
  return pino({ name, level });
}
