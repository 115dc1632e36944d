import type { Level } from 'pino';

/**
 * Severity names as they appear on the wire
 */
export type LogLevelName = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR' | 'CRITICAL';

const NAME_TO_PINO: Record<LogLevelName, Level> = {
  DEBUG: 'debug',
  INFO: 'info',
  WARNING: 'warn',
  ERROR: 'error',
  CRITICAL: 'fatal',
};

const PINO_TO_NAME: Record<string, LogLevelName> = {
  trace: 'DEBUG',
  debug: 'DEBUG',
  info: 'INFO',
  warn: 'WARNING',
  error: 'ERROR',
  fatal: 'CRITICAL',
};

function isLevelName(value: string): value is LogLevelName {
  return value in NAME_TO_PINO;
}

/**
 * Accepts either a wire name (WARNING) or a pino name (warn), any case.
 * Returns null for anything else.
 */
export function toPinoLevel(value: string): Level | null {
  const upper = value.trim().toUpperCase();
  if (isLevelName(upper)) {
    return NAME_TO_PINO[upper];
  }
  const lower = value.trim().toLowerCase();
  return lower in PINO_TO_NAME ? NAME_TO_PINO[PINO_TO_NAME[lower]] : null;
}

export function toLevelName(pinoLabel: string): LogLevelName {
  return PINO_TO_NAME[pinoLabel] ?? 'INFO';
}

export function levelMethod(name: LogLevelName): Level {
  return NAME_TO_PINO[name];
}
