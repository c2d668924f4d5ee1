/**
 * Log level names accepted from the environment. `warning` and `critical`
 * are read as pino's `warn` and `fatal`.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'fatal'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_ALIASES: Readonly<Record<string, LogLevel>> = {
  warning: 'warn',
  critical: 'fatal',
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Trims, lowercases and resolves aliases; other names pass through unchanged. */
export function normalizeLogLevel(raw: string): string {
  const level = raw.trim().toLowerCase();
  return LEVEL_ALIASES[level] ?? level;
}

/** Like `normalizeLogLevel`, but an empty or unknown name becomes `info`. */
export function resolveLogLevel(raw: string | undefined): LogLevel {
  if (raw === undefined) return 'info';
  const level = normalizeLogLevel(raw);
  return isLogLevel(level) ? level : 'info';
}
