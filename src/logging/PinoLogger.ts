import pino, { type Logger, type LoggerOptions } from 'pino';
import type { ILogger } from './ILogger.js';

function serializeMeta(meta?: Record<string, unknown>): Record<string, unknown> {
  if (!meta) return {};
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    out[key] = value instanceof Error ? { name: value.name, message: value.message, stack: value.stack } : value;
  }
  return out;
}

export class PinoLogger implements ILogger {
  private readonly base: Logger;

  constructor(options?: LoggerOptions, existing?: Logger) {
    this.base = existing ?? pino(options);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.base.info(serializeMeta(meta), message);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.base.warn(serializeMeta(meta), message);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.base.error(serializeMeta(meta), message);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.base.debug(serializeMeta(meta), message);
  }

  child(bindings: Record<string, unknown>): ILogger {
    return new PinoLogger(undefined, this.base.child(bindings));
  }
}
