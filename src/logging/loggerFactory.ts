/**
 * @fileoverview Process-wide logger factory.
 *
 * Components call `createLogger('ConnectionLifecycleManager')` and receive a
 * child of the root logger bound to `{ component }`. Hosts replace the
 * implementation with `setLoggerFactory`; tests restore it with
 * `resetLoggerFactory`.
 */

import type { LoggerOptions } from 'pino';
import type { ILogger } from './ILogger.js';
import { PinoLogger } from './PinoLogger.js';
import { resolveLogLevel } from './logLevel.js';

export type LoggerFactory = (component: string) => ILogger;

let rootLogger: ILogger | null = null;

function defaultOptions(): LoggerOptions {
  return {
    name: 'age-graph-bridge',
    level: resolveLogLevel(process.env.LOG_LEVEL),
  };
}

const defaultFactory: LoggerFactory = (component) => {
  rootLogger ??= new PinoLogger(defaultOptions());
  return rootLogger.child({ component });
};

let activeFactory: LoggerFactory = defaultFactory;

export function createLogger(component: string): ILogger {
  return activeFactory(component);
}

export function setLoggerFactory(factory: LoggerFactory): void {
  activeFactory = factory;
}

/** Rebuilds the default pino root with `options`, e.g. a level from AppSettings. */
export function configureRootLogger(options: LoggerOptions): void {
  rootLogger = new PinoLogger({ ...defaultOptions(), ...options });
  activeFactory = defaultFactory;
}

export function resetLoggerFactory(): void {
  rootLogger = null;
  activeFactory = defaultFactory;
}
