/**
 * @fileoverview Engine, session and lifecycle types for the connection layer.
 * @module age-graph-bridge/connection/types
 */

import type { ConnectionSettings } from './ConnectionSettings.js';

/**
 * Engine construction parameters derived from {@link ConnectionSettings}.
 * Times are in seconds. Absent keys mean "driver default".
 */
export interface EngineParameters {
  /** Log every statement. */
  echo: boolean;
  /** Connections are always handed out first-in-first-out. */
  poolUseLifo: false;
  poolSize?: number;
  maxOverflow?: number;
  poolMaxConnections?: number;
  poolTimeout?: number;
  poolRecycle?: number;
  poolMaxIdleTime?: number;
  poolMaxLifetime?: number;
  poolPrePing?: boolean;
  commandTimeout?: number;
  keepAlive?: boolean;
  keepAliveIdle?: number;
  encoding?: string;
  timezone?: string;
  readonly?: boolean;
}

export type QueryRow = Record<string, unknown>;

/** One checked-out connection. Must be released exactly once. */
export interface EngineConnection {
  query(text: string, values?: readonly unknown[]): Promise<QueryRow[]>;
  /** Returns the connection to the pool; passing an error discards it instead. */
  release(error?: Error): void;
}

/** A pool of connections to one database target. */
export interface GraphEngine {
  connect(): Promise<EngineConnection>;
  /** Closes every pooled connection. */
  dispose(): Promise<void>;
}

export interface EngineFactory {
  create(settings: ConnectionSettings, parameters: EngineParameters): GraphEngine | Promise<GraphEngine>;
}

export const ISOLATION_LEVELS = [
  'READ UNCOMMITTED',
  'READ COMMITTED',
  'REPEATABLE READ',
  'SERIALIZABLE',
] as const;

export type IsolationLevel = (typeof ISOLATION_LEVELS)[number];

export function isIsolationLevel(value: unknown): value is IsolationLevel {
  return ISOLATION_LEVELS.some((level) => level === value);
}

export type LifecycleState = 'UNINITIALIZED' | 'ENGINE_READY' | 'SESSION_FACTORY_READY';

export interface ScopedTransactionOptions {
  /** Applied to the transaction before the body runs. */
  isolationLevel?: IsolationLevel;
  /** Aborting rolls the transaction back even if the body resolves. */
  signal?: AbortSignal;
}
