/**
 * @fileoverview Per-execution-context engine and session factory cache.
 * @module age-graph-bridge/connection/ConnectionLifecycleManager
 *
 * A pool bound to one scheduler must not be shared with another, yet every
 * operation inside one scheduler should share a single pool. The manager
 * keeps one handle per {@link ExecutionContext}, passed explicitly by the
 * caller, in a bounded LRU cache:
 *
 * ```
 * UNINITIALIZED ──acquireEngine──▶ ENGINE_READY ──acquireSessionFactory──▶ SESSION_FACTORY_READY
 *       ▲                                   │                                      │
 *       └──────────────── dispose ──────────┴──────────────────────────────────────┘
 * ```
 *
 * Usage:
 * ```typescript
 * const manager = new ConnectionLifecycleManager(settings);
 * const ctx = ExecutionContext.create('worker-1');
 *
 * const cities = await manager.scopedTransaction(ctx, (session) =>
 *   session.cypher('geo', 'MATCH (c:City) RETURN c'),
 * );
 *
 * await manager.dispose(ctx);
 * ```
 */

import { LRUCache, DEFAULT_LRU_MAX_SIZE } from '../cache/LRUCache.js';
import { createLogger } from '../logging/loggerFactory.js';
import type { ILogger } from '../logging/ILogger.js';
import { ResourceError, ValidationError, toError } from '../utils/errors.js';
import type { ConnectionSettings } from './ConnectionSettings.js';
import type { ExecutionContext } from './ExecutionContext.js';
import type { GraphSession } from './GraphSession.js';
import { PgEngineFactory } from './PgEngine.js';
import { SessionFactory } from './SessionFactory.js';
import {
  isIsolationLevel,
  type EngineFactory,
  type GraphEngine,
  type LifecycleState,
  type ScopedTransactionOptions,
} from './types.js';

export interface ConnectionLifecycleManagerOptions {
  /** Builds engines. Default: {@link PgEngineFactory} */
  engineFactory?: EngineFactory;
  /** Most contexts holding a live engine at once. Default: 100 */
  maxContexts?: number;
  /** Load the AGE extension on every session. Default: true */
  loadAgeExtension?: boolean;
  logger?: ILogger;
}

export interface HealthStatus {
  isHealthy: boolean;
  details?: Record<string, unknown> | string;
}

/** Engine and session factory owned by one execution context. */
interface CachedEngineHandle {
  readonly context: ExecutionContext;
  engine: Promise<GraphEngine> | null;
  sessionFactory: Promise<SessionFactory> | null;
}

export class ConnectionLifecycleManager {
  readonly settings: ConnectionSettings;
  private readonly engineFactory: EngineFactory;
  private readonly loadAgeExtension: boolean;
  private readonly logger: ILogger;
  private readonly handles: LRUCache<string, CachedEngineHandle>;

  constructor(settings: ConnectionSettings, options: ConnectionLifecycleManagerOptions = {}) {
    this.settings = settings;
    this.engineFactory = options.engineFactory ?? new PgEngineFactory();
    this.loadAgeExtension = options.loadAgeExtension ?? true;
    this.logger = (options.logger ?? createLogger('ConnectionLifecycleManager')).child({
      connection: settings.name,
    });
    this.handles = new LRUCache<string, CachedEngineHandle>({
      maxSize: options.maxContexts ?? DEFAULT_LRU_MAX_SIZE,
      onEvict: (_id, handle) => this.onHandleEvicted(handle),
    });
  }

  /** Number of contexts with a cached handle. */
  get activeContexts(): number {
    return this.handles.size;
  }

  getState(context: ExecutionContext): LifecycleState {
    const handle = this.handles.peek(context.id);
    if (handle?.sessionFactory) return 'SESSION_FACTORY_READY';
    if (handle?.engine) return 'ENGINE_READY';
    return 'UNINITIALIZED';
  }

  // ============================================================================
  // ACQUISITION
  // ============================================================================

  /**
   * Returns the context's engine, building it on first use. The pending
   * build is stored before this method returns, so concurrent callers in one
   * context share a single engine.
   *
   * @throws ResourceError when the engine cannot be built; the slot is
   *   cleared so a later call retries.
   */
  acquireEngine(context: ExecutionContext): Promise<GraphEngine> {
    const handle = this.handleFor(context);
    if (!handle.engine) {
      const pending = this.createEngine(context);
      handle.engine = pending;
      void pending.catch(() => {
        if (handle.engine === pending) {
          handle.engine = null;
          handle.sessionFactory = null;
        }
      });
    }
    return handle.engine;
  }

  /** Returns the context's session factory, building engine and factory as needed. */
  acquireSessionFactory(context: ExecutionContext): Promise<SessionFactory> {
    const handle = this.handleFor(context);
    if (!handle.sessionFactory) {
      const pending = this.acquireEngine(context).then(
        (engine) =>
          new SessionFactory(engine, {
            echo: this.settings.echo,
            prePing: this.settings.poolPrePing,
            loadAgeExtension: this.loadAgeExtension,
            logger: this.logger.child({ context: context.label }),
          }),
      );
      handle.sessionFactory = pending;
      void pending.catch(() => {
        if (handle.sessionFactory === pending) handle.sessionFactory = null;
      });
    }
    return handle.sessionFactory;
  }

  /**
   * Runs `body` inside a transaction on a fresh session.
   *
   * Commits when `body` resolves, rolls back when it rejects or when
   * `signal` was aborted by the time it settles, and releases the session in
   * every case. The body's error (or the abort reason) is rethrown.
   */
  async scopedTransaction<T>(
    context: ExecutionContext,
    body: (session: GraphSession) => Promise<T>,
    options: ScopedTransactionOptions = {},
  ): Promise<T> {
    const { isolationLevel, signal } = options;
    if (isolationLevel !== undefined && !isIsolationLevel(isolationLevel)) {
      throw new ValidationError(
        `Unsupported isolation level '${String(isolationLevel)}'`,
        { isolationLevel },
        'ConnectionLifecycleManager',
      );
    }
    signal?.throwIfAborted();

    const factory = await this.acquireSessionFactory(context);
    const session = await factory.open();
    let discardReason: Error | undefined;
    try {
      await session.begin(isolationLevel);
      const result = await body(session);
      signal?.throwIfAborted();
      await session.commit();
      return result;
    } catch (error) {
      try {
        await session.rollback();
      } catch (rollbackError) {
        discardReason = toError(rollbackError);
        this.logger.error('Rollback failed; discarding connection', {
          context: context.label,
          error: discardReason,
        });
      }
      this.logger.warn('Transaction rolled back', { context: context.label, error: toError(error) });
      throw error;
    } finally {
      session.release(discardReason);
    }
  }

  /**
   * Checks connectivity for `context` with `SELECT 1`. Never throws; the
   * failure reason is returned in `details`.
   */
  async checkHealth(context: ExecutionContext): Promise<HealthStatus> {
    try {
      const factory = await this.acquireSessionFactory(context);
      const session = await factory.open();
      try {
        const rows = await session.query('SELECT 1 AS ping');
        return {
          isHealthy: true,
          details: {
            ping: rows[0]?.ping,
            connection: this.settings.name,
            dsn: this.settings.dsn.toSafeString(),
          },
        };
      } finally {
        session.release();
      }
    } catch (error) {
      return { isHealthy: false, details: toError(error).message };
    }
  }

  // ============================================================================
  // DISPOSAL
  // ============================================================================

  /**
   * Closes the context's pool and forgets its handle. Other contexts are
   * untouched. Does nothing when no handle is cached.
   *
   * @throws ResourceError when closing the pool fails.
   */
  async dispose(context: ExecutionContext): Promise<void> {
    const handle = this.handles.peek(context.id);
    if (!handle) return;
    this.handles.clear((id) => id === context.id);
    await this.disposeHandle(handle);
  }

  /** Disposes every cached context. Failures are reported after all were attempted. */
  async disposeAll(): Promise<void> {
    const all = this.handles.values();
    this.handles.clear();
    const results = await Promise.allSettled(all.map((handle) => this.disposeHandle(handle)));
    const failures = results.filter((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (failures.length > 0) {
      throw new ResourceError(
        `Failed to dispose ${failures.length} of ${all.length} engines for connection '${this.settings.name}'`,
        failures[0].reason,
        { failures: failures.length },
        'ConnectionLifecycleManager',
      );
    }
  }

  // ============================================================================
  // INTERNALS
  // ============================================================================

  private handleFor(context: ExecutionContext): CachedEngineHandle {
    let handle = this.handles.get(context.id);
    if (!handle) {
      handle = { context, engine: null, sessionFactory: null };
      this.handles.put(context.id, handle);
    }
    return handle;
  }

  private async createEngine(context: ExecutionContext): Promise<GraphEngine> {
    try {
      const parameters = this.settings.deriveEngineParameters();
      const engine = await this.engineFactory.create(this.settings, parameters);
      this.logger.info('Engine created', {
        context: context.label,
        dsn: this.settings.dsn.toSafeString(),
      });
      return engine;
    } catch (error) {
      throw ResourceError.from(
        error,
        `Failed to create engine for connection '${this.settings.name}'`,
        'ConnectionLifecycleManager',
      );
    }
  }

  private async disposeHandle(handle: CachedEngineHandle): Promise<void> {
    const pending = handle.engine;
    handle.engine = null;
    handle.sessionFactory = null;
    if (!pending) return;

    // A failed build was already reported to whoever acquired it.
    const engine = await pending.catch(() => null);
    if (!engine) return;

    try {
      await engine.dispose();
    } catch (error) {
      throw ResourceError.from(
        error,
        `Failed to dispose engine for context '${handle.context.label}'`,
        'ConnectionLifecycleManager',
      );
    }
    this.logger.info('Engine disposed', { context: handle.context.label });
  }

  private onHandleEvicted(handle: CachedEngineHandle): void {
    this.logger.debug('Evicting least recently used context', { context: handle.context.label });
    this.disposeHandle(handle).catch((error: unknown) => {
      this.logger.error('Failed to dispose evicted engine', {
        context: handle.context.label,
        error: toError(error),
      });
    });
  }
}
