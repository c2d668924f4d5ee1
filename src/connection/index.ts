/**
 * Connection settings, engines, sessions and the per-context lifecycle.
 *
 * @module age-graph-bridge/connection
 */

export { DataSourceName, DEFAULT_POSTGRES_PORT, type DataSourceNameFields } from './DataSourceName.js';
export {
  ConnectionSettings,
  DEFAULT_CONNECTION_OPTIONS,
  type ConnectionOptions,
  type ConnectionSettingsInput,
} from './ConnectionSettings.js';
export { ExecutionContext } from './ExecutionContext.js';
export { PgEngine, PgEngineFactory, buildPoolConfig, DEFAULT_APPLICATION_NAME } from './PgEngine.js';
export {
  GraphSession,
  assertIdentifier,
  buildCypherStatement,
  type CypherOptions,
  type GraphSessionOptions,
} from './GraphSession.js';
export { SessionFactory, AGE_SEARCH_PATH, type SessionFactoryOptions } from './SessionFactory.js';
export {
  ConnectionLifecycleManager,
  type ConnectionLifecycleManagerOptions,
  type HealthStatus,
} from './ConnectionLifecycleManager.js';
export { ConnectionRegistry } from './ConnectionRegistry.js';
export {
  ISOLATION_LEVELS,
  isIsolationLevel,
  type EngineConnection,
  type EngineFactory,
  type EngineParameters,
  type GraphEngine,
  type IsolationLevel,
  type LifecycleState,
  type QueryRow,
  type ScopedTransactionOptions,
} from './types.js';
