/**
 * @fileoverview node-postgres implementation of the engine contract.
 * @module age-graph-bridge/connection/PgEngine
 *
 * One `PgEngine` owns one `pg.Pool`. Creating it performs no I/O; the first
 * connection is opened by `connect()`.
 */

import pg from 'pg';
import type { Pool, PoolClient, PoolConfig } from 'pg';
import { createLogger } from '../logging/loggerFactory.js';
import type { ILogger } from '../logging/ILogger.js';
import type { ConnectionSettings } from './ConnectionSettings.js';
import type {
  EngineConnection,
  EngineFactory,
  EngineParameters,
  GraphEngine,
  QueryRow,
} from './types.js';

export const DEFAULT_APPLICATION_NAME = 'age-graph-bridge';

const SSL_REQUIRED_MODES = new Set(['require', 'verify-ca', 'verify-full']);

function toMillis(seconds: number | undefined): number | undefined {
  return seconds === undefined ? undefined : seconds * 1000;
}

function smallestDefined(...values: Array<number | undefined>): number | undefined {
  const defined = values.filter((value): value is number => value !== undefined);
  return defined.length > 0 ? Math.min(...defined) : undefined;
}

function resolveMaxConnections(parameters: EngineParameters): number | undefined {
  if (parameters.poolSize === undefined) return parameters.poolMaxConnections;
  const withOverflow = parameters.poolSize + (parameters.maxOverflow ?? 0);
  const capped = smallestDefined(withOverflow, parameters.poolMaxConnections);
  return capped === undefined ? undefined : Math.max(1, capped);
}

function buildStartupOptions(parameters: EngineParameters): string | undefined {
  const flags: string[] = [];
  if (parameters.timezone) flags.push(`-c TimeZone=${parameters.timezone.replace(/ /g, '\\ ')}`);
  if (parameters.readonly) flags.push('-c default_transaction_read_only=on');
  return flags.length > 0 ? flags.join(' ') : undefined;
}

/**
 * Translates settings and engine parameters into a `pg.PoolConfig`.
 *
 * - `max` is `poolSize + maxOverflow`, capped by `poolMaxConnections`
 * - `maxLifetimeSeconds` is the smaller of `poolRecycle` and `poolMaxLifetime`
 * - timezone and read-only mode travel as server startup options
 */
export function buildPoolConfig(settings: ConnectionSettings, parameters: EngineParameters): PoolConfig {
  const { dsn } = settings;
  const config: PoolConfig = {
    host: dsn.hostname.replace(/^\[(.*)\]$/, '$1'),
    port: dsn.port,
    application_name: dsn.query?.application_name ?? DEFAULT_APPLICATION_NAME,
  };
  if (dsn.username !== null) config.user = dsn.username;
  if (dsn.password !== null) config.password = dsn.password;
  if (dsn.database !== null) config.database = dsn.database;

  const sslMode = dsn.query?.sslmode;
  if (sslMode === 'disable') {
    config.ssl = false;
  } else if (sslMode !== undefined && SSL_REQUIRED_MODES.has(sslMode)) {
    config.ssl = sslMode === 'require' ? { rejectUnauthorized: false } : true;
  }

  const max = resolveMaxConnections(parameters);
  if (max !== undefined) config.max = max;
  if (parameters.poolSize !== undefined) config.min = Math.min(parameters.poolSize, max ?? parameters.poolSize);

  const connectionTimeout = toMillis(parameters.poolTimeout);
  if (connectionTimeout !== undefined) config.connectionTimeoutMillis = connectionTimeout;
  const idleTimeout = toMillis(parameters.poolMaxIdleTime);
  if (idleTimeout !== undefined) config.idleTimeoutMillis = idleTimeout;
  const lifetime = smallestDefined(parameters.poolRecycle, parameters.poolMaxLifetime);
  if (lifetime !== undefined) config.maxLifetimeSeconds = lifetime;

  const statementTimeout = toMillis(parameters.commandTimeout);
  if (statementTimeout !== undefined) config.statement_timeout = statementTimeout;

  if (parameters.keepAlive !== undefined) config.keepAlive = parameters.keepAlive;
  const keepAliveDelay = toMillis(parameters.keepAliveIdle);
  if (parameters.keepAlive && keepAliveDelay !== undefined) config.keepAliveInitialDelayMillis = keepAliveDelay;

  if (parameters.encoding) config.client_encoding = parameters.encoding;
  const options = buildStartupOptions(parameters);
  if (options) config.options = options;

  return config;
}

class PgConnection implements EngineConnection {
  constructor(private readonly client: PoolClient) {}

  async query(text: string, values?: readonly unknown[]): Promise<QueryRow[]> {
    const result = await this.client.query<QueryRow>(text, values ? [...values] : undefined);
    return result.rows;
  }

  release(error?: Error): void {
    this.client.release(error);
  }
}

export class PgEngine implements GraphEngine {
  constructor(
    private readonly pool: Pool,
    private readonly logger: ILogger = createLogger('PgEngine'),
  ) {
    // pg emits idle-client failures on the pool; an 'error' event with no
    // listener terminates the process.
    this.pool.on('error', (error) => {
      this.logger.error('Idle pg client failed', { error });
    });
  }

  async connect(): Promise<EngineConnection> {
    const client = await this.pool.connect();
    return new PgConnection(client);
  }

  async dispose(): Promise<void> {
    await this.pool.end();
  }

  stats(): { total: number; idle: number; waiting: number } {
    return {
      total: this.pool.totalCount,
      idle: this.pool.idleCount,
      waiting: this.pool.waitingCount,
    };
  }
}

export class PgEngineFactory implements EngineFactory {
  constructor(private readonly logger: ILogger = createLogger('PgEngineFactory')) {}

  create(settings: ConnectionSettings, parameters: EngineParameters): PgEngine {
    const config = buildPoolConfig(settings, parameters);
    this.logger.debug('Creating pg pool', {
      connection: settings.name,
      dsn: settings.dsn.toSafeString(),
      max: config.max,
      min: config.min,
    });
    return new PgEngine(new pg.Pool(config), this.logger.child({ connection: settings.name }));
  }
}
