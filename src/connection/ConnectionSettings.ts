/**
 * @fileoverview Validated configuration for one named database target.
 * @module age-graph-bridge/connection/ConnectionSettings
 *
 * Holds the DSN plus pool, timeout, keepalive and session attributes. Times
 * are in seconds. A `null` value means "let the driver pick its default" and
 * is dropped by {@link ConnectionSettings.deriveEngineParameters}.
 *
 * The DSN accessors (`host`, `port`, `username`, ...) read and write straight
 * through to the underlying {@link DataSourceName}: `settings.host = 'x'`
 * changes `settings.dsn.hostname`.
 */

import { ValidationError } from '../utils/errors.js';
import { compileSchema, describeValidationErrors, errorPropertyName } from '../utils/validation.js';
import { DataSourceName } from './DataSourceName.js';
import type { EngineParameters } from './types.js';

export interface ConnectionOptions {
  /** Log every SQL statement. Default: false */
  echo: boolean;
  /** Client encoding. Default: 'utf8' */
  encoding: string;
  /** IANA timezone for the session. Default: 'UTC' */
  timezone: string;
  /** Open sessions read-only. Default: false */
  readonly: boolean;

  /** Seconds to wait for a pooled connection. Default: 10 */
  connectionTimeout: number | null;
  /** Statement timeout in seconds, null for none. Default: null */
  commandTimeout: number | null;

  /** Connections kept open in the pool. Default: 5 */
  poolMinConnections: number | null;
  /** Hard ceiling on pool size. Default: 10 */
  poolMaxConnections: number | null;
  /** Seconds an idle connection may stay in the pool. Default: 300 */
  poolMaxIdleTime: number | null;
  /** Seconds before any connection is retired. Default: 3600 */
  poolMaxLifetime: number | null;
  /** Seconds after which connections are recycled. Default: 1800 */
  poolRecycleTime: number | null;
  /** Ping a connection before handing it out. Default: true */
  poolPrePing: boolean;
  /** Connections allowed beyond poolMinConnections. Default: 10 */
  poolMaxOverflow: number | null;

  /** TCP keepalives. Default: true */
  keepalives: boolean;
  /** Keepalive idle time in seconds. Default: 60 */
  keepalivesIdle: number | null;
  /** Keepalive probe interval in seconds. Default: 10 */
  keepalivesInterval: number | null;
  /** Keepalive probe count. Default: 5 */
  keepalivesCount: number | null;
}

export interface ConnectionSettingsInput extends Partial<ConnectionOptions> {
  name: string;
  dsn: DataSourceName | string;
}

export const DEFAULT_CONNECTION_OPTIONS: Readonly<ConnectionOptions> = Object.freeze({
  echo: false,
  encoding: 'utf8',
  timezone: 'UTC',
  readonly: false,
  connectionTimeout: 10,
  commandTimeout: null,
  poolMinConnections: 5,
  poolMaxConnections: 10,
  poolMaxIdleTime: 300,
  poolMaxLifetime: 3600,
  poolRecycleTime: 1800,
  poolPrePing: true,
  poolMaxOverflow: 10,
  keepalives: true,
  keepalivesIdle: 60,
  keepalivesInterval: 10,
  keepalivesCount: 5,
});

const nullableCount = (minimum: number) => ({ type: ['integer', 'null'], minimum });

const connectionOptionsSchema = {
  type: 'object',
  additionalProperties: false,
  properties: {
    echo: { type: 'boolean' },
    encoding: { type: 'string', minLength: 1 },
    timezone: { type: 'string', minLength: 1 },
    readonly: { type: 'boolean' },
    connectionTimeout: nullableCount(0),
    commandTimeout: nullableCount(0),
    poolMinConnections: nullableCount(0),
    poolMaxConnections: nullableCount(1),
    poolMaxIdleTime: nullableCount(0),
    poolMaxLifetime: nullableCount(1),
    poolRecycleTime: nullableCount(1),
    poolPrePing: { type: 'boolean' },
    poolMaxOverflow: nullableCount(0),
    keepalives: { type: 'boolean' },
    keepalivesIdle: nullableCount(0),
    keepalivesInterval: nullableCount(1),
    keepalivesCount: nullableCount(1),
  },
};

const validateConnectionOptions = compileSchema<ConnectionOptions>(connectionOptionsSchema);

function setIfPresent<K extends keyof EngineParameters>(
  target: EngineParameters,
  key: K,
  value: EngineParameters[K] | null | undefined,
): void {
  if (value !== null && value !== undefined) {
    target[key] = value;
  }
}

export class ConnectionSettings implements ConnectionOptions {
  readonly name: string;
  readonly dsn: DataSourceName;

  readonly echo: boolean;
  readonly encoding: string;
  readonly timezone: string;
  readonly readonly: boolean;
  readonly connectionTimeout: number | null;
  readonly commandTimeout: number | null;
  readonly poolMinConnections: number | null;
  readonly poolMaxConnections: number | null;
  readonly poolMaxIdleTime: number | null;
  readonly poolMaxLifetime: number | null;
  readonly poolRecycleTime: number | null;
  readonly poolPrePing: boolean;
  readonly poolMaxOverflow: number | null;
  readonly keepalives: boolean;
  readonly keepalivesIdle: number | null;
  readonly keepalivesInterval: number | null;
  readonly keepalivesCount: number | null;

  /**
   * @throws ValidationError for an empty name, an unparseable or non-DSN
   *   `dsn`, or an out-of-range option.
   */
  constructor(input: ConnectionSettingsInput) {
    const { name, dsn, ...overrides } = input;
    if (typeof name !== 'string' || name.trim().length === 0) {
      throw new ValidationError('Connection name must be a non-empty string', { name }, 'ConnectionSettings');
    }
    this.name = name;
    this.dsn = ConnectionSettings.validateDsn(dsn);

    const options: Record<string, unknown> = { ...DEFAULT_CONNECTION_OPTIONS };
    for (const [key, value] of Object.entries(overrides)) {
      if (value !== undefined) options[key] = value;
    }
    if (!validateConnectionOptions(options)) {
      const [first] = validateConnectionOptions.errors ?? [];
      throw new ValidationError(
        `Invalid settings for connection '${name}': ${describeValidationErrors(validateConnectionOptions.errors)}`,
        { name, field: first ? errorPropertyName(first) : null },
        'ConnectionSettings',
      );
    }
    if (
      options.poolMinConnections !== null &&
      options.poolMaxConnections !== null &&
      options.poolMinConnections > options.poolMaxConnections
    ) {
      throw new ValidationError(
        `Invalid settings for connection '${name}': poolMinConnections (${options.poolMinConnections}) exceeds poolMaxConnections (${options.poolMaxConnections})`,
        { name, field: 'poolMinConnections' },
        'ConnectionSettings',
      );
    }

    this.echo = options.echo;
    this.encoding = options.encoding;
    this.timezone = options.timezone;
    this.readonly = options.readonly;
    this.connectionTimeout = options.connectionTimeout;
    this.commandTimeout = options.commandTimeout;
    this.poolMinConnections = options.poolMinConnections;
    this.poolMaxConnections = options.poolMaxConnections;
    this.poolMaxIdleTime = options.poolMaxIdleTime;
    this.poolMaxLifetime = options.poolMaxLifetime;
    this.poolRecycleTime = options.poolRecycleTime;
    this.poolPrePing = options.poolPrePing;
    this.poolMaxOverflow = options.poolMaxOverflow;
    this.keepalives = options.keepalives;
    this.keepalivesIdle = options.keepalivesIdle;
    this.keepalivesInterval = options.keepalivesInterval;
    this.keepalivesCount = options.keepalivesCount;
  }

  /**
   * Strings are parsed; `DataSourceName` instances are taken as is; anything
   * else is rejected.
   */
  static validateDsn(value: unknown): DataSourceName {
    if (typeof value === 'string') return DataSourceName.parse(value);
    if (DataSourceName.isDataSourceName(value)) return value;
    throw new ValidationError(
      'dsn must be a DataSourceName instance or a string that can be parsed into one',
      { received: value === null ? 'null' : typeof value },
      'ConnectionSettings',
    );
  }

  static fromNameAndDsn(name: string, dsn: DataSourceName | string): ConnectionSettings {
    return new ConnectionSettings({ name, dsn });
  }

  // ============================================================================
  // DSN PASS-THROUGH
  // ============================================================================

  get driver(): string {
    return this.dsn.driver;
  }
  set driver(value: string) {
    this.dsn.driver = value;
  }

  get username(): string | null {
    return this.dsn.username;
  }
  set username(value: string | null) {
    this.dsn.username = value;
  }

  get password(): string | null {
    return this.dsn.password;
  }
  set password(value: string | null) {
    this.dsn.password = value ? value : null;
  }

  get host(): string {
    return this.dsn.hostname;
  }
  set host(value: string) {
    this.dsn.hostname = value;
  }

  get port(): number {
    return this.dsn.port;
  }
  set port(value: number) {
    this.dsn.port = value;
  }

  get database(): string {
    return this.dsn.database ?? '';
  }
  set database(value: string) {
    this.dsn.database = value ? value : null;
  }

  get query(): Record<string, string> | null {
    return this.dsn.query;
  }
  set query(value: Record<string, string> | null) {
    this.dsn.query = value ? { ...value } : null;
  }

  // ============================================================================
  // ENGINE PARAMETERS
  // ============================================================================

  /**
   * Maps the pool/timeout attributes onto engine parameter names, leaving out
   * anything set to null so the driver falls back to its own default. The
   * pool always hands out connections first-in-first-out.
   *
   * `keepalivesInterval` and `keepalivesCount` have no node-postgres
   * counterpart and are not forwarded.
   */
  deriveEngineParameters(): EngineParameters {
    const params: EngineParameters = { echo: this.echo, poolUseLifo: false };
    setIfPresent(params, 'poolSize', this.poolMinConnections);
    setIfPresent(params, 'maxOverflow', this.poolMaxOverflow);
    setIfPresent(params, 'poolMaxConnections', this.poolMaxConnections);
    setIfPresent(params, 'poolTimeout', this.connectionTimeout);
    setIfPresent(params, 'poolRecycle', this.poolRecycleTime);
    setIfPresent(params, 'poolMaxIdleTime', this.poolMaxIdleTime);
    setIfPresent(params, 'poolMaxLifetime', this.poolMaxLifetime);
    setIfPresent(params, 'poolPrePing', this.poolPrePing);
    setIfPresent(params, 'commandTimeout', this.commandTimeout);
    setIfPresent(params, 'keepAlive', this.keepalives);
    if (this.keepalives) setIfPresent(params, 'keepAliveIdle', this.keepalivesIdle);
    setIfPresent(params, 'encoding', this.encoding);
    setIfPresent(params, 'timezone', this.timezone);
    setIfPresent(params, 'readonly', this.readonly);
    return params;
  }

  /** Loggable summary with the password masked. */
  toSafeObject(): Record<string, unknown> {
    return {
      name: this.name,
      dsn: this.dsn.toSafeString(),
      poolMinConnections: this.poolMinConnections,
      poolMaxConnections: this.poolMaxConnections,
      poolMaxOverflow: this.poolMaxOverflow,
      readonly: this.readonly,
    };
  }
}
