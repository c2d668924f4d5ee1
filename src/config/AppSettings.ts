/**
 * @fileoverview Environment-driven application settings.
 * @module age-graph-bridge/config/AppSettings
 *
 * Variables use `__` as the nesting delimiter:
 *
 * | Variable                     | Default |
 * |------------------------------|---------|
 * | `LOG_LEVEL`                  | `info` (`warning` and `critical` accepted) |
 * | `DB__DSN`                    | (required) |
 * | `DB__ECHO`                   | `false` |
 * | `DB__POOL_MIN_CONNECTIONS`   | `5`     |
 * | `DB__POOL_MAX_CONNECTIONS`   | `10`    |
 * | `DB__POOL_MAX_OVERFLOW`      | `20`    |
 * | `AGE__GRAPH_NAME`            | (required) |
 * | `AGE__LOAD_EXTENSION`        | `true`  |
 */

import { ConnectionSettings } from '../connection/ConnectionSettings.js';
import { LOG_LEVELS, normalizeLogLevel, type LogLevel } from '../logging/logLevel.js';
import { ValidationError } from '../utils/errors.js';
import { compileSchema, configAjv, describeValidationErrors } from '../utils/validation.js';

export const PRIMARY_CONNECTION = 'primary';

export { LOG_LEVELS, type LogLevel };

export interface AgeSettings {
  /** Graph that Cypher helpers target by default. */
  graphName: string;
  /** Run `LOAD 'age'` on every session. */
  loadExtension: boolean;
}

export interface DbSettings {
  connections: Record<string, ConnectionSettings>;
}

interface RawAppSettings {
  logLevel: LogLevel;
  db: {
    dsn: string;
    echo: boolean;
    poolMinConnections: number;
    poolMaxConnections: number;
    poolMaxOverflow: number;
  };
  age: AgeSettings;
}

const rawAppSettingsSchema = {
  type: 'object',
  additionalProperties: false,
  required: ['db', 'age'],
  properties: {
    logLevel: { type: 'string', enum: [...LOG_LEVELS], default: 'info' },
    db: {
      type: 'object',
      additionalProperties: false,
      required: ['dsn'],
      properties: {
        dsn: { type: 'string', minLength: 1 },
        echo: { type: 'boolean', default: false },
        poolMinConnections: { type: 'integer', minimum: 0, default: 5 },
        poolMaxConnections: { type: 'integer', minimum: 1, default: 10 },
        poolMaxOverflow: { type: 'integer', minimum: 0, default: 20 },
      },
    },
    age: {
      type: 'object',
      additionalProperties: false,
      required: ['graphName'],
      properties: {
        graphName: { type: 'string', pattern: '^[A-Za-z_][A-Za-z0-9_]*$' },
        loadExtension: { type: 'boolean', default: true },
      },
    },
  },
};

const validateRawAppSettings = compileSchema<RawAppSettings>(rawAppSettingsSchema, configAjv);

function definedEntries(values: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined && value !== '') out[key] = value;
  }
  return out;
}

export class AppSettings {
  constructor(
    readonly logLevel: LogLevel,
    readonly db: DbSettings,
    readonly age: AgeSettings,
  ) {}

  /** @throws ValidationError when no primary connection is defined. */
  primaryDatabase(): ConnectionSettings {
    const primary = this.db.connections[PRIMARY_CONNECTION];
    if (!primary) {
      throw new ValidationError('Primary database connection is not defined', undefined, 'AppSettings');
    }
    return primary;
  }
}

/**
 * Reads and validates settings from `env`.
 *
 * @throws ValidationError naming the first invalid or missing variable.
 */
export function loadAppSettings(env: NodeJS.ProcessEnv = process.env): AppSettings {
  const raw: Record<string, unknown> = {
    db: definedEntries({
      dsn: env.DB__DSN,
      echo: env.DB__ECHO,
      poolMinConnections: env.DB__POOL_MIN_CONNECTIONS,
      poolMaxConnections: env.DB__POOL_MAX_CONNECTIONS,
      poolMaxOverflow: env.DB__POOL_MAX_OVERFLOW,
    }),
    age: definedEntries({
      graphName: env.AGE__GRAPH_NAME,
      loadExtension: env.AGE__LOAD_EXTENSION,
    }),
  };
  const logLevel = env.LOG_LEVEL === undefined ? '' : normalizeLogLevel(env.LOG_LEVEL);
  if (logLevel) raw.logLevel = logLevel;

  if (!validateRawAppSettings(raw)) {
    throw new ValidationError(
      `Invalid environment configuration: ${describeValidationErrors(validateRawAppSettings.errors)}`,
      undefined,
      'AppSettings',
    );
  }

  const primary = new ConnectionSettings({
    name: PRIMARY_CONNECTION,
    dsn: raw.db.dsn,
    echo: raw.db.echo,
    poolMinConnections: raw.db.poolMinConnections,
    poolMaxConnections: raw.db.poolMaxConnections,
    poolMaxOverflow: raw.db.poolMaxOverflow,
  });

  return new AppSettings(raw.logLevel, { connections: { [PRIMARY_CONNECTION]: primary } }, raw.age);
}
