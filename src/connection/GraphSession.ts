/**
 * @fileoverview A checked-out connection with transaction control and
 * Cypher helpers.
 * @module age-graph-bridge/connection/GraphSession
 *
 * Sessions are normally obtained through
 * `ConnectionLifecycleManager.scopedTransaction`, which owns begin, commit,
 * rollback and release. Callers who open a session directly from a
 * `SessionFactory` must call `release()` in a finally block.
 */

import { GraphRecord } from '../agtype/GraphRecord.js';
import { decodeAgtypeRows } from '../agtype/AgtypeDecoder.js';
import type { DecodedRow } from '../agtype/types.js';
import { createLogger } from '../logging/loggerFactory.js';
import type { ILogger } from '../logging/ILogger.js';
import { ResourceError, ValidationError } from '../utils/errors.js';
import { isIsolationLevel, type EngineConnection, type IsolationLevel, type QueryRow } from './types.js';

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface GraphSessionOptions {
  /** Log each statement at info level. */
  echo?: boolean;
  logger?: ILogger;
}

export interface CypherOptions {
  /** Result columns declared in the `AS (...)` clause. Default: `['result']` */
  columns?: readonly string[];
  /** Passed to AGE as the agtype parameter map (`$name` in Cypher). */
  params?: Record<string, unknown>;
}

export function assertIdentifier(value: string, what: string): string {
  if (!IDENTIFIER_PATTERN.test(value)) {
    throw new ValidationError(
      `Invalid ${what} '${value}'. Use letters, numbers, and underscores only.`,
      { [what]: value },
      'GraphSession',
    );
  }
  return value;
}

/**
 * Wraps Cypher text in AGE's `cypher()` table function.
 *
 * ```sql
 * SELECT * FROM ag_catalog.cypher('social', $$ MATCH (n) RETURN n $$) AS (n agtype)
 * ```
 */
export function buildCypherStatement(
  graphName: string,
  cypherText: string,
  columns: readonly string[],
  withParams: boolean,
): string {
  assertIdentifier(graphName, 'graph name');
  if (columns.length === 0) {
    throw new ValidationError('A Cypher query needs at least one result column', undefined, 'GraphSession');
  }
  const columnList = columns.map((column) => `${assertIdentifier(column, 'column name')} agtype`).join(', ');
  if (cypherText.includes('$$')) {
    throw new ValidationError('Cypher text may not contain "$$"', undefined, 'GraphSession');
  }
  const paramsArg = withParams ? ', $1' : '';
  return `SELECT * FROM ag_catalog.cypher('${graphName}', $$ ${cypherText} $$${paramsArg}) AS (${columnList})`;
}

export class GraphSession {
  private released = false;
  private inTransaction = false;
  private readonly echo: boolean;
  private readonly logger: ILogger;

  constructor(
    private readonly connection: EngineConnection,
    options: GraphSessionOptions = {},
  ) {
    this.echo = options.echo ?? false;
    this.logger = options.logger ?? createLogger('GraphSession');
  }

  get isReleased(): boolean {
    return this.released;
  }

  get isInTransaction(): boolean {
    return this.inTransaction;
  }

  async query(text: string, values?: readonly unknown[]): Promise<QueryRow[]> {
    if (this.released) {
      throw new ResourceError('Session has already been released', undefined, undefined, 'GraphSession');
    }
    if (this.echo) {
      this.logger.info('SQL statement', { sql: text, parameterCount: values?.length ?? 0 });
    }
    return this.connection.query(text, values);
  }

  // ============================================================================
  // TRANSACTIONS
  // ============================================================================

  async begin(isolationLevel?: IsolationLevel): Promise<void> {
    if (isolationLevel !== undefined && !isIsolationLevel(isolationLevel)) {
      throw new ValidationError(`Unsupported isolation level '${String(isolationLevel)}'`, {
        isolationLevel,
      }, 'GraphSession');
    }
    await this.query(isolationLevel ? `BEGIN ISOLATION LEVEL ${isolationLevel}` : 'BEGIN');
    this.inTransaction = true;
  }

  async commit(): Promise<void> {
    try {
      await this.query('COMMIT');
    } finally {
      this.inTransaction = false;
    }
  }

  /** No-op outside a transaction. */
  async rollback(): Promise<void> {
    if (!this.inTransaction) return;
    try {
      await this.query('ROLLBACK');
    } finally {
      this.inTransaction = false;
    }
  }

  /**
   * Returns the connection to the pool. Passing an error discards the
   * connection instead. Later calls are ignored.
   */
  release(error?: Error): void {
    if (this.released) return;
    this.released = true;
    this.connection.release(error);
  }

  // ============================================================================
  // CYPHER
  // ============================================================================

  /**
   * Runs a Cypher query and batch-decodes the single agtype column of each
   * row into graph records.
   */
  async cypher(graphName: string, cypherText: string, options: CypherOptions = {}): Promise<GraphRecord[]> {
    const rows = await this.runCypher(graphName, cypherText, options);
    return GraphRecord.fromDecodedRows(rows);
  }

  /** Runs a Cypher query and decodes each row column by column. */
  async cypherRows(graphName: string, cypherText: string, options: CypherOptions = {}): Promise<DecodedRow[]> {
    const rows = await this.runCypher(graphName, cypherText, options);
    return decodeAgtypeRows(rows);
  }

  async graphExists(graphName: string): Promise<boolean> {
    assertIdentifier(graphName, 'graph name');
    const rows = await this.query('SELECT count(*)::int AS count FROM ag_catalog.ag_graph WHERE name = $1', [
      graphName,
    ]);
    return Number(rows[0]?.count ?? 0) > 0;
  }

  /** Creates the graph unless it exists. Resolves to true when created. */
  async createGraph(graphName: string): Promise<boolean> {
    if (await this.graphExists(graphName)) return false;
    await this.query('SELECT ag_catalog.create_graph($1)', [graphName]);
    return true;
  }

  private async runCypher(graphName: string, cypherText: string, options: CypherOptions): Promise<QueryRow[]> {
    const columns = options.columns ?? ['result'];
    const withParams = options.params !== undefined;
    const statement = buildCypherStatement(graphName, cypherText, columns, withParams);
    return this.query(statement, withParams ? [JSON.stringify(options.params)] : undefined);
  }
}
