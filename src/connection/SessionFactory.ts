/**
 * @fileoverview Opens ready-to-use graph sessions on an engine.
 * @module age-graph-bridge/connection/SessionFactory
 *
 * Records decoded by a session are frozen values with no link back to it,
 * so they stay readable after commit and release.
 */

import { createLogger } from '../logging/loggerFactory.js';
import type { ILogger } from '../logging/ILogger.js';
import { ResourceError, toError } from '../utils/errors.js';
import { GraphSession } from './GraphSession.js';
import type { EngineConnection, GraphEngine } from './types.js';

export const AGE_SEARCH_PATH = 'ag_catalog, "$user", public';

export interface SessionFactoryOptions {
  /** Log statements issued through sessions. Default: false */
  echo?: boolean;
  /** Run `SELECT 1` on checkout and reconnect once if it fails. Default: true */
  prePing?: boolean;
  /** Run `LOAD 'age'` and set the search path on every session. Default: true */
  loadAgeExtension?: boolean;
  logger?: ILogger;
}

export class SessionFactory {
  private readonly echo: boolean;
  private readonly prePing: boolean;
  private readonly loadAgeExtension: boolean;
  private readonly logger: ILogger;

  constructor(
    readonly engine: GraphEngine,
    options: SessionFactoryOptions = {},
  ) {
    this.echo = options.echo ?? false;
    this.prePing = options.prePing ?? true;
    this.loadAgeExtension = options.loadAgeExtension ?? true;
    this.logger = options.logger ?? createLogger('SessionFactory');
  }

  /**
   * Checks out a connection and prepares it for Cypher. The caller owns the
   * returned session and must release it.
   *
   * @throws ResourceError when no healthy connection can be opened or the
   *   AGE extension cannot be loaded.
   */
  async open(): Promise<GraphSession> {
    let connection = await this.connect();

    if (this.prePing) {
      try {
        await connection.query('SELECT 1');
      } catch (error) {
        this.logger.warn('Pre-ping failed, discarding connection and retrying once', { error });
        connection.release(toError(error));
        connection = await this.connect();
      }
    }

    const session = new GraphSession(connection, { echo: this.echo, logger: this.logger });
    if (this.loadAgeExtension) {
      try {
        await session.query("LOAD 'age'");
        await session.query(`SET search_path = ${AGE_SEARCH_PATH}`);
      } catch (error) {
        session.release(toError(error));
        throw ResourceError.from(error, 'Failed to prepare AGE session', 'SessionFactory');
      }
    }
    return session;
  }

  private async connect(): Promise<EngineConnection> {
    try {
      return await this.engine.connect();
    } catch (error) {
      throw ResourceError.from(error, 'Failed to open a database connection', 'SessionFactory');
    }
  }
}
