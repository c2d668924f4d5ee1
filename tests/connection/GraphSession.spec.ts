import { describe, it, expect } from 'vitest';
import { GraphSession, assertIdentifier, buildCypherStatement } from '../../src/connection/GraphSession.js';
import { ResourceError, ValidationError } from '../../src/utils/errors.js';
import { FakeConnection, RecordingLogger, type QueryResponder } from './fakes.js';

function sessionWith(respond?: QueryResponder, echo = false) {
  const connection = new FakeConnection(respond);
  const logger = new RecordingLogger();
  const session = new GraphSession(connection, { echo, logger });
  return { connection, logger, session };
}

describe('buildCypherStatement', () => {
  it('wraps cypher text in the AGE table function', () => {
    expect(buildCypherStatement('geo', 'MATCH (c:City) RETURN c', ['c'], false)).toBe(
      "SELECT * FROM ag_catalog.cypher('geo', $$ MATCH (c:City) RETURN c $$) AS (c agtype)",
    );
  });

  it('adds the parameter placeholder and every column', () => {
    expect(buildCypherStatement('geo', 'MATCH (a)-[r]->(b) RETURN a, r', ['a', 'r'], true)).toBe(
      "SELECT * FROM ag_catalog.cypher('geo', $$ MATCH (a)-[r]->(b) RETURN a, r $$, $1) AS (a agtype, r agtype)",
    );
  });

  it('rejects unsafe graph and column names', () => {
    expect(() => buildCypherStatement("geo'; DROP TABLE x; --", 'RETURN 1', ['r'], false)).toThrow(
      "Invalid graph name 'geo'; DROP TABLE x; --'. Use letters, numbers, and underscores only.",
    );
    expect(() => buildCypherStatement('geo', 'RETURN 1', ['bad column'], false)).toThrow(ValidationError);
  });

  it('rejects an empty column list and dollar quoting inside the text', () => {
    expect(() => buildCypherStatement('geo', 'RETURN 1', [], false)).toThrow(/at least one result column/);
    expect(() => buildCypherStatement('geo', 'RETURN $$x$$', ['r'], false)).toThrow(/may not contain/);
  });

  it('returns valid identifiers unchanged', () => {
    expect(assertIdentifier('_graph_2', 'graph name')).toBe('_graph_2');
  });
});

describe('GraphSession', () => {
  it('decodes cypher results into graph records', async () => {
    const { connection, session } = sessionWith(() => [
      { result: '{"id": 1, "label": "City", "properties": {"name": "NYC"}}::vertex' },
      { result: '{"id": 2, "label": "City", "properties": {"name": "Oslo"}}::vertex' },
    ]);

    const records = await session.cypher('geo', 'MATCH (c:City) RETURN c');

    expect(records.map((record) => record.properties.name)).toEqual(['NYC', 'Oslo']);
    expect(records.every((record) => record.isVertex)).toBe(true);
    expect(connection.statements).toEqual([
      {
        text: "SELECT * FROM ag_catalog.cypher('geo', $$ MATCH (c:City) RETURN c $$) AS (result agtype)",
        values: undefined,
      },
    ]);
  });

  it('sends parameters as a single JSON argument', async () => {
    const { connection, session } = sessionWith();
    await session.cypher('geo', 'MATCH (c:City {name: $name}) RETURN c', { params: { name: 'NYC' } });
    expect(connection.statements[0].values).toEqual(['{"name":"NYC"}']);
  });

  it('decodes rows column by column', async () => {
    const { session } = sessionWith(() => [
      {
        a: '{"id": 1, "label": "City", "properties": {}}::vertex',
        r: '{"id": 3, "label": "ROAD", "start_id": 1, "end_id": 2, "properties": {}}::edge',
      },
    ]);

    const rows = await session.cypherRows('geo', 'MATCH (a)-[r]->() RETURN a, r', { columns: ['a', 'r'] });

    expect(rows).toEqual([
      {
        a: { id: 1, label: 'City', properties: {} },
        r: { id: 3, label: 'ROAD', start_id: 1, end_id: 2, properties: {} },
      },
    ]);
  });

  it('issues transaction statements', async () => {
    const { connection, session } = sessionWith();
    await session.rollback();
    await session.begin('SERIALIZABLE');
    expect(session.isInTransaction).toBe(true);
    await session.commit();
    await session.begin();
    await session.rollback();

    expect(connection.texts).toEqual(['BEGIN ISOLATION LEVEL SERIALIZABLE', 'COMMIT', 'BEGIN', 'ROLLBACK']);
    expect(session.isInTransaction).toBe(false);
  });

  it('releases once and refuses queries afterwards', async () => {
    const { connection, session } = sessionWith();
    session.release();
    session.release(new Error('ignored'));

    expect(connection.releaseCount).toBe(1);
    expect(connection.releaseError).toBeUndefined();
    expect(session.isReleased).toBe(true);
    await expect(session.query('SELECT 1')).rejects.toBeInstanceOf(ResourceError);
  });

  it('logs statements when echo is on', async () => {
    const { logger, session } = sessionWith(undefined, true);
    await session.query('SELECT $1', [1]);
    expect(logger.entries).toEqual([
      { level: 'info', message: 'SQL statement', meta: { sql: 'SELECT $1', parameterCount: 1 } },
    ]);
  });

  it('stays quiet when echo is off', async () => {
    const { logger, session } = sessionWith();
    await session.query('SELECT 1');
    expect(logger.entries).toEqual([]);
  });

  it('creates a graph only when it does not exist', async () => {
    let exists = false;
    const { connection, session } = sessionWith((text) =>
      text.includes('ag_catalog.ag_graph') ? [{ count: exists ? 1 : 0 }] : [],
    );

    expect(await session.createGraph('geo')).toBe(true);
    exists = true;
    expect(await session.createGraph('geo')).toBe(false);

    expect(connection.statements.filter((statement) => statement.text.includes('create_graph'))).toEqual([
      { text: 'SELECT ag_catalog.create_graph($1)', values: ['geo'] },
    ]);
  });
});
