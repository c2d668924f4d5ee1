/**
 * @fileoverview Typed vertex/edge record decoded from agtype.
 * @module age-graph-bridge/agtype/GraphRecord
 *
 * A record is immutable: the instance and its property bag are frozen on
 * construction. Records hold no reference to the session that produced them
 * and stay usable after the surrounding transaction ends.
 *
 * Map keys follow AGE's serialization (`start_id`, `end_id`); the class
 * exposes them as `startId`/`endId`. Ids past `Number.MAX_SAFE_INTEGER` are
 * `bigint` and are written back to text as plain JSON numbers.
 */

import { stringify } from 'lossless-json';
import { SchemaMismatchError } from '../utils/errors.js';
import { compileSchema, describeValidationErrors, errorPropertyName } from '../utils/validation.js';
import { decodeAgtypeBatch, parseAgtypeJson } from './AgtypeDecoder.js';
import type {
  AgtypeRow,
  GraphId,
  GraphProperties,
  GraphRecordInit,
  GraphRecordKind,
  GraphRecordMap,
} from './types.js';

const NULLABLE_GRAPH_ID = { graphId: true };

const graphRecordSchema = {
  type: 'object',
  additionalProperties: false,
  required: ['label'],
  properties: {
    label: { type: 'string', minLength: 1 },
    properties: { type: ['object', 'null'] },
    id: NULLABLE_GRAPH_ID,
    start_id: NULLABLE_GRAPH_ID,
    end_id: NULLABLE_GRAPH_ID,
    kind: { type: ['string', 'null'], enum: ['vertex', 'edge', null] },
  },
};

const validateGraphRecordMap = compileSchema<GraphRecordMap>(graphRecordSchema);

/**
 * `edge` iff both endpoints are set, unless `kind` was given explicitly.
 */
export function classifyGraphRecord(
  record: Pick<GraphRecordInit, 'startId' | 'endId' | 'kind'>,
): GraphRecordKind {
  if (record.kind) return record.kind;
  return record.startId != null && record.endId != null ? 'edge' : 'vertex';
}

function stringifyNonPrimitive(_key: string, value: unknown): unknown {
  switch (typeof value) {
    case 'symbol':
    case 'function':
      return String(value);
    default:
      if (value instanceof Map || value instanceof Set) return String(value);
      return value;
  }
}

function isRecordObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function integerValue(value: number | bigint): bigint | null {
  if (typeof value === 'bigint') return value;
  return Number.isInteger(value) ? BigInt(value) : null;
}

/** `10n` and `10` are the same number; a text round trip turns one into the other. */
function sameNumber(a: number | bigint, b: number | bigint): boolean {
  if (typeof a === 'number' && typeof b === 'number') return a === b || (Number.isNaN(a) && Number.isNaN(b));
  const left = integerValue(a);
  return left !== null && left === integerValue(b);
}

function isNumeric(value: unknown): value is number | bigint {
  return typeof value === 'number' || typeof value === 'bigint';
}

/** Structural equality, insensitive to object key order. */
function sameValue(a: unknown, b: unknown): boolean {
  if (isNumeric(a) && isNumeric(b)) return sameNumber(a, b);
  if (Array.isArray(a) || Array.isArray(b)) {
    return (
      Array.isArray(a) &&
      Array.isArray(b) &&
      a.length === b.length &&
      a.every((item, index) => sameValue(item, b[index]))
    );
  }
  if (isRecordObject(a) && isRecordObject(b)) {
    const keys = Object.keys(a);
    return (
      keys.length === Object.keys(b).length &&
      keys.every((key) => Object.hasOwn(b, key) && sameValue(a[key], b[key]))
    );
  }
  return Object.is(a, b);
}

function sameGraphId(a: GraphId | null, b: GraphId | null): boolean {
  if (a === null || b === null) return a === b;
  return sameNumber(a, b);
}

export class GraphRecord {
  readonly label: string;
  readonly properties: Readonly<GraphProperties>;
  readonly id: GraphId | null;
  readonly startId: GraphId | null;
  readonly endId: GraphId | null;
  /** Kind given at construction, if any. */
  readonly explicitKind: GraphRecordKind | null;

  constructor(init: GraphRecordInit) {
    if (typeof init.label !== 'string' || init.label.length === 0) {
      throw new SchemaMismatchError('GraphRecord requires a non-empty label', 'label');
    }
    this.label = init.label;
    this.properties = Object.freeze({ ...(init.properties ?? {}) });
    this.id = init.id ?? null;
    this.startId = init.startId ?? null;
    this.endId = init.endId ?? null;
    this.explicitKind = init.kind ?? null;
    Object.freeze(this);
  }

  get kind(): GraphRecordKind {
    return classifyGraphRecord({ startId: this.startId, endId: this.endId, kind: this.explicitKind });
  }

  get isVertex(): boolean {
    return this.kind === 'vertex';
  }

  get isEdge(): boolean {
    return this.kind === 'edge';
  }

  toMap(): GraphRecordMap {
    const map: GraphRecordMap = {
      label: this.label,
      properties: { ...this.properties },
      id: this.id,
      start_id: this.startId,
      end_id: this.endId,
    };
    if (this.explicitKind) map.kind = this.explicitKind;
    return map;
  }

  /** JSON text; `bigint` ids and properties are written as numbers. */
  toText(): string {
    // toMap() is always an object, which always serializes.
    return stringify(this.toMap(), stringifyNonPrimitive) ?? '';
  }

  /**
   * Field-by-field comparison. Property order does not matter; a `bigint`
   * equals a `number` of the same value.
   */
  equals(other: GraphRecord): boolean {
    return (
      this.label === other.label &&
      this.explicitKind === other.explicitKind &&
      sameGraphId(this.id, other.id) &&
      sameGraphId(this.startId, other.startId) &&
      sameGraphId(this.endId, other.endId) &&
      sameValue(this.properties, other.properties)
    );
  }

  /**
   * Builds a record from a decoded map.
   *
   * @throws SchemaMismatchError naming the unknown, missing or mistyped key.
   */
  static fromMap(data: unknown): GraphRecord {
    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
      throw new SchemaMismatchError(
        `Expected a vertex or edge object, got ${Array.isArray(data) ? 'array' : typeof data}`,
        null,
      );
    }
    if (!validateGraphRecordMap(data)) {
      const [first] = validateGraphRecordMap.errors ?? [];
      const key = first ? errorPropertyName(first) : null;
      throw new SchemaMismatchError(
        `Decoded value does not match the graph record shape: ${describeValidationErrors(validateGraphRecordMap.errors)}`,
        key,
        { keys: Object.keys(data) },
      );
    }
    return new GraphRecord({
      label: data.label,
      properties: data.properties,
      id: data.id,
      startId: data.start_id,
      endId: data.end_id,
      kind: data.kind,
    });
  }

  /** @throws DecodeError when `text` is not JSON. */
  static fromText(text: string): GraphRecord {
    return GraphRecord.fromMap(parseAgtypeJson(text, 'graph record text'));
  }

  /**
   * Batch-decodes `rows` and builds one record per decoded value, in
   * row/column order.
   */
  static fromDecodedRows(rows: readonly AgtypeRow[]): GraphRecord[] {
    return decodeAgtypeBatch(rows).map((value) => GraphRecord.fromMap(value));
  }
}
