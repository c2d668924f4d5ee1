/**
 * @fileoverview Shared types for agtype decoding and graph records.
 * @module age-graph-bridge/agtype/types
 */

/** One result row as returned by the SQL layer: column name → raw value. */
export type AgtypeRow = Readonly<Record<string, unknown>>;

/** A row after its tagged values were decoded. */
export type DecodedRow = Record<string, unknown>;

export type GraphRecordKind = 'vertex' | 'edge';

/**
 * AGE graphid. Ids above `Number.MAX_SAFE_INTEGER` (any label past the first
 * few dozen) are carried as `bigint`; smaller ones stay plain numbers.
 */
export type GraphId = number | bigint;

/** Property bag of a vertex or edge. */
export type GraphProperties = Record<string, unknown>;

/**
 * Wire shape of a graph record, keyed the way AGE serializes vertices and
 * edges. `kind` is only present when it was set explicitly.
 */
export interface GraphRecordMap {
  label: string;
  properties?: GraphProperties | null;
  id?: GraphId | null;
  start_id?: GraphId | null;
  end_id?: GraphId | null;
  kind?: GraphRecordKind | null;
}

export interface GraphRecordInit {
  label: string;
  properties?: GraphProperties | null;
  id?: GraphId | null;
  startId?: GraphId | null;
  endId?: GraphId | null;
  /** Overrides classification by `startId`/`endId` when set. */
  kind?: GraphRecordKind | null;
}
