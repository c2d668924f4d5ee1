/**
 * @fileoverview Decoding of AGE "agtype" text into plain JavaScript values.
 * @module age-graph-bridge/agtype/AgtypeDecoder
 *
 * node-postgres has no parser registered for the agtype OID, so every agtype
 * column arrives as text: a JSON-like payload optionally suffixed with a
 * `::<type>` tag, e.g. `{"id": 1, "label": "City", "properties": {}}::vertex`.
 *
 * Only container-shaped payloads (`{...}`, `[...]`) are parsed. Tagged
 * scalars such as `42::numeric` stay as text.
 *
 * Parsing goes through lossless-json: integers beyond
 * `Number.MAX_SAFE_INTEGER` (graph ids of most labels) come back as `bigint`
 * instead of being rounded.
 *
 * All functions here are synchronous and pure.
 */

import { isInteger, isSafeNumber, parse } from 'lossless-json';
import { DecodeError } from '../utils/errors.js';
import type { AgtypeRow, DecodedRow } from './types.js';

/** Separator between an agtype payload and its type tag. */
export const AGTYPE_TAG_SEPARATOR = '::';

/** Tags removed before JSON parsing. Everything else is left in place. */
export const GRAPH_ENTITY_TAGS = ['::vertex', '::edge'] as const;

/**
 * Removes every `::vertex` and `::edge` occurrence from `text`.
 *
 * Occurrences are removed anywhere in the text, not just as a suffix, so a
 * path such as `[{...}::vertex, {...}::edge, {...}::vertex]` becomes a plain
 * JSON array. A property string that itself contains `::vertex` is altered
 * too.
 */
export function stripGraphTags(text: string): string {
  let out = text;
  for (const tag of GRAPH_ENTITY_TAGS) {
    out = out.split(tag).join('');
  }
  return out;
}

/** True for string values that carry an agtype tag. */
export function isTaggedAgtype(value: unknown): value is string {
  return typeof value === 'string' && value.includes(AGTYPE_TAG_SEPARATOR);
}

/** Unsafe integers become `bigint`; every other number parses as usual. */
export function parseAgtypeNumber(text: string): number | bigint {
  return isInteger(text) && !isSafeNumber(text) ? BigInt(text) : Number(text);
}

/**
 * `JSON.parse` with lossless integers.
 *
 * @throws DecodeError prefixed with `Malformed <what>` when `text` is not JSON.
 */
export function parseAgtypeJson(text: string, what: string): unknown {
  try {
    return parse(text, null, parseAgtypeNumber);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DecodeError(`Malformed ${what}: ${reason}`, text, err);
  }
}

/** True for `{...}` and `[...]` payloads, the only shapes that get parsed. */
export function isAgtypeContainer(text: string): boolean {
  return (text.startsWith('{') && text.endsWith('}')) || (text.startsWith('[') && text.endsWith(']'));
}

/**
 * Decodes one agtype scalar.
 *
 * `{...}` parses to an object, `[...]` to an array; any other text is
 * returned unchanged.
 *
 * @throws DecodeError when a container-shaped payload is not valid JSON.
 */
export function decodeAgtypeScalar(text: string): unknown {
  if (!isAgtypeContainer(text)) return text;
  return parseAgtypeJson(text, text.startsWith('{') ? 'agtype object' : 'agtype array');
}

/**
 * Decodes every tagged value of one result row.
 *
 * A string containing `::` is parsed when it is a container once its
 * `::vertex`/`::edge` tags are stripped. Anything else, including tagged text
 * that is not a container, is copied unchanged. Column order is preserved.
 */
export function decodeAgtypeRow(row: AgtypeRow): DecodedRow {
  const result: DecodedRow = {};
  for (const [column, value] of Object.entries(row)) {
    result[column] = isTaggedAgtype(value) ? decodeTaggedValue(value) : value;
  }
  return result;
}

function decodeTaggedValue(value: string): unknown {
  const stripped = stripGraphTags(value);
  return isAgtypeContainer(stripped) ? decodeAgtypeScalar(stripped) : value;
}

/** Applies {@link decodeAgtypeRow} to each row. */
export function decodeAgtypeRows(rows: readonly AgtypeRow[]): DecodedRow[] {
  return rows.map((row) => decodeAgtypeRow(row));
}

/**
 * Bulk decode for result sets carrying one agtype column per row.
 *
 * Every tagged string across all rows (row order, then column order) is
 * joined with `,`, stripped of `::vertex`/`::edge`, wrapped in `[...]` and
 * parsed in a single pass. When rows carry several tagged columns
 * the result is flat and the caller maps indexes back to rows.
 *
 * Returns `[]` when no tagged string is found, even for non-empty input.
 *
 * @throws DecodeError for malformed input; no partial result is returned.
 */
export function decodeAgtypeBatch(rows: readonly AgtypeRow[]): unknown[] {
  const tagged: string[] = [];
  for (const row of rows) {
    for (const value of Object.values(row)) {
      if (isTaggedAgtype(value)) tagged.push(value);
    }
  }
  if (tagged.length === 0) return [];

  const jsonArray = `[${stripGraphTags(tagged.join(','))}]`;
  const parsed = parseAgtypeJson(jsonArray, 'agtype batch');
  if (!Array.isArray(parsed)) {
    throw new DecodeError('Malformed agtype batch: expected a JSON array', jsonArray);
  }
  return parsed;
}
