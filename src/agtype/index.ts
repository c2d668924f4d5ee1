/**
 * Agtype decoding and the graph record model.
 *
 * @module age-graph-bridge/agtype
 */

export {
  AGTYPE_TAG_SEPARATOR,
  GRAPH_ENTITY_TAGS,
  decodeAgtypeBatch,
  decodeAgtypeRow,
  decodeAgtypeRows,
  decodeAgtypeScalar,
  isAgtypeContainer,
  isTaggedAgtype,
  parseAgtypeJson,
  parseAgtypeNumber,
  stripGraphTags,
} from './AgtypeDecoder.js';
export { GraphRecord, classifyGraphRecord } from './GraphRecord.js';
export type {
  AgtypeRow,
  DecodedRow,
  GraphId,
  GraphProperties,
  GraphRecordInit,
  GraphRecordKind,
  GraphRecordMap,
} from './types.js';
