/**
 * factmap SDK
 *
 * Immutable entity maps materialized from entity-attribute-value facts
 */

// Re-export types
export type {
  Scalar,
  Value,
  EntityId,
  AttrName,
  IndexKey,
  Fact,
  Datom,
  Transaction,
  RawValue,
  RawRecord,
  FactRecord,
  Row,
  RenameTable,
  Aggregate,
  PlainAggregate,
  TypedAggregate,
  AggregateSpec,
  AggregateResult,
  EntityMapOptions,
  TypedEntityMapOptions,
  PutAttributeOptions,
  EntityMapStats,
} from "./types.js";
export { ENTITY_ID_KEY } from "./types.js";

// Entity map
export { EntityMap } from "./entity-map.js";
export type { PutAttributeResult } from "./entity-map.js";

// Fact algebra
export { NULL_MARKER, isNullValue, presentValue, mergeAssertion, mergeRetraction } from "./nulls.js";
export type { Slot } from "./nulls.js";
export { foldFacts, mergeAdditions } from "./fold.js";
export type { WorkingRecord, FoldedRecord } from "./fold.js";
export { applyRetractions, retractValue } from "./retract.js";
export { resolveRecord, resolveInto } from "./prune.js";
export { valueEqual } from "./values.js";

// Aggregation and indexing
export {
  aggregatePlain,
  aggregateTyped,
  aggregateAll,
  renameKeys,
  invertRenameTable,
} from "./aggregate.js";
export type { Aggregator } from "./aggregate.js";
export { indexView } from "./indexer.js";
export type { IndexedView } from "./indexer.js";

// Ingestion
export { recordsToFacts, rowsToRecords } from "./records.js";
export { EntityMapOptionsSchema, resolveOptions } from "./options.js";
export type { ResolvedOptions } from "./options.js";

// Observability
export { logger, formatEntry } from "./observability/logs.js";
export type { LogLevel, LogEntry } from "./observability/logs.js";

// Re-export errors
export {
  FactMapError,
  EntityNotFoundError,
  UnresolvedIndexKeyError,
  UnresolvedAttributeError,
  MissingPrimaryKeyError,
  InvalidOptionsError,
} from "./errors.js";
