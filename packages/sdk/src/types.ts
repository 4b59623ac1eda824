/**
 * Core types for factmap
 */

import type { z } from "zod";

/**
 * Scalar value an attribute can hold
 */
export type Scalar = string | number | boolean | bigint;

/**
 * Value as it arrives at the API boundary.
 *
 * `null`, `undefined`, an empty list and an empty set are all "null": asserting
 * one clears the attribute, retracting one retracts whatever value is present.
 */
export type Value = Scalar | readonly Scalar[] | ReadonlySet<Scalar> | null | undefined;

/**
 * Entity identifier (the `e` of a fact)
 */
export type EntityId = string | number;

/**
 * Attribute name (the `a` of a fact)
 */
export type AttrName = string;

/**
 * Key of the caller-facing view: the entity id, or an indexed field's value
 */
export type IndexKey = Scalar;

/**
 * An atomic assertion (`added: true`) or retraction (`added: false`) of one
 * attribute's value for one entity
 */
export interface Fact {
  entity: EntityId;
  attribute: AttrName;
  value: Value;
  added: boolean;
}

/**
 * A fact as emitted by the database, stamped with the transaction that wrote it
 */
export interface Datom extends Fact {
  /** Transaction entity id */
  tx: number;
}

/**
 * Result of a database transaction, with its datoms already split
 */
export interface Transaction {
  /** Database basis before the transaction */
  basisTBefore: number;
  /** Database basis after the transaction */
  basisTAfter: number;
  addedDatoms: readonly Datom[];
  retractedDatoms: readonly Datom[];
  /** Temporary ids mapped to the entity ids they resolved to */
  tempIds: ReadonlyMap<number, number>;
}

/**
 * A stored attribute value. Cardinality-many attributes always hold a set.
 */
export type RawValue = Scalar | readonly Scalar[] | ReadonlySet<Scalar>;

/**
 * Ground-truth attribute map of one entity. Always carries the entity id
 * under {@link ENTITY_ID_KEY}.
 */
export type RawRecord = Readonly<Record<AttrName, RawValue>>;

/**
 * A flat record: attribute name to value, including a primary-key field
 */
export type FactRecord = Readonly<Record<AttrName, Value>>;

/**
 * A positional row, zipped with a header to form a {@link FactRecord}
 */
export type Row = readonly Value[];

/**
 * Reserved raw attribute holding the entity's own id
 */
export const ENTITY_ID_KEY = "db/id";

/**
 * Table renaming raw attribute names to aggregate field names
 */
export type RenameTable = Readonly<Record<AttrName, string>>;

/**
 * Caller-facing shape of an entity: readable field by field
 */
export type Aggregate = Readonly<Record<string, unknown>>;

/**
 * Aggregate the raw record as-is
 */
export interface PlainAggregate {
  kind: "plain";
}

/**
 * Rename raw keys, then build a typed value with a zod schema.
 * Fields absent from the raw record take the schema's defaults.
 */
export interface TypedAggregate<A extends Aggregate> {
  kind: "typed";
  schema: z.ZodType<A, z.ZodTypeDef, unknown>;
  /** raw attribute name → aggregate field name */
  rename: RenameTable;
}

/**
 * How raw records become the values callers see
 */
export type AggregateSpec<A extends Aggregate> = PlainAggregate | TypedAggregate<A>;

/**
 * Outcome of aggregating one raw record
 */
export type AggregateResult<A> =
  | { ok: true; value: A }
  | { ok: false; issues: string[] };

interface BaseOptions {
  /** Raw attribute names holding a set of values (default: none) */
  cardinalityMany?: AttrName | readonly AttrName[] | ReadonlySet<AttrName>;
  /** Aggregate field to key the view by (default: entity id) */
  indexBy?: string;
}

/**
 * Configuration options for an entity map of raw records
 */
export interface EntityMapOptions extends BaseOptions {
  /** Aggregation into the caller's shape (default: plain) */
  aggregate?: PlainAggregate;
}

/**
 * Configuration options for an entity map of typed records
 */
export interface TypedEntityMapOptions<A extends Aggregate> extends BaseOptions {
  aggregate: TypedAggregate<A>;
}

/**
 * Options for {@link EntityMap.putAttribute}
 */
export interface PutAttributeOptions {
  /**
   * Replace a cardinality-many value instead of adding to it (default: false)
   */
  overwriteCollection?: boolean;
}

/**
 * Counts comparing ground truth against the visible view
 */
export interface EntityMapStats {
  /** Entities in raw data */
  entities: number;
  /** Entries in the view */
  visible: number;
  /** Entities the aggregator could not represent */
  unrepresentable: number;
}
