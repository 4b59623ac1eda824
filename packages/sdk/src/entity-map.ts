/**
 * EntityMap: an immutable, queryable view materialized from facts
 *
 * Invariants:
 * - rawData is the ground truth, always keyed by entity id
 * - the view is derived from rawData and the configuration on every
 *   construction; it is never stored independently
 * - every operation returns a new EntityMap; no instance is mutated
 * - configuration (cardinality-many attributes, index field, aggregator,
 *   rename table) travels with the value, never in module state
 */

import type {
  Aggregate,
  AggregateSpec,
  AttrName,
  EntityId,
  EntityMapOptions,
  EntityMapStats,
  Fact,
  FactRecord,
  IndexKey,
  PlainAggregate,
  PutAttributeOptions,
  RawRecord,
  Row,
  Transaction,
  TypedAggregate,
  TypedEntityMapOptions,
  Value,
} from "./types.js";
import { ENTITY_ID_KEY } from "./types.js";
import {
  EntityNotFoundError,
  UnresolvedAttributeError,
  UnresolvedIndexKeyError,
} from "./errors.js";
import type { ResolvedOptions } from "./options.js";
import { resolveOptions } from "./options.js";
import { mergeAssertion, mergeRetraction } from "./nulls.js";
import { foldFacts, mergeAdditions } from "./fold.js";
import { applyRetractions } from "./retract.js";
import { resolveInto } from "./prune.js";
import type { Aggregator } from "./aggregate.js";
import { aggregateAll, aggregatePlain, aggregateTyped, invertRenameTable } from "./aggregate.js";
import { indexView } from "./indexer.js";
import { recordsToFacts, rowsToRecords } from "./records.js";
import { valueEqual } from "./values.js";
import { logger } from "./observability/logs.js";

/**
 * Outcome of {@link EntityMap.putAttribute}
 */
export type PutAttributeResult<A extends Aggregate> =
  | { ok: true; map: EntityMap<A> }
  | { ok: false; error: UnresolvedIndexKeyError | UnresolvedAttributeError };

/**
 * Aggregator plus the table translating aggregate fields back to raw names
 */
interface Projection<A> {
  aggregator: Aggregator<A>;
  fieldToRawAttribute: Readonly<Record<string, AttrName>>;
}

const PLAIN: Projection<RawRecord> = {
  aggregator: aggregatePlain,
  fieldToRawAttribute: {},
};

function typedProjection<A extends Aggregate>(spec: TypedAggregate<A>): Projection<A> {
  return {
    aggregator: (raw) => aggregateTyped(spec, raw),
    fieldToRawAttribute: invertRenameTable(spec.rename),
  };
}

/**
 * Apply a batch of facts to raw data: retractions first, then assertions,
 * with markers resolved and empty entities pruned after each pass
 */
function applyFacts(
  raw: ReadonlyMap<EntityId, RawRecord>,
  facts: readonly Fact[],
  cardinalityMany: ReadonlySet<AttrName>
): ReadonlyMap<EntityId, RawRecord> {
  const assertions = facts.filter((fact) => fact.added);
  const retractions = facts.filter((fact) => !fact.added);

  const retracted = resolveInto(
    raw,
    applyRetractions(raw, foldFacts(retractions, cardinalityMany, mergeRetraction)),
    cardinalityMany
  );

  return resolveInto(
    retracted,
    mergeAdditions(retracted, foldFacts(assertions, cardinalityMany, mergeAssertion), cardinalityMany),
    cardinalityMany
  );
}

function isEntityId(key: IndexKey): key is EntityId {
  return typeof key === "string" || typeof key === "number";
}

/**
 * Immutable map from index key to aggregate, backed by per-entity raw records
 */
export class EntityMap<A extends Aggregate> {
  readonly #raw: ReadonlyMap<EntityId, RawRecord>;
  readonly #view: ReadonlyMap<IndexKey, A>;
  readonly #entityIds: ReadonlyMap<IndexKey, EntityId>;
  readonly #options: ResolvedOptions;
  readonly #projection: Projection<A>;
  readonly #unrepresentable: number;

  private constructor(
    raw: ReadonlyMap<EntityId, RawRecord>,
    options: ResolvedOptions,
    projection: Projection<A>
  ) {
    this.#raw = raw;
    this.#options = options;
    this.#projection = projection;

    const { aggregated, unrepresentable } = aggregateAll(raw, projection.aggregator);
    const { view, entityIds } = indexView(aggregated, options.indexBy);
    this.#view = view;
    this.#entityIds = entityIds;
    this.#unrepresentable = unrepresentable;
  }

  static #open<A extends Aggregate>(
    options: EntityMapOptions | TypedEntityMapOptions<A>
  ): EntityMap<RawRecord> | EntityMap<A> {
    const resolved = resolveOptions(options);
    const raw = new Map<EntityId, RawRecord>();
    const spec = options.aggregate;
    if (spec === undefined || spec.kind === "plain") {
      return new EntityMap(raw, resolved, PLAIN);
    }
    return new EntityMap(raw, resolved, typedProjection(spec));
  }

  // ============ Construction ============

  /**
   * Create an entity map with no entities
   * @throws {InvalidOptionsError} if an option has the wrong shape
   */
  static empty(options?: EntityMapOptions): EntityMap<RawRecord>;
  static empty<A extends Aggregate>(options: TypedEntityMapOptions<A>): EntityMap<A>;
  static empty<A extends Aggregate>(
    options: EntityMapOptions | TypedEntityMapOptions<A> = {}
  ): EntityMap<RawRecord> | EntityMap<A> {
    return EntityMap.#open(options);
  }

  /**
   * Create an entity map from a batch of facts
   */
  static fromFacts(facts: Iterable<Fact>, options?: EntityMapOptions): EntityMap<RawRecord>;
  static fromFacts<A extends Aggregate>(
    facts: Iterable<Fact>,
    options: TypedEntityMapOptions<A>
  ): EntityMap<A>;
  static fromFacts<A extends Aggregate>(
    facts: Iterable<Fact>,
    options: EntityMapOptions | TypedEntityMapOptions<A> = {}
  ): EntityMap<RawRecord> | EntityMap<A> {
    return EntityMap.#open(options).update(facts);
  }

  /**
   * Create an entity map from flat records. Records sharing a primary key are
   * merged: cardinality-many values are unioned, other fields overwritten in
   * order.
   * @throws {MissingPrimaryKeyError} if a record has no usable primary key
   */
  static fromRecords(
    records: Iterable<FactRecord>,
    primaryKey: AttrName,
    options?: EntityMapOptions
  ): EntityMap<RawRecord>;
  static fromRecords<A extends Aggregate>(
    records: Iterable<FactRecord>,
    primaryKey: AttrName,
    options: TypedEntityMapOptions<A>
  ): EntityMap<A>;
  static fromRecords<A extends Aggregate>(
    records: Iterable<FactRecord>,
    primaryKey: AttrName,
    options: EntityMapOptions | TypedEntityMapOptions<A> = {}
  ): EntityMap<RawRecord> | EntityMap<A> {
    return EntityMap.#open(options).update(recordsToFacts(records, primaryKey));
  }

  /**
   * Create an entity map from positional rows and a header of attribute names
   */
  static fromRows(
    rows: Iterable<Row>,
    header: readonly AttrName[],
    primaryKey: AttrName,
    options?: EntityMapOptions
  ): EntityMap<RawRecord>;
  static fromRows<A extends Aggregate>(
    rows: Iterable<Row>,
    header: readonly AttrName[],
    primaryKey: AttrName,
    options: TypedEntityMapOptions<A>
  ): EntityMap<A>;
  static fromRows<A extends Aggregate>(
    rows: Iterable<Row>,
    header: readonly AttrName[],
    primaryKey: AttrName,
    options: EntityMapOptions | TypedEntityMapOptions<A> = {}
  ): EntityMap<RawRecord> | EntityMap<A> {
    return EntityMap.#open(options).update(recordsToFacts(rowsToRecords(rows, header), primaryKey));
  }

  /**
   * Create an entity map from a transaction's added and retracted datoms
   */
  static fromTransaction(transaction: Transaction, options?: EntityMapOptions): EntityMap<RawRecord>;
  static fromTransaction<A extends Aggregate>(
    transaction: Transaction,
    options: TypedEntityMapOptions<A>
  ): EntityMap<A>;
  static fromTransaction<A extends Aggregate>(
    transaction: Transaction,
    options: EntityMapOptions | TypedEntityMapOptions<A> = {}
  ): EntityMap<RawRecord> | EntityMap<A> {
    return EntityMap.#open(options).updateFromTransaction(transaction);
  }

  // ============ Configuration and raw state ============

  /** Ground-truth records keyed by entity id */
  get rawData(): ReadonlyMap<EntityId, RawRecord> {
    return this.#raw;
  }

  /** The view callers read: index key → aggregate */
  get view(): ReadonlyMap<IndexKey, A> {
    return this.#view;
  }

  get cardinalityMany(): ReadonlySet<AttrName> {
    return this.#options.cardinalityMany;
  }

  /** Aggregate field the view is keyed by, if any */
  get indexField(): string | undefined {
    return this.#options.indexBy;
  }

  /** Aggregate field name → raw attribute name */
  get fieldToRawAttribute(): Readonly<Record<string, AttrName>> {
    return this.#projection.fieldToRawAttribute;
  }

  get size(): number {
    return this.#view.size;
  }

  /**
   * Compare raw data against the view. Entities the aggregator rejects are
   * counted in `entities` but not in `visible`.
   */
  stats(): EntityMapStats {
    return {
      entities: this.#raw.size,
      visible: this.#view.size,
      unrepresentable: this.#unrepresentable,
    };
  }

  #withRaw(raw: ReadonlyMap<EntityId, RawRecord>): EntityMap<A> {
    return new EntityMap(raw, this.#options, this.#projection);
  }

  // ============ Updates ============

  /**
   * Apply a batch of facts. Retractions are applied before assertions.
   */
  update(facts: Iterable<Fact>): EntityMap<A> {
    const batch = [...facts];
    const raw = applyFacts(this.#raw, batch, this.#options.cardinalityMany);

    logger.debug("update.applied", {
      details: { facts: batch.length, entities: raw.size },
    });

    return this.#withRaw(raw);
  }

  /**
   * Apply records as full replacements of the fields they carry. For a
   * cardinality-many field the record must hold the complete collection.
   * @throws {MissingPrimaryKeyError} if a record has no usable primary key
   */
  updateFromRecords(records: Iterable<FactRecord>, primaryKey: AttrName): EntityMap<A> {
    return this.update(recordsToFacts(records, primaryKey, { overwrite: true }));
  }

  /**
   * Apply rows, zipped with the header, as records
   */
  updateFromRows(rows: Iterable<Row>, header: readonly AttrName[], primaryKey: AttrName): EntityMap<A> {
    return this.updateFromRecords(rowsToRecords(rows, header), primaryKey);
  }

  /**
   * Apply a transaction's retracted and added datoms
   */
  updateFromTransaction(transaction: Transaction): EntityMap<A> {
    return this.update([...transaction.retractedDatoms, ...transaction.addedDatoms]);
  }

  /**
   * Add or replace one entity from a record holding its primary key
   * @throws {MissingPrimaryKeyError} if the record has no usable primary key
   */
  put(record: FactRecord, primaryKey: AttrName): EntityMap<A> {
    return this.updateFromRecords([record], primaryKey);
  }

  /**
   * Set one attribute of an existing entity, addressed in aggregate vocabulary.
   * A cardinality-many value is added to the set unless `overwriteCollection`
   * is set.
   */
  putAttribute(
    indexKey: IndexKey,
    field: string,
    value: Value,
    options: PutAttributeOptions = {}
  ): PutAttributeResult<A> {
    const entity = this.#resolveEntityId(indexKey);
    if (entity === undefined) {
      return { ok: false, error: new UnresolvedIndexKeyError(indexKey) };
    }

    const attribute = this.#writableAttribute(field);
    if (attribute === undefined) {
      return { ok: false, error: new UnresolvedAttributeError(field) };
    }

    const facts: Fact[] = [{ entity, attribute, value, added: true }];
    if (options.overwriteCollection) {
      facts.push({ entity, attribute, value: null, added: false });
    }

    return { ok: true, map: this.update(facts) };
  }

  /**
   * Remove the entity behind an index key from raw data and the view.
   * Returns this map unchanged when the key is not in the view.
   */
  delete(indexKey: IndexKey): EntityMap<A> {
    if (!this.#view.has(indexKey)) return this;

    const entity = this.#resolveEntityId(indexKey);
    if (entity === undefined) return this;

    const raw = new Map(this.#raw);
    raw.delete(entity);
    return this.#withRaw(raw);
  }

  // ============ Reads ============

  /**
   * Get the aggregate for an index key
   */
  get(indexKey: IndexKey): A | undefined;
  get<D>(indexKey: IndexKey, fallback: D): A | D;
  get<D>(indexKey: IndexKey, fallback?: D): A | D | undefined {
    const value = this.#view.get(indexKey);
    return value === undefined ? fallback : value;
  }

  /**
   * Get one field of the aggregate for an index key
   */
  getAttribute<K extends keyof A & string>(indexKey: IndexKey, field: K): A[K] | undefined;
  getAttribute<K extends keyof A & string, D>(indexKey: IndexKey, field: K, fallback: D): A[K] | D;
  getAttribute<K extends keyof A & string, D>(
    indexKey: IndexKey,
    field: K,
    fallback?: D
  ): A[K] | D | undefined {
    const value = this.#view.get(indexKey);
    if (value === undefined || !Object.hasOwn(value, field)) return fallback;
    return value[field];
  }

  /**
   * Get the aggregate for an index key
   * @throws {EntityNotFoundError} if the view has no entry for the key
   */
  fetchOrThrow(indexKey: IndexKey): A {
    const value = this.#view.get(indexKey);
    if (value === undefined) {
      throw new EntityNotFoundError(indexKey);
    }
    return value;
  }

  has(indexKey: IndexKey): boolean {
    return this.#view.has(indexKey);
  }

  keys(): IndexKey[] {
    return [...this.#view.keys()];
  }

  values(): A[] {
    return [...this.#view.values()];
  }

  entries(): Array<[IndexKey, A]> {
    return [...this.#view.entries()];
  }

  [Symbol.iterator](): IterableIterator<[IndexKey, A]> {
    return this.#view.entries();
  }

  /**
   * Check whether two maps show the same view. Configuration is ignored.
   */
  equals<B extends Aggregate>(other: EntityMap<B>): boolean {
    return valueEqual(this.#view, other.view);
  }

  // ============ Re-derivation ============

  /**
   * Re-key the view by an aggregate field, or by entity id when `field` is
   * undefined. Raw data is shared, not copied.
   */
  indexBy(field: string | undefined): EntityMap<A> {
    const options = resolveOptions({ cardinalityMany: this.#options.cardinalityMany, indexBy: field });
    return new EntityMap(this.#raw, options, this.#projection);
  }

  /**
   * Re-aggregate the same raw data into another shape, keyed by entity id
   * unless an index field in the new vocabulary is given
   */
  aggregateBy(spec: PlainAggregate, indexBy?: string): EntityMap<RawRecord>;
  aggregateBy<B extends Aggregate>(spec: TypedAggregate<B>, indexBy?: string): EntityMap<B>;
  aggregateBy<B extends Aggregate>(
    spec: AggregateSpec<B>,
    indexBy?: string
  ): EntityMap<RawRecord> | EntityMap<B> {
    const options = resolveOptions({
      cardinalityMany: this.#options.cardinalityMany,
      indexBy,
      aggregate: spec,
    });
    if (spec.kind === "plain") {
      return new EntityMap(this.#raw, options, PLAIN);
    }
    return new EntityMap(this.#raw, options, typedProjection(spec));
  }

  // ============ Key resolution ============

  /**
   * Entity id behind an index key: the entity the view shows under that key.
   * An unindexed map also resolves entities the aggregator rejects, so they
   * can be repaired attribute by attribute.
   */
  #resolveEntityId(indexKey: IndexKey): EntityId | undefined {
    if (this.#options.indexBy === undefined) {
      return isEntityId(indexKey) && this.#raw.has(indexKey) ? indexKey : undefined;
    }
    return this.#entityIds.get(indexKey);
  }

  /**
   * Raw attribute an aggregate field writes to. Raw names the rename table
   * renames away are not aggregate fields; the entity id is not writable.
   */
  #writableAttribute(field: string): AttrName | undefined {
    const table = this.#projection.fieldToRawAttribute;
    let attribute: AttrName = field;
    if (Object.hasOwn(table, field)) {
      attribute = table[field];
    } else if (Object.values(table).includes(field)) {
      return undefined;
    }
    return attribute === ENTITY_ID_KEY ? undefined : attribute;
  }
}
