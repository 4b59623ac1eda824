/**
 * Aggregation of raw records into the caller's shape
 */

import type { ZodIssue } from "zod";
import type {
  Aggregate,
  AggregateResult,
  AttrName,
  EntityId,
  RawRecord,
  RenameTable,
  TypedAggregate,
} from "./types.js";
import { logger } from "./observability/logs.js";

/**
 * Pure function from a raw record to an aggregate, or the reasons it has none
 */
export type Aggregator<A> = (raw: RawRecord) => AggregateResult<A>;

/**
 * Rename the keys of a record through a rename table. Keys the table does
 * not mention keep their names.
 */
export function renameKeys<V>(
  record: Readonly<Record<string, V>>,
  table: RenameTable
): Record<string, V> {
  return Object.fromEntries(
    Object.entries(record).map(([key, value]) => [Object.hasOwn(table, key) ? table[key] : key, value])
  );
}

/**
 * Invert a rename table: aggregate field name → raw attribute name
 */
export function invertRenameTable(table: RenameTable): Readonly<Record<string, AttrName>> {
  return Object.fromEntries(Object.entries(table).map(([raw, field]) => [field, raw]));
}

/**
 * The plain aggregator: every raw record represents itself
 */
export function aggregatePlain(raw: RawRecord): AggregateResult<RawRecord> {
  return { ok: true, value: raw };
}

function formatIssue(issue: ZodIssue): string {
  return `${issue.path.join(".") || "record"}: ${issue.message}`;
}

/**
 * Rename a raw record's keys and parse it with the aggregate's schema
 */
export function aggregateTyped<A extends Aggregate>(
  spec: TypedAggregate<A>,
  raw: RawRecord
): AggregateResult<A> {
  const parsed = spec.schema.safeParse(renameKeys(raw, spec.rename));
  if (parsed.success) {
    return { ok: true, value: parsed.data };
  }
  return { ok: false, issues: parsed.error.issues.map(formatIssue) };
}

/**
 * Aggregate every raw record. Entities the aggregator cannot represent are
 * left out of the result and counted.
 */
export function aggregateAll<A>(
  raw: ReadonlyMap<EntityId, RawRecord>,
  aggregator: Aggregator<A>
): { aggregated: Map<EntityId, A>; unrepresentable: number } {
  const aggregated = new Map<EntityId, A>();
  let unrepresentable = 0;

  for (const [entity, record] of raw) {
    const result = aggregator(record);
    if (result.ok) {
      aggregated.set(entity, result.value);
    } else {
      unrepresentable++;
      if (logger.debugEnabled) {
        logger.debug("aggregate.drop", {
          entity,
          message: "entity cannot be represented by the aggregate",
          details: { issues: result.issues },
        });
      }
    }
  }

  return { aggregated, unrepresentable };
}
