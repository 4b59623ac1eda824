/**
 * Null filter and pruner: resolves null markers and drops empty entities
 */

import type { AttrName, EntityId, RawRecord, RawValue, Scalar } from "./types.js";
import { ENTITY_ID_KEY } from "./types.js";
import { NULL_MARKER } from "./nulls.js";
import type { WorkingRecord } from "./fold.js";
import { isValueSet } from "./values.js";

/**
 * Resolve a working record into a frozen raw record.
 *
 * Missing cardinality-many attributes become empty sets; null markers become
 * an empty set (cardinality-many) or a removed key (cardinality-one).
 * Returns `undefined` when nothing but the id and empty sets remains.
 */
export function resolveRecord(
  working: WorkingRecord,
  cardinalityMany: ReadonlySet<AttrName>
): RawRecord | undefined {
  const entries: Array<[AttrName, RawValue]> = [];

  for (const [attribute, slot] of working) {
    if (slot !== NULL_MARKER) {
      entries.push([attribute, slot]);
    } else if (cardinalityMany.has(attribute)) {
      entries.push([attribute, new Set<Scalar>()]);
    }
  }

  for (const attribute of cardinalityMany) {
    if (!working.has(attribute)) {
      entries.push([attribute, new Set<Scalar>()]);
    }
  }

  const meaningful = entries.some(
    ([attribute, value]) => attribute !== ENTITY_ID_KEY && !(isValueSet(value) && value.size === 0)
  );
  if (!meaningful) return undefined;

  return Object.freeze(Object.fromEntries(entries));
}

/**
 * Copy raw data with the touched entities resolved, pruning those left empty
 */
export function resolveInto(
  raw: ReadonlyMap<EntityId, RawRecord>,
  touched: ReadonlyMap<EntityId, WorkingRecord>,
  cardinalityMany: ReadonlySet<AttrName>
): ReadonlyMap<EntityId, RawRecord> {
  if (touched.size === 0) return raw;

  const next = new Map(raw);
  for (const [entity, working] of touched) {
    const record = resolveRecord(working, cardinalityMany);
    if (record) {
      next.set(entity, record);
    } else {
      next.delete(entity);
    }
  }
  return next;
}
