/**
 * Raw record folder: reduces facts into per-entity working records
 */

import type { AttrName, EntityId, Fact, RawRecord, Value } from "./types.js";
import { ENTITY_ID_KEY } from "./types.js";
import type { Slot } from "./nulls.js";
import { isNullValue, mergeIntoRaw } from "./nulls.js";

/**
 * Attribute slots of one entity while a pass is in progress
 */
export type WorkingRecord = Map<AttrName, Slot>;

/**
 * Folded facts for one entity. `resets` names the cardinality-many
 * attributes a null value started over during the pass.
 */
export interface FoldedRecord {
  slots: WorkingRecord;
  resets: ReadonlySet<AttrName>;
}

/**
 * Merges one incoming value into a slot (see nulls.ts)
 */
export type SlotMerge = (prior: Slot | undefined, incoming: Value, many: boolean) => Slot;

/**
 * Copy a raw record into a working record
 */
export function toWorking(record: RawRecord): WorkingRecord {
  return new Map(Object.entries(record));
}

/**
 * Fold facts, in order, into working records keyed by entity id.
 * Each record carries the entity id under the reserved key; facts naming
 * the reserved key itself are ignored.
 */
export function foldFacts(
  facts: readonly Fact[],
  cardinalityMany: ReadonlySet<AttrName>,
  merge: SlotMerge
): Map<EntityId, FoldedRecord> {
  const folded = new Map<EntityId, { slots: WorkingRecord; resets: Set<AttrName> }>();

  for (const fact of facts) {
    if (fact.attribute === ENTITY_ID_KEY) continue;

    let record = folded.get(fact.entity);
    if (!record) {
      record = {
        slots: new Map<AttrName, Slot>([[ENTITY_ID_KEY, fact.entity]]),
        resets: new Set(),
      };
      folded.set(fact.entity, record);
    }

    const many = cardinalityMany.has(fact.attribute);
    if (many && isNullValue(fact.value)) {
      record.resets.add(fact.attribute);
    }
    record.slots.set(fact.attribute, merge(record.slots.get(fact.attribute), fact.value, many));
  }

  return folded;
}

/**
 * Merge folded assertions into raw data, returning the working records of
 * every entity they touch (new entities included). A reset attribute
 * replaces the existing set instead of adding to it.
 */
export function mergeAdditions(
  raw: ReadonlyMap<EntityId, RawRecord>,
  folded: ReadonlyMap<EntityId, FoldedRecord>,
  cardinalityMany: ReadonlySet<AttrName>
): Map<EntityId, WorkingRecord> {
  const touched = new Map<EntityId, WorkingRecord>();

  for (const [entity, additions] of folded) {
    const existing = raw.get(entity);
    const record: WorkingRecord = existing ? toWorking(existing) : new Map();

    for (const [attribute, slot] of additions.slots) {
      if (additions.resets.has(attribute)) {
        record.set(attribute, slot);
      } else {
        const many = cardinalityMany.has(attribute);
        record.set(attribute, mergeIntoRaw(record.get(attribute), slot, many));
      }
    }

    touched.set(entity, record);
  }

  return touched;
}
