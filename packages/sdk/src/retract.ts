/**
 * Retraction engine: applies folded retractions to existing raw records
 */

import type { EntityId, RawRecord } from "./types.js";
import { ENTITY_ID_KEY } from "./types.js";
import type { Slot } from "./nulls.js";
import { NULL_MARKER } from "./nulls.js";
import type { FoldedRecord, WorkingRecord } from "./fold.js";
import { toWorking } from "./fold.js";
import { difference, isValueSet, valueEqual } from "./values.js";

/**
 * Retract one value from an existing slot.
 * Returns `undefined` when the attribute key should be removed.
 *
 * - null retraction: marker (cleared by the filter pass)
 * - exact match, sets compared as sets: key removed
 * - set minus scalar, list or set: difference
 * - anything else: unchanged
 */
export function retractValue(existing: Slot | undefined, retracted: Slot): Slot | undefined {
  if (retracted === NULL_MARKER) return NULL_MARKER;
  if (existing === undefined || existing === NULL_MARKER) return existing;
  if (valueEqual(existing, retracted)) return undefined;
  if (isValueSet(existing)) return difference(existing, retracted);
  return existing;
}

/**
 * Apply folded retractions, returning the working records of every existing
 * entity they touch. Entities absent from raw data are skipped, and the
 * reserved entity id key is never removed.
 */
export function applyRetractions(
  raw: ReadonlyMap<EntityId, RawRecord>,
  folded: ReadonlyMap<EntityId, FoldedRecord>
): Map<EntityId, WorkingRecord> {
  const touched = new Map<EntityId, WorkingRecord>();

  for (const [entity, retractions] of folded) {
    const existing = raw.get(entity);
    if (!existing) continue;

    const record = toWorking(existing);
    for (const [attribute, slot] of retractions.slots) {
      if (attribute === ENTITY_ID_KEY) continue;

      const next = retractValue(record.get(attribute), slot);
      if (next === undefined) {
        record.delete(attribute);
      } else {
        record.set(attribute, next);
      }
    }

    touched.set(entity, record);
  }

  return touched;
}
