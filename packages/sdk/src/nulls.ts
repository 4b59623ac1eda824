/**
 * Null-marker algebra
 *
 * A working attribute slot during a fold is in one of three states:
 * - missing: the attribute key is absent from the working record
 * - NULL_MARKER: the attribute was explicitly cleared in this pass
 * - a present RawValue
 *
 * The marker is resolved to "key removed" or "empty set" by the filter pass
 * (see prune.ts) and never appears in a RawRecord.
 */

import type { RawValue, Scalar, Value } from "./types.js";
import { isValueList, isValueSet, union } from "./values.js";

export const NULL_MARKER: unique symbol = Symbol("factmap.null");
export type NullMarker = typeof NULL_MARKER;

/**
 * A working attribute value; `undefined` where the key is missing
 */
export type Slot = RawValue | NullMarker;

const EMPTY: ReadonlySet<Scalar> = new Set();

/**
 * Check whether a value is null: `null`, `undefined`, `[]` or an empty set.
 * Every scalar, including `0`, `false` and `""`, is non-null.
 */
export function isNullValue(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (isValueList(value)) return value.length === 0;
  if (isValueSet(value)) return value.size === 0;
  return false;
}

/**
 * The value as a RawValue, or `undefined` if it is null
 */
export function presentValue(value: Value): RawValue | undefined {
  if (value === null || value === undefined || isNullValue(value)) return undefined;
  return value;
}

/**
 * Merge one asserted value into a slot.
 *
 * Cardinality-one: null sets the marker and the marker holds for the rest of
 * the pass; anything else replaces the slot, collections as a copy.
 * Cardinality-many: null resets the slot to the marker; later values start a
 * new set from it. Scalars are added, collections unioned.
 */
export function mergeAssertion(prior: Slot | undefined, incoming: Value, many: boolean): Slot {
  const present = presentValue(incoming);
  if (present === undefined) return NULL_MARKER;

  if (many) {
    return union(isValueSet(prior) ? prior : EMPTY, present);
  }

  if (prior === NULL_MARKER) return NULL_MARKER;
  return ownCopy(present);
}

/**
 * Copy a list or set so the raw record does not share it with the caller
 */
function ownCopy(value: RawValue): RawValue {
  if (isValueList(value)) return [...value];
  if (isValueSet(value)) return new Set(value);
  return value;
}

/**
 * Merge one retracted value into a slot. A null retraction clears the
 * attribute whatever else the batch retracts, for both cardinalities.
 */
export function mergeRetraction(prior: Slot | undefined, incoming: Value, many: boolean): Slot {
  if (prior === NULL_MARKER) return NULL_MARKER;
  return mergeAssertion(prior, incoming, many);
}

/**
 * Merge a folded slot into an existing value: a cardinality-many set absorbs
 * whatever arrives, anything else is replaced.
 */
export function mergeIntoRaw(existing: Slot | undefined, incoming: Slot, many: boolean): Slot {
  if (incoming === NULL_MARKER || existing === NULL_MARKER) return NULL_MARKER;
  return many && isValueSet(existing) ? union(existing, incoming) : incoming;
}
