/**
 * Value helpers shared by the fold, retraction and index passes
 */

import { isDeepStrictEqual } from "node:util";
import type { Scalar } from "./types.js";

/**
 * Check whether a value is a single scalar
 */
export function isScalar(value: unknown): value is Scalar {
  const t = typeof value;
  return t === "string" || t === "number" || t === "boolean" || t === "bigint";
}

/**
 * Check whether a value is a set of scalars
 */
export function isValueSet(value: unknown): value is ReadonlySet<Scalar> {
  return value instanceof Set;
}

/**
 * Check whether a value is a list of scalars
 */
export function isValueList(value: unknown): value is readonly Scalar[] {
  return Array.isArray(value);
}

/**
 * Structural equality: sets compare as sets, lists element-wise
 */
export function valueEqual(a: unknown, b: unknown): boolean {
  return isDeepStrictEqual(a, b);
}

/**
 * Union of a set with a scalar, list or set, as a new set
 */
export function union(
  set: ReadonlySet<Scalar>,
  value: Scalar | readonly Scalar[] | ReadonlySet<Scalar>
): ReadonlySet<Scalar> {
  const out = new Set(set);
  if (isScalar(value)) {
    out.add(value);
  } else {
    for (const v of value) out.add(v);
  }
  return out;
}

/**
 * Set minus a scalar, list or set, as a new set
 */
export function difference(
  set: ReadonlySet<Scalar>,
  value: Scalar | readonly Scalar[] | ReadonlySet<Scalar>
): ReadonlySet<Scalar> {
  const out = new Set(set);
  if (isScalar(value)) {
    out.delete(value);
  } else {
    for (const v of value) out.delete(v);
  }
  return out;
}
