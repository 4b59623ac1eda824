/**
 * Builders for facts, datoms and transactions
 */

import type { AttrName, Datom, EntityId, Fact, Transaction, Value } from "@factmap/sdk";

/**
 * An assertion fact
 */
export function assertFact(entity: EntityId, attribute: AttrName, value: Value): Fact {
  return { entity, attribute, value, added: true };
}

/**
 * A retraction fact
 */
export function retractFact(entity: EntityId, attribute: AttrName, value: Value): Fact {
  return { entity, attribute, value, added: false };
}

/**
 * A datom as the database driver would deliver it
 * @param added - Assertion (default) or retraction
 * @param tx - Transaction id (default: 0)
 */
export function datom(
  entity: EntityId,
  attribute: AttrName,
  value: Value,
  added = true,
  tx = 0
): Datom {
  return { entity, attribute, value, added, tx };
}

/**
 * A transaction result with the given datoms already split
 */
export function transaction(
  addedDatoms: readonly Datom[],
  retractedDatoms: readonly Datom[],
  options: { basisTBefore?: number; basisTAfter?: number; tempIds?: ReadonlyMap<number, number> } = {}
): Transaction {
  return {
    basisTBefore: options.basisTBefore ?? 1000,
    basisTAfter: options.basisTAfter ?? 1001,
    addedDatoms,
    retractedDatoms,
    tempIds: options.tempIds ?? new Map(),
  };
}
