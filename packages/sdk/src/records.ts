/**
 * Conversion of records and rows into facts
 */

import type { AttrName, EntityId, Fact, FactRecord, Row, Value } from "./types.js";
import { MissingPrimaryKeyError } from "./errors.js";

/**
 * Zip each row with the header into a record. Values past the end of the
 * header, and header names past the end of a row, are dropped.
 */
export function rowsToRecords(rows: Iterable<Row>, header: readonly AttrName[]): FactRecord[] {
  const records: FactRecord[] = [];
  for (const row of rows) {
    const length = Math.min(row.length, header.length);
    const entries: Array<[AttrName, Value]> = [];
    for (let i = 0; i < length; i++) {
      entries.push([header[i], row[i]]);
    }
    records.push(Object.fromEntries(entries));
  }
  return records;
}

function entityIdOf(record: FactRecord, primaryKey: AttrName): EntityId {
  const id = Object.hasOwn(record, primaryKey) ? record[primaryKey] : undefined;
  if (typeof id === "string" || typeof id === "number") {
    return id;
  }
  throw new MissingPrimaryKeyError(primaryKey);
}

/**
 * Turn records into assertion facts, one per field, with the primary-key
 * field's value as the entity id.
 *
 * With `overwrite`, every field also gets a null retraction, so each value
 * replaces what the entity held instead of adding to a cardinality-many set.
 *
 * @throws {MissingPrimaryKeyError} if a record's primary key is not a string or number
 */
export function recordsToFacts(
  records: Iterable<FactRecord>,
  primaryKey: AttrName,
  options: { overwrite?: boolean } = {}
): Fact[] {
  const facts: Fact[] = [];
  for (const record of records) {
    const entity = entityIdOf(record, primaryKey);
    for (const [attribute, value] of Object.entries(record)) {
      facts.push({ entity, attribute, value, added: true });
      if (options.overwrite) {
        facts.push({ entity, attribute, value: null, added: false });
      }
    }
  }
  return facts;
}
