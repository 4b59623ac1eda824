/**
 * Test utilities for factmap
 */

export { assertFact, retractFact, datom, transaction } from "./facts.js";
export {
  PersonSchema,
  AgedPersonSchema,
  PERSON_RENAME,
  personAggregate,
  agedPersonAggregate,
} from "./fixtures.js";
export type { Person, AgedPerson } from "./fixtures.js";
