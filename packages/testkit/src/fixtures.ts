/**
 * Typed aggregate fixtures
 */

import { z } from "zod";
import type { TypedAggregate } from "@factmap/sdk";

/**
 * A person: raw `identifier` becomes `id`, raw `name` becomes `names`
 */
export const PersonSchema = z.object({
  id: z.string().optional(),
  names: z.set(z.string()).default(() => new Set<string>()),
  age: z.number().optional(),
});

export type Person = z.infer<typeof PersonSchema>;

/**
 * A person that must have an age
 */
export const AgedPersonSchema = PersonSchema.extend({
  age: z.number(),
});

export type AgedPerson = z.infer<typeof AgedPersonSchema>;

export const PERSON_RENAME = { identifier: "id", name: "names" } as const;

export function personAggregate(): TypedAggregate<Person> {
  return { kind: "typed", schema: PersonSchema, rename: PERSON_RENAME };
}

export function agedPersonAggregate(): TypedAggregate<AgedPerson> {
  return { kind: "typed", schema: AgedPersonSchema, rename: PERSON_RENAME };
}
