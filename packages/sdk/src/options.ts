/**
 * Zod schemas for validating entity map options
 */

import { z } from "zod";
import { InvalidOptionsError } from "./errors.js";
import type { AttrName } from "./types.js";

const AttrNameSchema = z.string().min(1, "attribute names must be non-empty");

const CardinalityManySchema = z.union([
  AttrNameSchema,
  z.array(AttrNameSchema),
  z.set(AttrNameSchema),
]);

const AggregateSpecSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("plain") }),
  z.object({
    kind: z.literal("typed"),
    schema: z.custom<z.ZodTypeAny>((value) => value instanceof z.ZodType, {
      message: "typed aggregate requires a zod schema",
    }),
    rename: z.record(z.string(), AttrNameSchema),
  }),
]);

export const EntityMapOptionsSchema = z.object({
  cardinalityMany: CardinalityManySchema.optional(),
  indexBy: AttrNameSchema.optional(),
  aggregate: AggregateSpecSchema.optional(),
});

/**
 * Options normalized once at construction and carried by every derived map
 */
export interface ResolvedOptions {
  cardinalityMany: ReadonlySet<AttrName>;
  indexBy: string | undefined;
}

/**
 * Validate and normalize the configuration shared by every aggregate kind
 * @throws {InvalidOptionsError} if an option has the wrong shape
 */
export function resolveOptions(options: unknown): ResolvedOptions {
  const parsed = EntityMapOptionsSchema.safeParse(options ?? {});
  if (!parsed.success) {
    throw new InvalidOptionsError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`),
      { cause: parsed.error }
    );
  }

  const { cardinalityMany, indexBy } = parsed.data;
  return {
    cardinalityMany:
      typeof cardinalityMany === "string"
        ? new Set([cardinalityMany])
        : new Set<AttrName>(cardinalityMany ?? []),
    indexBy,
  };
}
