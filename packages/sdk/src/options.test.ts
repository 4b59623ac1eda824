/**
 * Tests for option validation
 */

import { describe, it, expect } from "vitest";
import { resolveOptions } from "./options.js";
import { InvalidOptionsError } from "./errors.js";
import { personAggregate } from "@factmap/testkit";

describe("resolveOptions", () => {
  it("defaults to no cardinality-many attributes and no index", () => {
    expect(resolveOptions(undefined)).toEqual({ cardinalityMany: new Set(), indexBy: undefined });
    expect(resolveOptions({})).toEqual({ cardinalityMany: new Set(), indexBy: undefined });
  });

  it("accepts a single attribute, a list or a set", () => {
    expect(resolveOptions({ cardinalityMany: "name" }).cardinalityMany).toEqual(new Set(["name"]));
    expect(resolveOptions({ cardinalityMany: ["name", "tags"] }).cardinalityMany).toEqual(
      new Set(["name", "tags"])
    );
    expect(resolveOptions({ cardinalityMany: new Set(["tags"]) }).cardinalityMany).toEqual(new Set(["tags"]));
  });

  it("keeps the index field", () => {
    expect(resolveOptions({ indexBy: "identifier" }).indexBy).toBe("identifier");
  });

  it("accepts a typed aggregate", () => {
    expect(() => resolveOptions({ aggregate: personAggregate() })).not.toThrow();
  });

  it("rejects an index field of the wrong type", () => {
    expect(() => resolveOptions({ indexBy: 5 })).toThrow(
      "Invalid entity map options: indexBy: Expected string, received number"
    );
  });

  it("rejects a typed aggregate without a zod schema", () => {
    expect(() => resolveOptions({ aggregate: { kind: "typed", schema: {}, rename: {} } })).toThrow(
      "aggregate.schema: typed aggregate requires a zod schema"
    );
  });

  it("rejects empty attribute names", () => {
    expect(() => resolveOptions({ cardinalityMany: [""] })).toThrow(InvalidOptionsError);
  });

  it("lists every issue on the error", () => {
    try {
      resolveOptions({ indexBy: 5, aggregate: { kind: "other" } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidOptionsError);
      if (error instanceof InvalidOptionsError) {
        expect(error.code).toBe("E_OPTIONS");
        expect(error.issues).toHaveLength(2);
        expect(error.issues[0]).toBe("indexBy: Expected string, received number");
      }
    }
  });
});
