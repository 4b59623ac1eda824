/**
 * Tests for the indexer
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { indexView } from "./indexer.js";
import type { EntityId, RawRecord } from "./types.js";

describe("indexView", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  const aggregated = new Map<EntityId, RawRecord>([
    [0, { "db/id": 0, identifier: "a", age: 32 }],
    [1, { "db/id": 1, identifier: "b", age: 40 }],
  ]);

  it("keys by entity id when no field is given", () => {
    const { view, entityIds } = indexView(aggregated, undefined);

    expect(view).toBe(aggregated);
    expect(entityIds.size).toBe(0);
  });

  it("keys by the field's value", () => {
    const { view, entityIds } = indexView(aggregated, "identifier");

    expect([...view.keys()]).toEqual(["a", "b"]);
    expect(view.get("a")).toBe(aggregated.get(0));
    expect([...entityIds]).toEqual([
      ["a", 0],
      ["b", 1],
    ]);
  });

  it("leaves out entities without a scalar at the field", () => {
    const { view, entityIds } = indexView(
      new Map<EntityId, RawRecord>([
        [0, { "db/id": 0, identifier: "a" }],
        [1, { "db/id": 1, age: 40 }],
        [2, { "db/id": 2, identifier: ["x", "y"] }],
        [3, { "db/id": 3, identifier: new Set(["z"]) }],
      ]),
      "identifier"
    );

    expect([...view.keys()]).toEqual(["a"]);
    expect([...entityIds.keys()]).toEqual(["a"]);
  });

  it("keeps falsy index values", () => {
    const { view } = indexView(
      new Map<EntityId, RawRecord>([
        [0, { "db/id": 0, rank: 0 }],
        [1, { "db/id": 1, rank: false }],
      ]),
      "rank"
    );

    expect([...view.keys()]).toEqual([0, false]);
  });

  it("lets the last entity win a collision and logs it", () => {
    vi.stubEnv("FACTMAP_DEBUG", "1");
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});

    const { view, entityIds } = indexView(
      new Map<EntityId, RawRecord>([
        [0, { "db/id": 0, age: 32 }],
        [1, { "db/id": 1, age: 32 }],
      ]),
      "age"
    );

    expect(view.size).toBe(1);
    expect(view.get(32)).toEqual({ "db/id": 1, age: 32 });
    expect(entityIds.get(32)).toBe(1);
    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug.mock.calls[0][0]).toMatch(
      /\[DEBUG\] \[index\.collision\] 1\/age index key 32 already taken by 0; replacing$/
    );
  });

  it("does not log collisions while debug is off", () => {
    vi.stubEnv("FACTMAP_DEBUG", "");
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});

    indexView(
      new Map<EntityId, RawRecord>([
        [0, { "db/id": 0, age: 32 }],
        [1, { "db/id": 1, age: 32 }],
      ]),
      "age"
    );

    expect(debug).not.toHaveBeenCalled();
  });

  it("keys by entity id for the reserved id field", () => {
    const { view } = indexView(aggregated, "db/id");

    expect([...view.keys()]).toEqual([0, 1]);
  });
});
