import { describe, expect, it } from "vitest";
import {
  MAX_NAME_INDEX,
  ScopeNameCursor,
  ScopeNamePool,
} from "../../../src/compiler/ir/optimizer/scope_names.js";

describe("scope name pool", () => {
  it("builds paired names from the index", () => {
    const pool = ScopeNamePool.create(3);
    expect(pool.size).toBe(3);
    expect(pool.inner).toEqual([
      "threading$inner$0",
      "threading$inner$1",
      "threading$inner$2",
    ]);
    expect(pool.outer[2]).toBe("threading$outer$2");
    expect(Object.isFrozen(pool.inner)).toBe(true);
  });

  it("shares one default pool", () => {
    const first = ScopeNamePool.shared();
    expect(ScopeNamePool.shared()).toBe(first);
    expect(first.size).toBe(MAX_NAME_INDEX);
    expect(first.inner[MAX_NAME_INDEX - 1]).toBe("threading$inner$999");
  });

  it("hands out pairs until the pool is exhausted", () => {
    const cursor = new ScopeNameCursor(ScopeNamePool.create(2));
    expect(cursor.reserve(1)).toEqual([
      { inner: "threading$inner$0", outer: "threading$outer$0" },
    ]);
    expect(cursor.reserve(1)).toEqual([
      { inner: "threading$inner$1", outer: "threading$outer$1" },
    ]);
    expect(cursor.reserve(1)).toBeNull();
  });

  it("reserves all requested pairs or none", () => {
    const cursor = new ScopeNameCursor(ScopeNamePool.create(3));
    expect(cursor.reserve(2)).toHaveLength(2);
    expect(cursor.reserve(2)).toBeNull();
    expect(cursor.reserve(1)?.[0].inner).toBe("threading$inner$2");
  });

  it("passes over names the function already uses", () => {
    const cursor = new ScopeNameCursor(
      ScopeNamePool.create(3),
      new Set(["threading$outer$0"]),
    );
    expect(cursor.reserve(2)?.map((pair) => pair.inner)).toEqual([
      "threading$inner$1",
      "threading$inner$2",
    ]);
  });

  it("keeps separate cursors independent", () => {
    const pool = ScopeNamePool.create(1);
    expect(new ScopeNameCursor(pool).reserve(1)).not.toBeNull();
    expect(new ScopeNameCursor(pool).reserve(1)).not.toBeNull();
  });

  it("rejects invalid limits", () => {
    expect(() => ScopeNamePool.create(-1)).toThrow(RangeError);
  });
});
