import { describe, expect, it } from "vitest";
import { ExpressionKind } from "../../../src/compiler/ir/expression.js";
import {
  countDispatchUses,
  useCount,
} from "../../../src/compiler/ir/optimizer/analysis/dispatch_uses.js";
import { parseFunction } from "./helpers.js";

describe("dispatch use counting", () => {
  it("counts checks and constant writes per value", () => {
    const func = parseFunction(`
      (func $f (param $x) (local $label)
        (if (local.get $x)
          (local.set $label (i32.const 2))
          (local.set $label (i32.const 3)))
        (local.set $label (i32.const 2))
        (if (i32.eq (local.get $label) (i32.const 2))
          (call $a)
          (if (i32.eq (local.get $label) (i32.const 3)) (call $b)))
        (if (i32.eq (local.get $label) (i32.const 3)) (call $c)))`);

    const uses = countDispatchUses(func.body, func.getLocalIndex("label"));
    expect([...uses.sets]).toEqual([
      [2, 2],
      [3, 1],
    ]);
    expect(useCount(uses.checks, 2)).toBe(1);
    expect(useCount(uses.checks, 3)).toBe(2);
    expect(useCount(uses.checks, 9)).toBe(0);
    expect(uses.untracked).toBe(0);
  });

  it("counts a subtree on its own", () => {
    const func = parseFunction(`
      (func $f (local $label)
        (block $origin (local.set $label (i32.const 7)))
        (local.set $label (i32.const 7)))`);
    if (func.body.kind !== ExpressionKind.Block) throw new Error("expected a block body");

    const dispatchIndex = func.getLocalIndex("label");
    expect(useCount(countDispatchUses(func.body, dispatchIndex).sets, 7)).toBe(2);
    expect(
      useCount(countDispatchUses(func.body.list[0], dispatchIndex).sets, 7),
    ).toBe(1);
  });

  it("flags reads and writes outside the dispatch shapes", () => {
    const func = parseFunction(`
      (func $f (param $x) (local $label)
        (local.set $label (local.get $x))
        (call $log (local.get $label))
        (if (i32.ne (local.get $label) (i32.const 1)) (nop))
        (if (i32.eq (local.get $label) (local.get $x)) (nop)))`);

    const uses = countDispatchUses(func.body, func.getLocalIndex("label"));
    expect(uses.untracked).toBe(4);
    expect(uses.checks.size).toBe(0);
    expect(uses.sets.size).toBe(0);
  });
});
