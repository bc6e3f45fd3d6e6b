import { describe, expect, it } from "vitest";
import {
  ExecutionError,
  ExecutionLimitError,
} from "../../../src/compiler/errors/compile_errors.js";
import { executeFunction } from "../../../src/compiler/ir/interpreter.js";
import { parseFunction } from "./helpers.js";

describe("interpreter", () => {
  it("runs loops until the guarded branch falls through", () => {
    const func = parseFunction(`
      (func $count (param $n) (local $i)
        (loop $top
          (call $tick (local.get $i))
          (local.set $i (i32.add (local.get $i) (i32.const 1)))
          (br $top (i32.lt_s (local.get $i) (local.get $n))))
        (return (local.get $i)))`);

    const result = executeFunction(func, [3]);
    expect(result.returnValue).toBe(3);
    expect(result.effects).toEqual([
      { target: "tick", args: [0] },
      { target: "tick", args: [1] },
      { target: "tick", args: [2] },
    ]);
  });

  it("exits named blocks on branch", () => {
    const func = parseFunction(`
      (func $early (param $x)
        (block $done
          (br $done (local.get $x))
          (call $late))
        (call $after))`);

    expect(executeFunction(func, [1]).effects).toEqual([
      { target: "after", args: [] },
    ]);
    expect(executeFunction(func, [0]).effects).toEqual([
      { target: "late", args: [] },
      { target: "after", args: [] },
    ]);
  });

  it("takes the else arm for a zero condition", () => {
    const func = parseFunction(`
      (func $pick (param $x)
        (if (i32.eq (local.get $x) (i32.const 4))
          (return (i32.const 10))
          (return (i32.const 20))))`);

    expect(executeFunction(func, [4]).returnValue).toBe(10);
    expect(executeFunction(func, [5]).returnValue).toBe(20);
  });

  it("wraps arithmetic to 32 bits", () => {
    const func = parseFunction(`
      (func $wrap (param $x)
        (return (i32.add (local.get $x) (i32.const 1))))`);

    expect(executeFunction(func, [2147483647]).returnValue).toBe(-2147483648);
  });

  it("returns null when the body falls off the end", () => {
    const func = parseFunction("(func $empty (nop))");
    expect(executeFunction(func, [])).toEqual({
      returnValue: null,
      effects: [],
    });
  });

  it("stops runaway loops at the step budget", () => {
    const func = parseFunction("(func $spin (loop $l (br $l)))");
    expect(() => executeFunction(func, [], { stepBudget: 50 })).toThrow(
      ExecutionLimitError,
    );
  });

  it("checks the argument count", () => {
    const func = parseFunction("(func $one (param $a) (nop))");
    expect(() => executeFunction(func, [])).toThrow(
      new ExecutionError("one", "expected 1 argument(s), got 0"),
    );
  });
});
