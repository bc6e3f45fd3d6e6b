import { afterEach, describe, expect, it, vi } from "vitest";
import { parseModule } from "../../../src/compiler/frontend/parser.js";
import { eliminateNops } from "../../../src/compiler/ir/optimizer/passes/nop_elimination.js";
import { eliminateUnusedScopeNames } from "../../../src/compiler/ir/optimizer/passes/unused_names.js";
import { StructuredOptimizer } from "../../../src/compiler/ir/optimizer/structured_optimizer.js";
import { IF_ELSE_CHAIN, parseFunction, printBody } from "./helpers.js";

const SINGLE_CHECK = `
(func $g (local $label)
  (local.set $label (i32.const 1))
  (if (i32.eq (local.get $label) (i32.const 1)) (call $a)))`;

describe("structured optimizer", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("tidies functions after threading", () => {
    const module = parseModule(`(module ${IF_ELSE_CHAIN})`);
    const report = new StructuredOptimizer().optimize(module);

    expect(report.threadedChecks).toBe(2);
    expect(report.functions[0]).toMatchObject({
      name: "f",
      nopsRemoved: 1,
      namesCleared: 0,
    });
    expect(printBody(module.functions[0])).toBe(
      "(block (block $threading$outer$1 (block $threading$inner$1 (block $threading$outer$0 (block $threading$inner$0 (if (local.get $x) (br $threading$inner$0) (br $threading$inner$1)) (br $threading$outer$0)) (call $a)) (br $threading$outer$1)) (call $b)))",
    );
  });

  it("clears scope names nothing branches to", () => {
    const module = parseModule(`(module
      (func $f (local $label)
        (block $spare
          (local.set $label (i32.const 1))
          (if (i32.eq (local.get $label) (i32.const 1)) (call $a)))))`);
    const report = new StructuredOptimizer().optimize(module);

    expect(report.functions[0].namesCleared).toBe(1);
    expect(printBody(module.functions[0])).toBe(
      "(block (block $threading$outer$0 (block $threading$inner$0 (br $threading$inner$0) (br $threading$outer$0)) (call $a)))",
    );
  });

  it("keeps placeholders when cleanup is off", () => {
    const module = parseModule(`(module ${SINGLE_CHECK})`);
    new StructuredOptimizer({ cleanup: false }).optimize(module);

    expect(printBody(module.functions[0])).toBe(
      "(block (block $threading$outer$0 (block $threading$inner$0 (br $threading$inner$0) (br $threading$outer$0)) (call $a)) (nop))",
    );
  });

  it("does not touch functions without dispatch", () => {
    const module = parseModule(
      "(module (func $g (block $unused (nop) (call $a))))",
    );
    const report = new StructuredOptimizer().optimize(module);

    expect(report.functions[0]).toEqual({
      name: "g",
      threading: {
        changed: false,
        threadedChecks: 0,
        skippedForNames: 0,
        skipped: "no-dispatch-local",
      },
      nopsRemoved: 0,
      namesCleared: 0,
    });
    expect(printBody(module.functions[0])).toBe(
      "(block $unused (nop) (call $a))",
    );
  });

  it("gives each function its own name budget", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const module = parseModule(`(module ${IF_ELSE_CHAIN} ${SINGLE_CHECK})`);
    const report = new StructuredOptimizer({ maxScopeNames: 1 }).optimize(
      module,
    );

    expect(report.threadedChecks).toBe(1);
    expect(report.skippedForNames).toBe(1);
    expect(report.functions.map((fn) => fn.threading.threadedChecks)).toEqual(
      [0, 1],
    );
  });
});

describe("cleanup passes", () => {
  it("keeps one statement in a block of nops", () => {
    const func = parseFunction("(func $n (block (nop) (nop)))");
    expect(eliminateNops(func.body)).toBe(1);
    expect(printBody(func)).toBe("(block (nop))");
  });

  it("clears only names without branches", () => {
    const func = parseFunction(
      "(func $l (param $x) (block $out (loop $spin (br $out (local.get $x)))))",
    );
    expect(eliminateUnusedScopeNames(func.body)).toBe(1);
    expect(printBody(func)).toBe(
      "(block $out (loop (br $out (local.get $x))))",
    );
  });
});
