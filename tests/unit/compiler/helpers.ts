import { parseModule } from "../../../src/compiler/frontend/parser.js";
import type { IRFunction } from "../../../src/compiler/ir/module.js";
import { printExpression } from "../../../src/compiler/ir/printer.js";

/**
 * Parse a single `(func ...)` form
 */
export const parseFunction = (source: string): IRFunction => {
  const module = parseModule(`(module ${source})`);
  return module.functions[0];
};

export const printBody = (func: IRFunction): string =>
  printExpression(func.body, func.locals);

export const IF_ELSE_CHAIN = `
(func $f (param $x) (local $label)
  (block
    (if (local.get $x)
      (local.set $label (i32.const 2))
      (local.set $label (i32.const 3)))
    (if (i32.eq (local.get $label) (i32.const 2))
      (call $a)
      (if (i32.eq (local.get $label) (i32.const 3))
        (call $b)))))`;
