/**
 * Reference interpreter for the structured IR
 *
 * Host calls are recorded rather than performed, so two versions of a
 * function can be compared by their return value and effect trace.
 */

import {
  ExecutionError,
  ExecutionLimitError,
} from "../errors/compile_errors.js";
import {
  BinaryOp,
  type Expression,
  ExpressionKind,
} from "./expression.js";
import type { IRFunction } from "./module.js";

export const DEFAULT_STEP_BUDGET = 100_000;

export interface HostCall {
  target: string;
  args: number[];
}

export interface ExecutionResult {
  returnValue: number | null;
  effects: HostCall[];
}

export interface ExecutionOptions {
  stepBudget?: number;
}

class BranchSignal {
  constructor(readonly name: string) {}
}

class ReturnSignal {
  constructor(readonly value: number | null) {}
}

const evalBinary = (op: BinaryOp, left: number, right: number): number => {
  switch (op) {
    case BinaryOp.Eq:
      return left === right ? 1 : 0;
    case BinaryOp.Ne:
      return left !== right ? 1 : 0;
    case BinaryOp.LtS:
      return left < right ? 1 : 0;
    case BinaryOp.GtS:
      return left > right ? 1 : 0;
    case BinaryOp.Add:
      return (left + right) | 0;
    case BinaryOp.Sub:
      return (left - right) | 0;
    case BinaryOp.Mul:
      return Math.imul(left, right);
    case BinaryOp.And:
      return left & right;
    case BinaryOp.Or:
      return left | right;
  }
};

export function executeFunction(
  func: IRFunction,
  args: readonly number[],
  options: ExecutionOptions = {},
): ExecutionResult {
  if (args.length !== func.paramCount) {
    throw new ExecutionError(
      func.name,
      `expected ${func.paramCount} argument(s), got ${args.length}`,
    );
  }
  const budget = options.stepBudget ?? DEFAULT_STEP_BUDGET;
  const locals = func.locals.map((_, index) =>
    index < args.length ? args[index] | 0 : 0,
  );
  const effects: HostCall[] = [];
  let steps = 0;

  const evaluate = (expr: Expression): number => {
    steps += 1;
    if (steps > budget) {
      throw new ExecutionLimitError(func.name, budget);
    }

    switch (expr.kind) {
      case ExpressionKind.Block:
        try {
          for (const child of expr.list) evaluate(child);
        } catch (signal) {
          if (signal instanceof BranchSignal && signal.name === expr.name) {
            return 0;
          }
          throw signal;
        }
        return 0;
      case ExpressionKind.Loop:
        for (;;) {
          try {
            evaluate(expr.body);
            return 0;
          } catch (signal) {
            if (signal instanceof BranchSignal && signal.name === expr.name) {
              continue;
            }
            throw signal;
          }
        }
      case ExpressionKind.If:
        if (evaluate(expr.condition) !== 0) {
          evaluate(expr.ifTrue);
        } else if (expr.ifFalse) {
          evaluate(expr.ifFalse);
        }
        return 0;
      case ExpressionKind.Break:
        if (expr.condition === null || evaluate(expr.condition) !== 0) {
          throw new BranchSignal(expr.name);
        }
        return 0;
      case ExpressionKind.Const:
        return expr.value | 0;
      case ExpressionKind.LocalGet:
        return locals[expr.index];
      case ExpressionKind.LocalSet:
        locals[expr.index] = evaluate(expr.value);
        return 0;
      case ExpressionKind.Binary: {
        const left = evaluate(expr.left);
        const right = evaluate(expr.right);
        return evalBinary(expr.op, left, right);
      }
      case ExpressionKind.Call:
        effects.push({
          target: expr.target,
          args: expr.operands.map(evaluate),
        });
        return 0;
      case ExpressionKind.Return:
        throw new ReturnSignal(expr.value ? evaluate(expr.value) : null);
      case ExpressionKind.Nop:
        return 0;
    }
  };

  try {
    evaluate(func.body);
  } catch (signal) {
    if (signal instanceof ReturnSignal) {
      return { returnValue: signal.value, effects };
    }
    if (signal instanceof BranchSignal) {
      throw new ExecutionError(
        func.name,
        `branch to unknown scope '${signal.name}'`,
      );
    }
    throw signal;
  }
  return { returnValue: null, effects };
}
