import { ExpressionKind, type Expression } from "../../expression.js";
import { walkPostOrder } from "../../walker.js";
import {
  dispatchSetValue,
  matchDispatchCheck,
} from "../utils/dispatch_patterns.js";

/**
 * Snapshot of how a subtree uses the dispatch local
 */
export interface DispatchUses {
  /** value -> number of `if (label == value)` */
  readonly checks: ReadonlyMap<number, number>;
  /** value -> number of `label = value` */
  readonly sets: ReadonlyMap<number, number>;
  /** Reads and writes that fit neither shape */
  readonly untracked: number;
}

export const useCount = (
  counts: ReadonlyMap<number, number>,
  value: number,
): number => counts.get(value) ?? 0;

const increment = (counts: Map<number, number>, value: number): void => {
  counts.set(value, (counts.get(value) ?? 0) + 1);
};

export const countDispatchUses = (
  root: Expression,
  dispatchIndex: number,
): DispatchUses => {
  const checks = new Map<number, number>();
  const sets = new Map<number, number>();
  let reads = 0;
  let checkCount = 0;
  let dynamicSets = 0;

  walkPostOrder(root, (expr) => {
    if (expr.kind === ExpressionKind.LocalGet && expr.index === dispatchIndex) {
      reads += 1;
      return;
    }
    const check = matchDispatchCheck(expr, dispatchIndex);
    if (check) {
      increment(checks, check.value);
      checkCount += 1;
      return;
    }
    if (expr.kind === ExpressionKind.LocalSet && expr.index === dispatchIndex) {
      const value = dispatchSetValue(expr, dispatchIndex);
      if (value === null) {
        dynamicSets += 1;
      } else {
        increment(sets, value);
      }
    }
  });

  // each check condition holds exactly one read of the dispatch local
  return { checks, sets, untracked: reads - checkCount + dynamicSets };
};
