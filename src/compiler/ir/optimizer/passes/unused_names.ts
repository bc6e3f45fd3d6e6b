import { type Expression, ExpressionKind } from "../../expression.js";
import { walkPostOrder } from "../../walker.js";

/**
 * Clear block and loop names that no branch targets.
 *
 * Names are compared function-wide rather than per scope, so a name reused by
 * nested scopes stays on all of them while any branch uses it.
 */
export const eliminateUnusedScopeNames = (root: Expression): number => {
  const referenced = new Set<string>();
  walkPostOrder(root, (expr) => {
    if (expr.kind === ExpressionKind.Break) {
      referenced.add(expr.name);
    }
  });

  let cleared = 0;
  walkPostOrder(root, (expr) => {
    if (
      expr.kind !== ExpressionKind.Block &&
      expr.kind !== ExpressionKind.Loop
    ) {
      return;
    }
    if (expr.name === null || referenced.has(expr.name)) return;
    expr.name = null;
    cleared += 1;
  });
  return cleared;
};
