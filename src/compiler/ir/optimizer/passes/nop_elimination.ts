import { type Expression, ExpressionKind } from "../../expression.js";
import { walkPostOrder } from "../../walker.js";

/**
 * Drop `(nop)` statements from blocks. A block is never emptied below one
 * statement, so single-statement holders keep their shape.
 */
export const eliminateNops = (root: Expression): number => {
  let removed = 0;
  walkPostOrder(root, (expr) => {
    if (expr.kind !== ExpressionKind.Block) return;
    const kept: Expression[] = expr.list.filter((item) => item.kind !== ExpressionKind.Nop);
    if (kept.length === expr.list.length) return;
    if (kept.length === 0) kept.push(expr.list[0]);
    removed += expr.list.length - kept.length;
    expr.list = kept;
  });
  return removed;
};
