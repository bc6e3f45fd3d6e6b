/**
 * Traversal helpers for the structured IR
 */

import { type Expression, ExpressionKind } from "./expression.js";

export const childrenOf = (expr: Expression): Expression[] => {
  switch (expr.kind) {
    case ExpressionKind.Block:
      return expr.list;
    case ExpressionKind.Loop:
      return [expr.body];
    case ExpressionKind.If:
      return expr.ifFalse
        ? [expr.condition, expr.ifTrue, expr.ifFalse]
        : [expr.condition, expr.ifTrue];
    case ExpressionKind.Break:
      return expr.condition ? [expr.condition] : [];
    case ExpressionKind.LocalSet:
      return [expr.value];
    case ExpressionKind.Binary:
      return [expr.left, expr.right];
    case ExpressionKind.Call:
      return expr.operands;
    case ExpressionKind.Return:
      return expr.value ? [expr.value] : [];
    case ExpressionKind.Const:
    case ExpressionKind.LocalGet:
    case ExpressionKind.Nop:
      return [];
  }
};

/**
 * Visit every node, children before their parent. Children are read after the
 * parent's earlier children were visited, so a visitor may rewrite the
 * subtree it is handed.
 */
export const walkPostOrder = (
  root: Expression,
  visit: (expr: Expression) => void,
): void => {
  for (const child of [...childrenOf(root)]) {
    walkPostOrder(child, visit);
  }
  visit(root);
};

/**
 * Rewrite a tree bottom-up. Takes ownership of `root`: child slots are
 * rebound in place and the (possibly new) root is returned. `replace` returns
 * the node to put in place of its argument, or undefined to keep it.
 */
export const replacePostOrder = (
  root: Expression,
  replace: (expr: Expression) => Expression | undefined,
): Expression => {
  const rewrite = (expr: Expression): Expression =>
    replacePostOrder(expr, replace);

  switch (root.kind) {
    case ExpressionKind.Block:
      root.list = root.list.map(rewrite);
      break;
    case ExpressionKind.Loop:
      root.body = rewrite(root.body);
      break;
    case ExpressionKind.If:
      root.condition = rewrite(root.condition);
      root.ifTrue = rewrite(root.ifTrue);
      if (root.ifFalse) root.ifFalse = rewrite(root.ifFalse);
      break;
    case ExpressionKind.Break:
      if (root.condition) root.condition = rewrite(root.condition);
      break;
    case ExpressionKind.LocalSet:
      root.value = rewrite(root.value);
      break;
    case ExpressionKind.Binary:
      root.left = rewrite(root.left);
      root.right = rewrite(root.right);
      break;
    case ExpressionKind.Call:
      root.operands = root.operands.map(rewrite);
      break;
    case ExpressionKind.Return:
      if (root.value) root.value = rewrite(root.value);
      break;
    case ExpressionKind.Const:
    case ExpressionKind.LocalGet:
    case ExpressionKind.Nop:
      break;
  }
  return replace(root) ?? root;
};
