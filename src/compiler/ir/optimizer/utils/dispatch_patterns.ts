import {
  BinaryOp,
  type Expression,
  ExpressionKind,
  type IfExpression,
} from "../../expression.js";

/** Conventional name of the flattener's dispatch local */
export const DISPATCH_LOCAL_NAME = "label";

/**
 * A conditional of the exact shape `if (label == value)`
 */
export interface DispatchCheck {
  node: IfExpression;
  value: number;
}

export const matchDispatchCheck = (
  expr: Expression | null,
  dispatchIndex: number,
): DispatchCheck | null => {
  if (!expr || expr.kind !== ExpressionKind.If) return null;
  const condition = expr.condition;
  if (condition.kind !== ExpressionKind.Binary) return null;
  if (condition.op !== BinaryOp.Eq) return null;
  const { left, right } = condition;
  if (left.kind !== ExpressionKind.LocalGet || left.index !== dispatchIndex) {
    return null;
  }
  if (right.kind !== ExpressionKind.Const) return null;
  return { node: expr, value: right.value };
};

/**
 * Links of an else-if cascade starting at `head`. A cascade whose last link
 * has a plain else gives null: that arm has no place in the threaded form.
 */
export const collectChainLinks = (
  head: DispatchCheck,
  dispatchIndex: number,
): DispatchCheck[] | null => {
  const links: DispatchCheck[] = [];
  let link: DispatchCheck | null = head;
  while (link) {
    links.push(link);
    const next: Expression | null = link.node.ifFalse;
    link = matchDispatchCheck(next, dispatchIndex);
    if (next && !link) return null;
  }
  return links;
};

/**
 * Value written by `local.set $label (i32.const value)`, or null for any other
 * node (including a dispatch write of a computed value)
 */
export const dispatchSetValue = (
  expr: Expression,
  dispatchIndex: number,
): number | null => {
  if (expr.kind !== ExpressionKind.LocalSet) return null;
  if (expr.index !== dispatchIndex) return null;
  return expr.value.kind === ExpressionKind.Const ? expr.value.value : null;
};
