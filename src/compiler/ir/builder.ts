/**
 * Construction helpers for the structured IR
 */

import {
  BinaryExpression,
  BlockExpression,
  BreakExpression,
  CallExpression,
  ConstExpression,
  type Expression,
  ExpressionKind,
  IfExpression,
  LocalGetExpression,
  LocalSetExpression,
  LoopExpression,
  NopExpression,
  ReturnExpression,
} from "./expression.js";

export const makeBreak = (name: string): BreakExpression =>
  new BreakExpression(name);

export const makeNop = (): NopExpression => new NopExpression();

/**
 * Unnamed block running `left` then `right`
 */
export const makeSequence = (
  left: Expression,
  right: Expression,
): BlockExpression => new BlockExpression(null, [left, right]);

/**
 * Give `any` a scope name, appending `append` at its end. An unnamed block is
 * reused in place; anything else (including a named block, whose breaks must
 * keep their target) is wrapped in a new block.
 */
export const blockifyWithName = (
  any: Expression,
  name: string,
  append: Expression | null = null,
): BlockExpression => {
  const block =
    any.kind === ExpressionKind.Block && any.name === null
      ? any
      : new BlockExpression(null, [any]);
  block.name = name;
  if (append) block.list.push(append);
  return block;
};

export const deepCopy = (expr: Expression): Expression => {
  switch (expr.kind) {
    case ExpressionKind.Block:
      return new BlockExpression(expr.name, expr.list.map(deepCopy));
    case ExpressionKind.Loop:
      return new LoopExpression(expr.name, deepCopy(expr.body));
    case ExpressionKind.If:
      return new IfExpression(
        deepCopy(expr.condition),
        deepCopy(expr.ifTrue),
        expr.ifFalse ? deepCopy(expr.ifFalse) : null,
      );
    case ExpressionKind.Break:
      return new BreakExpression(
        expr.name,
        expr.condition ? deepCopy(expr.condition) : null,
      );
    case ExpressionKind.Const:
      return new ConstExpression(expr.value);
    case ExpressionKind.LocalGet:
      return new LocalGetExpression(expr.index);
    case ExpressionKind.LocalSet:
      return new LocalSetExpression(expr.index, deepCopy(expr.value));
    case ExpressionKind.Binary:
      return new BinaryExpression(
        expr.op,
        deepCopy(expr.left),
        deepCopy(expr.right),
      );
    case ExpressionKind.Call:
      return new CallExpression(expr.target, expr.operands.map(deepCopy));
    case ExpressionKind.Return:
      return new ReturnExpression(expr.value ? deepCopy(expr.value) : null);
    case ExpressionKind.Nop:
      return new NopExpression();
  }
};
