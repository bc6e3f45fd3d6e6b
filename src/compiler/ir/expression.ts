/**
 * Structured IR expression definitions
 */

import { BinaryOp, ExpressionKind } from "./expression_kind.js";
import { printExpression } from "./printer.js";

export { BinaryOp, ExpressionKind };

export type Expression =
  | BlockExpression
  | LoopExpression
  | IfExpression
  | BreakExpression
  | ConstExpression
  | LocalGetExpression
  | LocalSetExpression
  | BinaryExpression
  | CallExpression
  | ReturnExpression
  | NopExpression;

/**
 * Sequence: runs list in order; `br name` exits it
 */
export class BlockExpression {
  readonly kind = ExpressionKind.Block as const;

  constructor(
    public name: string | null,
    public list: Expression[],
  ) {}

  toString(): string {
    return printExpression(this);
  }
}

/**
 * Loop: `br name` restarts body; falling off the end leaves it
 */
export class LoopExpression {
  readonly kind = ExpressionKind.Loop as const;

  constructor(
    public name: string | null,
    public body: Expression,
  ) {}

  toString(): string {
    return printExpression(this);
  }
}

/**
 * Conditional: non-zero condition takes ifTrue
 */
export class IfExpression {
  readonly kind = ExpressionKind.If as const;

  constructor(
    public condition: Expression,
    public ifTrue: Expression,
    public ifFalse: Expression | null = null,
  ) {}

  toString(): string {
    return printExpression(this);
  }
}

/**
 * Branch to a named enclosing scope, optionally guarded
 */
export class BreakExpression {
  readonly kind = ExpressionKind.Break as const;

  constructor(
    public name: string,
    public condition: Expression | null = null,
  ) {}

  toString(): string {
    return printExpression(this);
  }
}

export class ConstExpression {
  readonly kind = ExpressionKind.Const as const;

  constructor(public value: number) {}

  toString(): string {
    return printExpression(this);
  }
}

export class LocalGetExpression {
  readonly kind = ExpressionKind.LocalGet as const;

  constructor(public index: number) {}

  toString(): string {
    return printExpression(this);
  }
}

export class LocalSetExpression {
  readonly kind = ExpressionKind.LocalSet as const;

  constructor(
    public index: number,
    public value: Expression,
  ) {}

  toString(): string {
    return printExpression(this);
  }
}

export class BinaryExpression {
  readonly kind = ExpressionKind.Binary as const;

  constructor(
    public op: BinaryOp,
    public left: Expression,
    public right: Expression,
  ) {}

  toString(): string {
    return printExpression(this);
  }
}

/**
 * Call to an imported host function
 */
export class CallExpression {
  readonly kind = ExpressionKind.Call as const;

  constructor(
    public target: string,
    public operands: Expression[],
  ) {}

  toString(): string {
    return printExpression(this);
  }
}

export class ReturnExpression {
  readonly kind = ExpressionKind.Return as const;

  constructor(public value: Expression | null = null) {}

  toString(): string {
    return printExpression(this);
  }
}

export class NopExpression {
  readonly kind = ExpressionKind.Nop as const;

  toString(): string {
    return printExpression(this);
  }
}

const BINARY_OPS = new Set<string>(Object.values(BinaryOp));

export const isBinaryOp = (value: string): value is BinaryOp =>
  BINARY_OPS.has(value);
