/**
 * Discriminants shared by the IR, printer and parser
 */

/**
 * Expression kinds
 */
export enum ExpressionKind {
  Block = "Block",
  Loop = "Loop",
  If = "If",
  Break = "Break",
  Const = "Const",
  LocalGet = "LocalGet",
  LocalSet = "LocalSet",
  Binary = "Binary",
  Call = "Call",
  Return = "Return",
  Nop = "Nop",
}

/**
 * i32 binary operators; the value is the text-format suffix
 */
export enum BinaryOp {
  Eq = "eq",
  Ne = "ne",
  LtS = "lt_s",
  GtS = "gt_s",
  Add = "add",
  Sub = "sub",
  Mul = "mul",
  And = "and",
  Or = "or",
}
