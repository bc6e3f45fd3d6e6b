/**
 * Text-format printer for the structured IR
 */

import type { Expression } from "./expression.js";
import { ExpressionKind } from "./expression_kind.js";
import type { IRFunction, IRModule } from "./module.js";

const INDENT = "  ";

const localRef = (
  index: number,
  localNames: readonly string[] | undefined,
): string => {
  const name = localNames?.[index];
  return name === undefined ? String(index) : `$${name}`;
};

const scopeHeader = (keyword: string, name: string | null): string =>
  name === null ? `(${keyword}` : `(${keyword} $${name}`;

/**
 * Single-line form. Locals print as `$name` when names are given, otherwise
 * as their slot index.
 */
export function printExpression(
  expr: Expression,
  localNames?: readonly string[],
): string {
  const print = (child: Expression): string =>
    printExpression(child, localNames);

  switch (expr.kind) {
    case ExpressionKind.Block: {
      const parts = [scopeHeader("block", expr.name), ...expr.list.map(print)];
      return `${parts.join(" ")})`;
    }
    case ExpressionKind.Loop:
      return `${scopeHeader("loop", expr.name)} ${print(expr.body)})`;
    case ExpressionKind.If: {
      const parts = ["(if", print(expr.condition), print(expr.ifTrue)];
      if (expr.ifFalse) parts.push(print(expr.ifFalse));
      return `${parts.join(" ")})`;
    }
    case ExpressionKind.Break:
      return expr.condition
        ? `(br $${expr.name} ${print(expr.condition)})`
        : `(br $${expr.name})`;
    case ExpressionKind.Const:
      return `(i32.const ${expr.value})`;
    case ExpressionKind.LocalGet:
      return `(local.get ${localRef(expr.index, localNames)})`;
    case ExpressionKind.LocalSet:
      return `(local.set ${localRef(expr.index, localNames)} ${print(expr.value)})`;
    case ExpressionKind.Binary:
      return `(i32.${expr.op} ${print(expr.left)} ${print(expr.right)})`;
    case ExpressionKind.Call: {
      const parts = [`(call $${expr.target}`, ...expr.operands.map(print)];
      return `${parts.join(" ")})`;
    }
    case ExpressionKind.Return:
      return expr.value ? `(return ${print(expr.value)})` : "(return)";
    case ExpressionKind.Nop:
      return "(nop)";
  }
}

const printIndented = (
  expr: Expression,
  depth: number,
  localNames: readonly string[],
): string => {
  const pad = INDENT.repeat(depth + 1);
  const nested = (children: Expression[], header: string): string => {
    const lines = children.map(
      (child) => `\n${pad}${printIndented(child, depth + 1, localNames)}`,
    );
    return `${header}${lines.join("")})`;
  };

  switch (expr.kind) {
    case ExpressionKind.Block:
      if (expr.list.length === 0) break;
      return nested(expr.list, scopeHeader("block", expr.name));
    case ExpressionKind.Loop:
      return nested([expr.body], scopeHeader("loop", expr.name));
    case ExpressionKind.If: {
      const branches = [expr.ifTrue];
      if (expr.ifFalse) branches.push(expr.ifFalse);
      return nested(
        branches,
        `(if ${printExpression(expr.condition, localNames)}`,
      );
    }
    default:
      break;
  }
  return printExpression(expr, localNames);
};

export function printFunction(func: IRFunction, depth = 0): string {
  const header = [`(func $${func.name}`];
  func.locals.forEach((name, index) => {
    header.push(index < func.paramCount ? `(param $${name})` : `(local $${name})`);
  });
  const pad = INDENT.repeat(depth + 1);
  return `${header.join(" ")}\n${pad}${printIndented(func.body, depth + 1, func.locals)})`;
}

export function printModule(module: IRModule): string {
  const funcs = module.functions.map(
    (func) => `\n${INDENT}${printFunction(func, 1)}`,
  );
  return `(module${funcs.join("")})\n`;
}
