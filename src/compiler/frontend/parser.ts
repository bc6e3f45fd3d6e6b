/**
 * Parser for the s-expression text format
 */

import { ParseError } from "../errors/compile_errors.js";
import { ErrorCollector } from "../errors/error_collector.js";
import {
  BinaryExpression,
  BlockExpression,
  BreakExpression,
  CallExpression,
  ConstExpression,
  type Expression,
  IfExpression,
  isBinaryOp,
  LocalGetExpression,
  LocalSetExpression,
  LoopExpression,
  NopExpression,
  ReturnExpression,
} from "../ir/expression.js";
import { IRFunction, IRModule } from "../ir/module.js";
import { Lexer, type Token, TokenKind } from "./lexer.js";

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

const describeKind = (kind: TokenKind): string => {
  switch (kind) {
    case TokenKind.LParen:
      return "'('";
    case TokenKind.RParen:
      return "')'";
    case TokenKind.Name:
      return "a $name";
    case TokenKind.Integer:
      return "an integer";
    case TokenKind.Keyword:
      return "a keyword";
    case TokenKind.EOF:
      return "end of input";
  }
};

interface FunctionScope {
  name: string;
  localIndices: Map<string, number>;
  localCount: number;
  /** Enclosing block and loop names, innermost last */
  scopeNames: string[];
}

export class TextFormatParser {
  private tokens: Token[] = [];
  private pos = 0;
  private errorCollector = new ErrorCollector();
  private current: FunctionScope | null = null;

  constructor(private readonly filePath = "<inline>") {}

  /**
   * Parse a `(module ...)` source. Syntax errors throw at the first one;
   * semantic errors are collected and thrown together.
   */
  parse(source: string): IRModule {
    this.tokens = new Lexer(source, this.filePath).tokenize();
    this.pos = 0;
    this.errorCollector = new ErrorCollector();

    this.expect(TokenKind.LParen);
    this.expectKeyword("module");
    const functions: IRFunction[] = [];
    const seen = new Set<string>();
    while (this.peek().kind === TokenKind.LParen) {
      const start = this.peek();
      const func = this.parseFunction();
      if (seen.has(func.name)) {
        this.reportSemantic(start, `Duplicate function '$${func.name}'`);
      }
      seen.add(func.name);
      functions.push(func);
    }
    this.expect(TokenKind.RParen);
    this.expect(TokenKind.EOF);

    this.errorCollector.throwIfErrors();
    return new IRModule(functions);
  }

  private parseFunction(): IRFunction {
    this.expect(TokenKind.LParen);
    this.expectKeyword("func");
    const name = this.expect(TokenKind.Name).text;
    const locals: string[] = [];
    const scope: FunctionScope = {
      name,
      localIndices: new Map(),
      localCount: 0,
      scopeNames: [],
    };
    let paramCount = 0;

    while (this.isDeclaration()) {
      this.expect(TokenKind.LParen);
      const keyword = this.expect(TokenKind.Keyword);
      const local = this.expect(TokenKind.Name);
      this.expect(TokenKind.RParen);
      if (keyword.text === "param" && locals.length > paramCount) {
        this.reportSemantic(keyword, "Parameters must precede locals");
      }
      if (scope.localIndices.has(local.text)) {
        this.reportSemantic(local, `Duplicate local '$${local.text}'`);
        continue;
      }
      scope.localIndices.set(local.text, locals.length);
      locals.push(local.text);
      if (keyword.text === "param") paramCount += 1;
    }
    scope.localCount = locals.length;

    this.current = scope;
    const body = this.parseBody();
    this.current = null;
    this.expect(TokenKind.RParen);
    return new IRFunction(name, locals, paramCount, body);
  }

  private isDeclaration(): boolean {
    const open = this.peek();
    const keyword = this.peek(1);
    return (
      open.kind === TokenKind.LParen &&
      keyword.kind === TokenKind.Keyword &&
      (keyword.text === "param" || keyword.text === "local")
    );
  }

  /**
   * Zero expressions give a nop, one gives itself, more an unnamed block
   */
  private parseBody(): Expression {
    const list = this.parseExpressionList();
    if (list.length === 0) return new NopExpression();
    if (list.length === 1) return list[0];
    return new BlockExpression(null, list);
  }

  private parseExpressionList(): Expression[] {
    const list: Expression[] = [];
    while (this.peek().kind === TokenKind.LParen) {
      list.push(this.parseExpression());
    }
    return list;
  }

  private parseExpression(): Expression {
    this.expect(TokenKind.LParen);
    const keyword = this.expect(TokenKind.Keyword);
    const expr = this.parseExpressionBody(keyword);
    this.expect(TokenKind.RParen);
    return expr;
  }

  private parseExpressionBody(keyword: Token): Expression {
    switch (keyword.text) {
      case "block": {
        const name = this.parseOptionalName();
        const list = this.withScopeName(name, () =>
          this.parseExpressionList(),
        );
        return new BlockExpression(name, list);
      }
      case "loop": {
        const name = this.parseOptionalName();
        const body = this.withScopeName(name, () => this.parseBody());
        return new LoopExpression(name, body);
      }
      case "if": {
        const condition = this.parseExpression();
        const ifTrue = this.parseExpression();
        const ifFalse =
          this.peek().kind === TokenKind.LParen ? this.parseExpression() : null;
        return new IfExpression(condition, ifTrue, ifFalse);
      }
      case "br": {
        const target = this.expect(TokenKind.Name);
        if (!this.scopeNames().includes(target.text)) {
          this.reportSemantic(
            target,
            `Branch to '$${target.text}' which is not an enclosing block or loop`,
          );
        }
        const condition =
          this.peek().kind === TokenKind.LParen ? this.parseExpression() : null;
        return new BreakExpression(target.text, condition);
      }
      case "i32.const":
        return new ConstExpression(this.parseInt32());
      case "local.get":
        return new LocalGetExpression(this.parseLocalRef());
      case "local.set": {
        const index = this.parseLocalRef();
        return new LocalSetExpression(index, this.parseExpression());
      }
      case "call": {
        const target = this.expect(TokenKind.Name).text;
        return new CallExpression(target, this.parseExpressionList());
      }
      case "return":
        return new ReturnExpression(
          this.peek().kind === TokenKind.LParen ? this.parseExpression() : null,
        );
      case "nop":
        return new NopExpression();
      default:
        break;
    }

    if (keyword.text.startsWith("i32.")) {
      const op = keyword.text.slice("i32.".length);
      if (isBinaryOp(op)) {
        const left = this.parseExpression();
        const right = this.parseExpression();
        return new BinaryExpression(op, left, right);
      }
    }
    throw this.syntaxError(keyword, `Unknown instruction '${keyword.text}'`);
  }

  private parseOptionalName(): string | null {
    if (this.peek().kind !== TokenKind.Name) return null;
    return this.expect(TokenKind.Name).text;
  }

  private withScopeName<T>(name: string | null, parse: () => T): T {
    const names = this.scopeNames();
    if (name !== null) names.push(name);
    try {
      return parse();
    } finally {
      if (name !== null) names.pop();
    }
  }

  private scopeNames(): string[] {
    return this.currentFunction().scopeNames;
  }

  private currentFunction(): FunctionScope {
    if (!this.current) {
      throw this.syntaxError(this.peek(), "Expression outside of a function");
    }
    return this.current;
  }

  private parseInt32(): number {
    const token = this.expect(TokenKind.Integer);
    const value = Number(token.text);
    if (value < INT32_MIN || value > INT32_MAX) {
      this.reportSemantic(token, `Constant ${token.text} is out of i32 range`);
      return 0;
    }
    return value;
  }

  private parseLocalRef(): number {
    const func = this.currentFunction();
    const token = this.peek();
    if (token.kind === TokenKind.Integer) {
      this.pos += 1;
      const index = Number(token.text);
      if (index < 0 || index >= func.localCount) {
        this.reportSemantic(
          token,
          `Local index ${token.text} is out of range in '$${func.name}'`,
        );
        return 0;
      }
      return index;
    }
    const name = this.expect(TokenKind.Name);
    const index = func.localIndices.get(name.text);
    if (index === undefined) {
      this.reportSemantic(
        name,
        `Unknown local '$${name.text}' in '$${func.name}'`,
        "Declare it with (local $name)",
      );
      return 0;
    }
    return index;
  }

  private peek(offset = 0): Token {
    const index = Math.min(this.pos + offset, this.tokens.length - 1);
    return this.tokens[index];
  }

  private expect(kind: TokenKind): Token {
    const token = this.peek();
    if (token.kind !== kind) {
      const found =
        token.kind === TokenKind.EOF ? "end of input" : `'${token.text}'`;
      throw this.syntaxError(
        token,
        `Expected ${describeKind(kind)}, found ${found}`,
      );
    }
    this.pos += 1;
    return token;
  }

  private expectKeyword(text: string): Token {
    const token = this.expect(TokenKind.Keyword);
    if (token.text !== text) {
      throw this.syntaxError(token, `Expected '${text}', found '${token.text}'`);
    }
    return token;
  }

  private syntaxError(token: Token, message: string): ParseError {
    return new ParseError("SyntaxError", message, {
      filePath: this.filePath,
      line: token.line,
      column: token.column,
    });
  }

  private reportSemantic(
    token: Token,
    message: string,
    suggestion?: string,
  ): void {
    this.errorCollector.add(
      new ParseError(
        "SemanticError",
        message,
        { filePath: this.filePath, line: token.line, column: token.column },
        suggestion,
      ),
    );
  }
}

export const parseModule = (source: string, filePath?: string): IRModule =>
  new TextFormatParser(filePath).parse(source);
