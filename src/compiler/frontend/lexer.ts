/**
 * Tokenizer for the s-expression text format
 */

import { ParseError } from "../errors/compile_errors.js";

export enum TokenKind {
  LParen = "LParen",
  RParen = "RParen",
  Name = "Name",
  Integer = "Integer",
  Keyword = "Keyword",
  EOF = "EOF",
}

export interface Token {
  kind: TokenKind;
  /** Name tokens carry the text without the leading `$` */
  text: string;
  line: number;
  column: number;
}

const isDelimiter = (ch: string): boolean =>
  ch === "(" || ch === ")" || ch === ";" || /\s/.test(ch);

const NAME_PATTERN = /^[A-Za-z0-9_.$]+$/;
const INTEGER_PATTERN = /^-?\d+$/;
const KEYWORD_PATTERN = /^[a-z][a-z0-9_.]*$/;

export class Lexer {
  private pos = 0;
  private line = 1;
  private column = 1;

  constructor(
    private readonly source: string,
    private readonly filePath = "<inline>",
  ) {}

  tokenize(): Token[] {
    const tokens: Token[] = [];
    for (;;) {
      const token = this.next();
      tokens.push(token);
      if (token.kind === TokenKind.EOF) return tokens;
    }
  }

  private next(): Token {
    this.skipTrivia();
    const line = this.line;
    const column = this.column;
    if (this.pos >= this.source.length) {
      return { kind: TokenKind.EOF, text: "", line, column };
    }

    const ch = this.source[this.pos];
    if (ch === "(" || ch === ")") {
      this.advance();
      return {
        kind: ch === "(" ? TokenKind.LParen : TokenKind.RParen,
        text: ch,
        line,
        column,
      };
    }

    let word = "";
    while (
      this.pos < this.source.length &&
      !isDelimiter(this.source[this.pos])
    ) {
      word += this.advance();
    }

    if (word.startsWith("$")) {
      const name = word.slice(1);
      if (!NAME_PATTERN.test(name)) {
        throw this.error(`Invalid name '${word}'`, line, column);
      }
      return { kind: TokenKind.Name, text: name, line, column };
    }
    if (INTEGER_PATTERN.test(word)) {
      return { kind: TokenKind.Integer, text: word, line, column };
    }
    if (KEYWORD_PATTERN.test(word)) {
      return { kind: TokenKind.Keyword, text: word, line, column };
    }
    throw this.error(`Unexpected token '${word}'`, line, column);
  }

  private skipTrivia(): void {
    while (this.pos < this.source.length) {
      const ch = this.source[this.pos];
      if (/\s/.test(ch)) {
        this.advance();
        continue;
      }
      // ;; line comment
      if (ch === ";" && this.source[this.pos + 1] === ";") {
        while (
          this.pos < this.source.length &&
          this.source[this.pos] !== "\n"
        ) {
          this.advance();
        }
        continue;
      }
      if (ch === ";") {
        throw this.error("Stray ';' (comments start with ';;')", this.line, this.column);
      }
      return;
    }
  }

  private advance(): string {
    const ch = this.source[this.pos];
    this.pos += 1;
    if (ch === "\n") {
      this.line += 1;
      this.column = 1;
    } else {
      this.column += 1;
    }
    return ch;
  }

  private error(message: string, line: number, column: number): ParseError {
    return new ParseError("SyntaxError", message, {
      filePath: this.filePath,
      line,
      column,
    });
  }
}
