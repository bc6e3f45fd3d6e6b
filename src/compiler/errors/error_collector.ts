/**
 * Error collector for the text-format parser
 */

import { AggregateParseError, type ParseError } from "./compile_errors.js";

export class ErrorCollector {
  private errors: ParseError[] = [];

  add(error: ParseError): void {
    this.errors.push(error);
  }

  throwIfErrors(): void {
    if (this.errors.length > 0) {
      throw new AggregateParseError(this.errors);
    }
  }
}
