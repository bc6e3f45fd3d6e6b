/**
 * Compiler error types and helpers
 */

export type CompileErrorCode =
  | "SyntaxError"
  | "SemanticError"
  | "InternalError";

export interface SourceLocation {
  filePath: string;
  line: number;
  column: number;
}

export class ParseError extends Error {
  readonly code: CompileErrorCode;
  readonly location: SourceLocation;
  readonly suggestion?: string;

  constructor(
    code: CompileErrorCode,
    message: string,
    location: SourceLocation,
    suggestion?: string,
  ) {
    super(message);
    this.name = "ParseError";
    this.code = code;
    this.location = location;
    this.suggestion = suggestion;
  }
}

export class AggregateParseError extends Error {
  readonly errors: ParseError[];

  constructor(errors: ParseError[]) {
    super(AggregateParseError.formatMessage(errors));
    this.name = "AggregateParseError";
    this.errors = errors;
  }

  private static formatMessage(errors: ParseError[]): string {
    const header = `Parse failed with ${errors.length} error(s):`;
    const lines = errors.map((err) => {
      const loc = `${err.location.filePath}:${err.location.line}:${err.location.column}`;
      const suggestion = err.suggestion ? ` (hint: ${err.suggestion})` : "";
      return `- [${err.code}] ${loc} ${err.message}${suggestion}`;
    });
    return [header, ...lines].join("\n");
  }
}

/**
 * Broken IR invariant; indicates a bug rather than bad input
 */
export class InternalCompilerError extends Error {
  readonly code: CompileErrorCode = "InternalError";

  constructor(message: string) {
    super(message);
    this.name = "InternalCompilerError";
  }
}

export class ExecutionError extends Error {
  readonly functionName: string;

  constructor(functionName: string, message: string) {
    super(`${functionName}: ${message}`);
    this.name = "ExecutionError";
    this.functionName = functionName;
  }
}

export class ExecutionLimitError extends ExecutionError {
  readonly steps: number;

  constructor(functionName: string, steps: number) {
    super(functionName, `step budget of ${steps} exhausted`);
    this.name = "ExecutionLimitError";
    this.steps = steps;
  }
}
