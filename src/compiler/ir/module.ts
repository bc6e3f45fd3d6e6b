/**
 * Functions and modules of the structured IR
 */

import { InternalCompilerError } from "../errors/compile_errors.js";
import type { Expression } from "./expression.js";

export class IRFunction {
  private readonly localIndices: Map<string, number>;

  /**
   * @param locals slot names; the first `paramCount` slots are parameters
   */
  constructor(
    public readonly name: string,
    public readonly locals: readonly string[],
    public readonly paramCount: number,
    public body: Expression,
  ) {
    this.localIndices = new Map(locals.map((local, index) => [local, index]));
  }

  hasLocal(name: string): boolean {
    return this.localIndices.has(name);
  }

  getLocalIndex(name: string): number {
    const index = this.localIndices.get(name);
    if (index === undefined) {
      throw new InternalCompilerError(
        `Function '${this.name}' has no local named '${name}'`,
      );
    }
    return index;
  }
}

export class IRModule {
  constructor(public readonly functions: IRFunction[]) {}

  getFunction(name: string): IRFunction | undefined {
    return this.functions.find((func) => func.name === name);
  }
}
