/**
 * Main pipeline: text format -> structured IR -> jump threading -> text format
 */

import { parseModule } from "./frontend/parser.js";
import type { IRModule } from "./ir/module.js";
import {
  type OptimizeReport,
  type OptimizerOptions,
  StructuredOptimizer,
} from "./ir/optimizer/index.js";
import { printModule } from "./ir/printer.js";

export interface CompileOptions extends OptimizerOptions {
  /** Used in error locations */
  filePath?: string;
}

export interface CompileResult {
  module: IRModule;
  text: string;
  report: OptimizeReport;
}

export function optimizeSource(
  source: string,
  options: CompileOptions = {},
): CompileResult {
  const module = parseModule(source, options.filePath);
  const report = new StructuredOptimizer(options).optimize(module);
  return { module, text: printModule(module), report };
}

export * from "./errors/compile_errors.js";
export { ErrorCollector } from "./errors/error_collector.js";
export { parseModule, TextFormatParser } from "./frontend/parser.js";
export * from "./ir/builder.js";
export * from "./ir/expression.js";
export {
  DEFAULT_STEP_BUDGET,
  type ExecutionOptions,
  type ExecutionResult,
  executeFunction,
  type HostCall,
} from "./ir/interpreter.js";
export { IRFunction, IRModule } from "./ir/module.js";
export * from "./ir/optimizer/index.js";
export { printExpression, printFunction, printModule } from "./ir/printer.js";
export { childrenOf, replacePostOrder, walkPostOrder } from "./ir/walker.js";
