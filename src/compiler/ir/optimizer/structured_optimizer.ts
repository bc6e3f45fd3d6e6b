import type { IRFunction, IRModule } from "../module.js";
import { eliminateNops } from "./passes/nop_elimination.js";
import {
  type JumpThreadingResult,
  threadDispatchJumps,
} from "./passes/jump_threading.js";
import { eliminateUnusedScopeNames } from "./passes/unused_names.js";
import { MAX_NAME_INDEX, ScopeNamePool } from "./scope_names.js";

export interface OptimizerOptions {
  /** Tidy functions that jump threading changed (default true) */
  cleanup?: boolean;
  /** Scope-name pairs available to each function (default 1000) */
  maxScopeNames?: number;
}

export interface FunctionReport {
  name: string;
  threading: JumpThreadingResult;
  nopsRemoved: number;
  namesCleared: number;
}

export interface OptimizeReport {
  functions: FunctionReport[];
  threadedChecks: number;
  skippedForNames: number;
}

/**
 * Function-level pass scheduler
 */
export class StructuredOptimizer {
  private readonly names: ScopeNamePool;
  private readonly cleanup: boolean;

  constructor(options: OptimizerOptions = {}) {
    const limit = options.maxScopeNames ?? MAX_NAME_INDEX;
    // every name is minted here, before any function runs
    this.names =
      limit === MAX_NAME_INDEX
        ? ScopeNamePool.shared()
        : ScopeNamePool.create(limit);
    this.cleanup = options.cleanup ?? true;
  }

  /**
   * Each function is an independent unit: it gets its own name cursor and
   * use counts and shares only the read-only name pool.
   */
  optimize(module: IRModule): OptimizeReport {
    const functions = module.functions.map((func) =>
      this.optimizeFunction(func),
    );
    return {
      functions,
      threadedChecks: functions.reduce(
        (sum, report) => sum + report.threading.threadedChecks,
        0,
      ),
      skippedForNames: functions.reduce(
        (sum, report) => sum + report.threading.skippedForNames,
        0,
      ),
    };
  }

  optimizeFunction(func: IRFunction): FunctionReport {
    const threading = threadDispatchJumps(func, { names: this.names });
    let nopsRemoved = 0;
    let namesCleared = 0;
    if (this.cleanup && threading.changed) {
      nopsRemoved = eliminateNops(func.body);
      namesCleared = eliminateUnusedScopeNames(func.body);
    }
    return { name: func.name, threading, nopsRemoved, namesCleared };
  }
}
