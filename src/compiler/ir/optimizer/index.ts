export {
  countDispatchUses,
  type DispatchUses,
  useCount,
} from "./analysis/dispatch_uses.js";
export { eliminateNops } from "./passes/nop_elimination.js";
export {
  type JumpThreadingOptions,
  type JumpThreadingResult,
  type JumpThreadingSkipReason,
  threadDispatchJumps,
} from "./passes/jump_threading.js";
export { eliminateUnusedScopeNames } from "./passes/unused_names.js";
export {
  MAX_NAME_INDEX,
  ScopeNameCursor,
  type ScopeNamePair,
  ScopeNamePool,
} from "./scope_names.js";
export {
  type FunctionReport,
  type OptimizeReport,
  type OptimizerOptions,
  StructuredOptimizer,
} from "./structured_optimizer.js";
export {
  DISPATCH_LOCAL_NAME,
  type DispatchCheck,
  matchDispatchCheck,
} from "./utils/dispatch_patterns.js";
