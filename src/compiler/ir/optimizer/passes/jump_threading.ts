/**
 * Thread jumps through the flattener's dispatch local.
 *
 * Structured control flow generated from an arbitrary CFG emulates jumps by
 * writing a target id to `label` and testing it right after:
 *
 *   origin                       (block $outer
 *   (if (label == 2) A)    =>      (block $inner origin' (br $outer))
 *                                  A)
 *
 * where origin' has every `label = 2` replaced by `br $inner`. This is only
 * done when the value is tested nowhere else and every write of it lies
 * inside origin, the statement right before the test.
 */

import {
  blockifyWithName,
  makeBreak,
  makeNop,
  makeSequence,
} from "../../builder.js";
import {
  type BlockExpression,
  type Expression,
  ExpressionKind,
} from "../../expression.js";
import type { IRFunction } from "../../module.js";
import { replacePostOrder, walkPostOrder } from "../../walker.js";
import {
  countDispatchUses,
  type DispatchUses,
  useCount,
} from "../analysis/dispatch_uses.js";
import { ScopeNameCursor, ScopeNamePool } from "../scope_names.js";
import {
  collectChainLinks,
  DISPATCH_LOCAL_NAME,
  type DispatchCheck,
  dispatchSetValue,
  matchDispatchCheck,
} from "../utils/dispatch_patterns.js";

export interface JumpThreadingOptions {
  names?: ScopeNamePool;
}

export type JumpThreadingSkipReason =
  | "no-dispatch-local"
  | "untracked-dispatch-use";

export interface JumpThreadingResult {
  changed: boolean;
  /** Check nodes removed; each gained one inner/outer scope pair */
  threadedChecks: number;
  /** Chains left in place because the name pool ran out */
  skippedForNames: number;
  skipped?: JumpThreadingSkipReason;
}

const collectScopeNames = (root: Expression): Set<string> => {
  const names = new Set<string>();
  walkPostOrder(root, (expr) => {
    if (
      (expr.kind === ExpressionKind.Block ||
        expr.kind === ExpressionKind.Loop) &&
      expr.name !== null
    ) {
      names.add(expr.name);
    }
  });
  return names;
};

const breaksTo = (root: Expression, name: string): boolean => {
  let found = false;
  walkPostOrder(root, (expr) => {
    if (expr.kind === ExpressionKind.Break && expr.name === name) found = true;
  });
  return found;
};

export const threadDispatchJumps = (
  func: IRFunction,
  options: JumpThreadingOptions = {},
): JumpThreadingResult => {
  const result: JumpThreadingResult = {
    changed: false,
    threadedChecks: 0,
    skippedForNames: 0,
  };
  if (!func.hasLocal(DISPATCH_LOCAL_NAME)) {
    return { ...result, skipped: "no-dispatch-local" };
  }
  const dispatchIndex = func.getLocalIndex(DISPATCH_LOCAL_NAME);
  const uses: DispatchUses = countDispatchUses(func.body, dispatchIndex);
  if (uses.untracked > 0) {
    return { ...result, skipped: "untracked-dispatch-use" };
  }
  const pool = options.names ?? ScopeNamePool.shared();
  const cursor = new ScopeNameCursor(pool, collectScopeNames(func.body));

  const isIrreducible = (head: DispatchCheck, origin: Expression): boolean => {
    const links = collectChainLinks(head, dispatchIndex);
    if (!links) return true;
    const inOrigin = countDispatchUses(origin, dispatchIndex);
    for (const { value } of links) {
      // tested elsewhere too: that test still needs the runtime value
      if (useCount(uses.checks, value) !== 1) return true;
      if (useCount(inOrigin.checks, value) !== 0) return true;
      // written outside origin: reachable from somewhere else
      if (useCount(inOrigin.sets, value) !== useCount(uses.sets, value)) {
        return true;
      }
      // TODO: a write of the same value inside the check's own arms could be
      // threaded too, but needs its own proof of safety
    }
    return false;
  };

  /**
   * Consume origin and a safe chain; return the scopes replacing origin, or
   * null (origin untouched) when the pool cannot name every link.
   */
  const threadChain = (
    origin: Expression,
    head: DispatchCheck,
  ): Expression | null => {
    const links = collectChainLinks(head, dispatchIndex) ?? [];
    const names = cursor.reserve(links.length);
    if (!names) {
      console.warn(
        `threadDispatchJumps: out of scope names in '${func.name}' (pool of ${pool.size}); leaving dispatch on ${head.value} in place`,
      );
      return null;
    }

    let current = origin;
    links.forEach((link, index) => {
      const { inner, outer } = names[index];
      current = replacePostOrder(current, (expr) =>
        dispatchSetValue(expr, dispatchIndex) === link.value
          ? makeBreak(inner)
          : undefined,
      );
      const innerScope = blockifyWithName(current, inner, makeBreak(outer));
      const outerScope = makeSequence(innerScope, link.node.ifTrue);
      outerScope.name = outer;
      current = outerScope;
    });
    result.threadedChecks += links.length;
    result.changed = true;
    return current;
  };

  const visitBlock = (block: BlockExpression): void => {
    const list = block.list;
    for (let i = 0; i + 1 < list.length; i += 1) {
      // once a link may be irreducible, every later link depends on it
      let irreducible = false;
      const origin = i;
      for (let j = i + 1; j < list.length; j += 1) {
        const candidate = list[j];
        const direct = matchDispatchCheck(candidate, dispatchIndex);
        const holder =
          !direct &&
          candidate.kind === ExpressionKind.Block &&
          candidate.list.length === 1
            ? candidate
            : null;
        const check =
          direct ??
          (holder ? matchDispatchCheck(holder.list[0], dispatchIndex) : null);
        if (!check) break;

        irreducible = irreducible || isIrreducible(check, list[origin]);
        // a named holder would capture origin's branches to an outer
        // scope of the same name
        if (holder?.name && breaksTo(list[origin], holder.name)) {
          irreducible = true;
        }
        if (!irreducible) {
          const threaded = threadChain(list[origin], check);
          if (threaded === null) {
            result.skippedForNames += 1;
            irreducible = true;
          } else if (holder) {
            // the holder keeps its single statement, now enclosing origin
            holder.list[0] = threaded;
            list[origin] = holder;
            list[j] = makeNop();
          } else {
            list[origin] = threaded;
            list[j] = makeNop();
          }
        }
        i += 1;
      }
    }
  };

  walkPostOrder(func.body, (expr) => {
    if (expr.kind === ExpressionKind.Block) visitBlock(expr);
  });
  return result;
};
