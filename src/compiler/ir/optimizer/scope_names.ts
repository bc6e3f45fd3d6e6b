/**
 * Precomputed scope names for jump threading
 *
 * Names are minted once, before any per-function work starts, and never
 * change afterwards. Scope names only need to be unique within a function, so
 * every function draws from the same table with its own cursor.
 */

export const MAX_NAME_INDEX = 1000;

const INNER_PREFIX = "threading$inner$";
const OUTER_PREFIX = "threading$outer$";

export interface ScopeNamePair {
  inner: string;
  outer: string;
}

export class ScopeNamePool {
  private static sharedPool: ScopeNamePool | null = null;

  private constructor(
    readonly inner: readonly string[],
    readonly outer: readonly string[],
  ) {}

  get size(): number {
    return this.inner.length;
  }

  static create(limit: number = MAX_NAME_INDEX): ScopeNamePool {
    if (!Number.isInteger(limit) || limit < 0) {
      throw new RangeError(`Scope name limit must be a non-negative integer, got ${limit}`);
    }
    const inner: string[] = [];
    const outer: string[] = [];
    for (let i = 0; i < limit; i += 1) {
      inner.push(`${INNER_PREFIX}${i}`);
      outer.push(`${OUTER_PREFIX}${i}`);
    }
    return new ScopeNamePool(Object.freeze(inner), Object.freeze(outer));
  }

  /**
   * The process-wide default pool, built on first use. Repeated calls return
   * the same instance.
   */
  static shared(): ScopeNamePool {
    if (!ScopeNamePool.sharedPool) {
      ScopeNamePool.sharedPool = ScopeNamePool.create(MAX_NAME_INDEX);
    }
    return ScopeNamePool.sharedPool;
  }
}

/**
 * Per-function position in a pool
 */
export class ScopeNameCursor {
  private next = 0;

  /**
   * @param taken names already present in the function; pairs touching one
   * of them are passed over
   */
  constructor(
    private readonly pool: ScopeNamePool,
    private readonly taken: ReadonlySet<string> = new Set(),
  ) {}

  /**
   * Take `count` consecutive pairs, or none when fewer remain
   */
  reserve(count: number): ScopeNamePair[] | null {
    const pairs: ScopeNamePair[] = [];
    let index = this.next;
    while (pairs.length < count && index < this.pool.size) {
      const inner = this.pool.inner[index];
      const outer = this.pool.outer[index];
      index += 1;
      if (this.taken.has(inner) || this.taken.has(outer)) continue;
      pairs.push({ inner, outer });
    }
    if (pairs.length < count) return null;
    this.next = index;
    return pairs;
  }
}
