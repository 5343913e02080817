/**
 * Tree - a sorted key/value map with range scans.
 * Keys compare by UTF-16 code unit, which matches byte order for ASCII keys.
 */

export interface Bound {
  key: string;
  inclusive: boolean;
}

export interface RangeOptions {
  lower?: Bound;
  upper?: Bound;
  reverse?: boolean;
}

export interface Entry {
  key: string;
  value: unknown;
}

/** Called after every mutation; throwing rolls the mutation back. */
export type PersistHook = (tree: Tree) => void;

export class Tree {
  readonly name: string;
  private keys: string[] = [];
  private values: Map<string, unknown> = new Map();
  private persist: PersistHook | null;

  constructor(name: string, entries: Entry[] = [], persist: PersistHook | null = null) {
    this.name = name;
    this.persist = persist;
    for (const { key, value } of entries) {
      this.values.set(key, value);
    }
    this.keys = Array.from(this.values.keys()).sort(compareKeys);
  }

  get size(): number {
    return this.keys.length;
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  get(key: string): unknown {
    return this.values.get(key);
  }

  /** Insert or replace a value, returning the previous one. */
  insert(key: string, value: unknown): unknown {
    const existed = this.values.has(key);
    const previous = this.values.get(key);

    this.values.set(key, value);
    if (!existed) {
      this.keys.splice(this.lowerBound(key), 0, key);
    }

    try {
      this.persist?.(this);
    } catch (error) {
      if (existed) {
        this.values.set(key, previous);
      } else {
        this.values.delete(key);
        this.keys.splice(this.lowerBound(key), 1);
      }
      throw error;
    }
    return previous;
  }

  remove(key: string): unknown {
    if (!this.values.has(key)) return undefined;
    const previous = this.values.get(key);
    const index = this.lowerBound(key);

    this.values.delete(key);
    this.keys.splice(index, 1);

    try {
      this.persist?.(this);
    } catch (error) {
      this.values.set(key, previous);
      this.keys.splice(index, 0, key);
      throw error;
    }
    return previous;
  }

  *range(options: RangeOptions = {}): Generator<Entry> {
    const { lower, upper, reverse = false } = options;
    const start = lower ? (lower.inclusive ? this.lowerBound(lower.key) : this.upperBound(lower.key)) : 0;
    const end = upper ? (upper.inclusive ? this.upperBound(upper.key) : this.lowerBound(upper.key)) : this.keys.length;
    if (start >= end) return;

    // Snapshot so callers may mutate the tree while iterating
    const slice = this.keys.slice(start, end);
    if (reverse) slice.reverse();
    for (const key of slice) {
      if (this.values.has(key)) {
        yield { key, value: this.values.get(key) };
      }
    }
  }

  entries(): Entry[] {
    return this.keys.map((key) => ({ key, value: this.values.get(key) }));
  }

  /** First index whose key is >= key */
  private lowerBound(key: string): number {
    let lo = 0;
    let hi = this.keys.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.keys[mid] < key) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }

  /** First index whose key is > key */
  private upperBound(key: string): number {
    let lo = 0;
    let hi = this.keys.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.keys[mid] <= key) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }
}

export function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
