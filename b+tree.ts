// B+ tree by David Piepgrass. License: MIT
import type { ISortedMap } from './interfaces';
import { BBranch, BLeaf, type BNode, type BPlusTreeNodeHost } from './internal/nodes';
import { ConfigError, InvariantViolation } from './errors';
import { validateNode, type ValidationReport } from './validate';

export type {
  IMapSource, IMapSink, IMap, ISortedMapSource, ISortedMap
} from './interfaces';

/**
 * Types that BPlusTree supports by default
 */
export type DefaultComparable = number | string | Date | boolean | null | undefined | (number | string)[] |
               { valueOf: () => number | string | Date | boolean | null | undefined | (number | string)[] };

/**
 * Compares DefaultComparables to form a total order.
 *
 * Handles +/-0 and NaN like Map: NaN is equal to NaN, and -0 is equal to +0.
 * NaN sorts below every other number.
 *
 * Values of different types are ordered by the name of their type, so a
 * tree can hold a mix of numbers and strings.
 *
 * Arrays are compared using '<' and '>', which may cause unexpected equality:
 * for example [1] will be considered equal to ['1'].
 *
 * Two objects with equal valueOf compare the same, but compare unequal to
 * primitives that have the same value.
 */
export function defaultComparator(a: DefaultComparable, b: DefaultComparable): number {
  // Special case finite numbers first for performance.
  if (typeof a === 'number' && typeof b === 'number' && Number.isFinite(a) && Number.isFinite(b))
    return a - b || 0;

  const ta = typeof a, tb = typeof b;
  if (ta !== tb)
    return ta < tb ? -1 : 1;
  if (a === undefined || b === undefined)
    return 0; // both undefined
  // typeof null is 'object'
  if (a === null)
    return b === null ? 0 : -1;
  else if (b === null)
    return 1;

  if (typeof a === 'object' && typeof b === 'object' && !(Array.isArray(a) && Array.isArray(b))) {
    const ua = unwrap(a), ub = unwrap(b);
    // valueOf() that returns the object itself cannot be ordered
    if ((ua === a && !Array.isArray(a)) || (ub === b && !Array.isArray(b)))
      return Number.NaN;
    return defaultComparator(ua, ub);
  }

  // a and b are now the same type: number, string, boolean or two arrays
  if (a < b) return -1;
  if (a > b) return 1;
  if (a === b) return 0;

  // Order NaN less than other numbers
  if (Number.isNaN(a))
    return Number.isNaN(b) ? 0 : -1;
  else if (Number.isNaN(b))
    return 1;
  // Two arrays (e.g. [7] and ['7']) that aren't ordered
  return Array.isArray(a) ? 0 : Number.NaN;
}

function unwrap(x: NonNullable<DefaultComparable>): DefaultComparable {
  if (Array.isArray(x))
    return x;
  return typeof x === 'object' ? x.valueOf() : x;
}

/**
 * Compares items using the < and > operators. Unlike defaultComparator, this
 * comparator doesn't support mixed types, i.e. use it with
 * `BPlusTree<string>` or `BPlusTree<number>` but not `BPlusTree<string|number>`.
 *
 * NaN is not supported.
 */
export function simpleComparator(a: string, b: string): number;
export function simpleComparator(a: number, b: number): number;
export function simpleComparator(a: Date, b: Date): number;
export function simpleComparator(a: (number | string)[], b: (number | string)[]): number;
export function simpleComparator(a: string | number | Date | (number | string)[],
                                 b: string | number | Date | (number | string)[]): number {
  return a > b ? 1 : a < b ? -1 : 0;
}

/**
 * An ordered map stored as a B+ tree: values live in the leaves, branches
 * hold only the separator keys used to route a search, and every leaf is at
 * the same depth.
 *
 * The `order` passed to the constructor is the most children a branch may
 * have; a leaf holds at most `order - 1` pairs. When an insertion overfills a
 * node it is split at its median and the middle key moves up to the parent,
 * which may split in turn. If the root splits, a new root is created above it,
 * so the tree only ever grows upward.
 *
 * Lookups and insertions are O(log size). The tree is mutated in place and is
 * not safe to share between writers; there is no deletion.
 *
 * @example
 *     const tree = new BPlusTree<number, string>(4);
 *     tree.insert(5, "a");
 *     tree.insert(3, "b");
 *     tree.lookup(3); // "b"
 *     tree.insert(3, "z"); // returns false: replaced, not added
 */
export default class BPlusTree<K = DefaultComparable, V = unknown> implements ISortedMap<K, V>, BPlusTreeNodeHost<K>
{
  private _root: BNode<K, V>;
  private _size = 0;
  readonly _order: number;

  /**
   * provides a total order over keys
   * @returns a negative value if a < b, 0 if a === b and a positive value if a > b
   */
  readonly _compare: (a: K, b: K) => number;

  /**
   * Initializes an empty B+ tree.
   * @param order Maximum number of children per branch. Must be an integer >= 3.
   * @param compare Custom function to compare keys. If not specified,
   *   defaultComparator will be used, which is valid as long as K extends DefaultComparable.
   * @param entries Key-value pairs to insert, in order, after construction.
   * @throws ConfigError if `order` is not an integer >= 3
   */
  public constructor(order: number, compare?: (a: K, b: K) => number, entries?: [K, V][]) {
    if (!Number.isInteger(order) || order < 3)
      throw new ConfigError(order);
    this._order = order;
    this._compare = compare || defaultComparator as unknown as (a: K, b: K) => number;
    this._root = new BLeaf<K, V>();
    if (entries)
      this.setPairs(entries);
  }

  /** Gets the number of key-value pairs in the tree. */
  get size(): number { return this._size; }
  /** Gets the number of key-value pairs in the tree. */
  get length(): number { return this._size; }
  /** Returns true iff the tree contains no key-value pairs. */
  get isEmpty(): boolean { return this._size === 0; }

  /** Maximum number of children per branch. */
  get order(): number { return this._order; }
  /** Maximum number of pairs per leaf. */
  get maxLeafKeys(): number { return this._order - 1; }

  /** Gets the height of the tree: the number of branch levels above the
   *  leaves (zero if the root is a leaf). */
  get height(): number {
    let node = this._root, height = 0;
    while (!node.isLeaf) {
      node = node.children[0];
      height++;
    }
    return height;
  }

  /** Releases all pairs, leaving a single empty leaf. */
  clear(): void {
    this._root = new BLeaf<K, V>();
    this._size = 0;
  }

  /**
   * Adds a key-value pair, or replaces the value if the key already exists.
   * @returns true if a new key was added, false if a value was replaced.
   * @description Computational complexity: O(log size)
   */
  insert(key: K, value: V): boolean {
    const result = this._root.insert(key, value, this);
    if (result.kind === 'split') {
      // Root node has split, so grow the tree by one level.
      this._root = new BBranch<K, V>([result.separator], [result.left, result.right]);
      this._size++;
      return true;
    }
    this._root = result.node;
    if (result.added)
      this._size++;
    return result.added;
  }

  /** Same as insert(); provided for compatibility with `Map`-like sinks. */
  set(key: K, value: V): boolean {
    return this.insert(key, value);
  }

  /** Inserts all pairs in order. If there are duplicate keys, later pairs
   *  overwrite earlier ones (e.g. [[0,1],[0,7]] associates 0 with 7).
   * @returns The number of keys added to the collection.
   */
  setPairs(pairs: [K, V][]): number {
    let added = 0;
    for (const [key, value] of pairs)
      if (this.insert(key, value))
        added++;
    return added;
  }

  /**
   * Finds a key and returns the associated value, or undefined if absent.
   * Use has() to tell an absent key from a stored `undefined`.
   * @description Computational complexity: O(log size)
   */
  lookup(key: K): V | undefined {
    return this._root.lookup(key, undefined, this);
  }

  /**
   * Finds a pair in the tree and returns the associated value.
   * @param defaultValue a value to return if the key was not found.
   */
  get(key: K, defaultValue?: V): V | undefined {
    return this._root.lookup(key, defaultValue, this);
  }

  /** Returns true if the key exists in the tree. */
  has(key: K): boolean {
    return this._root.has(key, this);
  }

  /** Gets the lowest key in the tree. Complexity: O(log size) */
  minKey(): K | undefined { return this._root.minKey(); }

  /** Gets the highest key in the tree. Complexity: O(log size) */
  maxKey(): K | undefined { return this._root.maxKey(); }

  /** Gets an array filled with the contents of the tree, sorted by key */
  toArray(): [K, V][] {
    const results: [K, V][] = [];
    this._root.forEachPair((k, v) => { results.push([k, v]); });
    return results;
  }

  /** Gets an array of all keys, sorted */
  keysArray(): K[] {
    const results: K[] = [];
    this._root.forEachPair(k => { results.push(k); });
    return results;
  }

  /** Gets an array of all values, sorted by key */
  valuesArray(): V[] {
    const results: V[] = [];
    this._root.forEachPair((k, v) => { results.push(v); });
    return results;
  }

  /**
   * Renders the keys of every node, one line per level from the root down,
   * e.g. `[5]` over `[1 3] [5 8]`.
   */
  toString(): string {
    const lines: string[] = [];
    let level: BNode<K, V>[] = [this._root];
    while (level.length > 0) {
      const next: BNode<K, V>[] = [];
      lines.push(level.map(node => {
        if (!node.isLeaf)
          next.push(...node.children);
        return '[' + node.keys.map(String).join(' ') + ']';
      }).join(' '));
      level = next;
    }
    return lines.join('\n');
  }

  /** Checks sortedness, separator placement, balance and node sizes of the
   *  whole tree. Complexity: O(size) */
  validate(): ValidationReport {
    return validateNode(this._root, this._order, this._compare);
  }

  /** Scans the tree for signs of serious bugs and throws InvariantViolation
   *  listing all of them. Besides validate(), this also requires minimum
   *  occupancy and verifies the cached size. Complexity: O(size) */
  checkValid(): void {
    const problems = this.validate().problems;
    let counted = 0;
    this._root.forEachPair(() => { counted++; });
    if (counted !== this._size)
      problems.push(`size mismatch: counted ${counted} but stored ${this._size}`);
    if (problems.length > 0)
      throw new InvariantViolation('B+ tree is invalid: ' + problems.join('; '), problems);
  }
}
