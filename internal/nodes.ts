import { UnorderedKeyError } from '../errors';
import { check } from './assert';

type index = number;

/** The parts of a tree that node operations need. @internal */
export interface BPlusTreeNodeHost<K> {
  _compare: (a: K, b: K) => number;
  /** Maximum children per branch; leaves hold at most `_order - 1` keys. */
  _order: number;
}

/** A node is either a leaf (keys + values) or a branch (separators + children). */
export type BNode<K, V> = BLeaf<K, V> | BBranch<K, V>;

/**
 * Outcome of inserting into a subtree. `absorbed` means the subtree still
 * fits in one node; `split` means the caller must adopt `right` next to
 * `left`, with `separator` as the key between them.
 */
export type InsertResult<K, V> =
  | { kind: 'absorbed', node: BNode<K, V>, added: boolean }
  | SplitResult<K, V>;

export type SplitResult<K, V> =
  { kind: 'split', left: BNode<K, V>, separator: K, right: BNode<K, V> };

/** Key storage and binary search shared by both node kinds. ****************/
abstract class NodeBase<K> {
  keys: K[];

  constructor(keys: K[]) {
    this.keys = keys;
  }

  // If key not found, returns i^failXor where i is the insertion index.
  // Callers that don't care whether there was a match will set failXor=0.
  indexOf(key: K, failXor: number, cmp: (a: K, b: K) => number): index {
    const keys = this.keys;
    let lo = 0, hi = keys.length, mid = hi >> 1;
    while (lo < hi) {
      const c = cmp(keys[mid], key);
      if (c < 0)
        lo = mid + 1;
      else if (c > 0) // key < keys[mid]
        hi = mid;
      else if (c === 0)
        return mid;
      else {
        // c is NaN or otherwise invalid
        if (key === key) // at least the search key is not NaN
          return keys.length ^ failXor;
        else
          throw new UnorderedKeyError(key);
      }
      mid = (lo + hi) >> 1;
    }
    return mid ^ failXor;
  }
}

/** Leaf node ****************************************************************/
export class BLeaf<K, V> extends NodeBase<K> {
  readonly isLeaf = true;
  /** values[i] belongs to keys[i] */
  values: V[];

  constructor(keys: K[] = [], values: V[] = []) {
    super(keys);
    this.values = values;
  }

  minKey(): K | undefined {
    return this.keys.length === 0 ? undefined : this.keys[0];
  }

  maxKey(): K | undefined {
    return this.keys.length === 0 ? undefined : this.keys[this.keys.length - 1];
  }

  lookup(key: K, defaultValue: V | undefined, tree: BPlusTreeNodeHost<K>): V | undefined {
    const i = this.indexOf(key, -1, tree._compare);
    return i < 0 ? defaultValue : this.values[i];
  }

  has(key: K, tree: BPlusTreeNodeHost<K>): boolean {
    return this.indexOf(key, -1, tree._compare) >= 0;
  }

  forEachPair(onFound: (k: K, v: V) => void): void {
    const keys = this.keys, values = this.values;
    for (let i = 0; i < keys.length; i++)
      onFound(keys[i], values[i]);
  }

  /////////////////////////////////////////////////////////////////////////////
  // Leaf Node: insert & splitting ////////////////////////////////////////////

  insert(key: K, value: V, tree: BPlusTreeNodeHost<K>): InsertResult<K, V> {
    let i = this.indexOf(key, -1, tree._compare);
    if (i >= 0) {
      // Key already exists: replace the value, the key set is unchanged
      this.values[i] = value;
      return { kind: 'absorbed', node: this, added: false };
    }
    i = ~i;
    this.keys.splice(i, 0, key);
    this.values.splice(i, 0, value);
    if (this.keys.length < tree._order)
      return { kind: 'absorbed', node: this, added: true };
    return this.splitAt(this.keys.length >> 1);
  }

  /**
   * Moves keys[mid..] and their values into a new right sibling. The first
   * key of the sibling is promoted as the separator; it stays in the sibling.
   */
  splitAt(mid: index): SplitResult<K, V> {
    check(mid > 0 && mid < this.keys.length, "leaf split index", mid, "out of range for", this.keys.length, "keys");
    const keys = this.keys.splice(mid);
    const right = new BLeaf<K, V>(keys, this.values.splice(mid));
    return { kind: 'split', left: this, separator: keys[0], right };
  }
}

/** Branch node **************************************************************/
export class BBranch<K, V> extends NodeBase<K> {
  readonly isLeaf = false;
  // children[i] holds the keys k with keys[i-1] <= k < keys[i]
  children: BNode<K, V>[];

  constructor(keys: K[], children: BNode<K, V>[]) {
    super(keys);
    this.children = children;
  }

  /** Index of the child whose range contains `key`: the first i with key < keys[i]. */
  childIndex(key: K, cmp: (a: K, b: K) => number): index {
    const i = this.indexOf(key, -1, cmp);
    // an exact match belongs to the right of the separator
    return i < 0 ? ~i : i + 1;
  }

  minKey(): K | undefined {
    return this.children[0].minKey();
  }

  maxKey(): K | undefined {
    return this.children[this.children.length - 1].maxKey();
  }

  lookup(key: K, defaultValue: V | undefined, tree: BPlusTreeNodeHost<K>): V | undefined {
    return this.children[this.childIndex(key, tree._compare)].lookup(key, defaultValue, tree);
  }

  has(key: K, tree: BPlusTreeNodeHost<K>): boolean {
    return this.children[this.childIndex(key, tree._compare)].has(key, tree);
  }

  forEachPair(onFound: (k: K, v: V) => void): void {
    for (const child of this.children)
      child.forEachPair(onFound);
  }

  /////////////////////////////////////////////////////////////////////////////
  // Branch Node: insert & splitting //////////////////////////////////////////

  insert(key: K, value: V, tree: BPlusTreeNodeHost<K>): InsertResult<K, V> {
    const i = this.childIndex(key, tree._compare);
    const result = this.children[i].insert(key, value, tree);
    if (result.kind === 'absorbed') {
      this.children[i] = result.node;
      return { kind: 'absorbed', node: this, added: result.added };
    }

    // The child has split: adopt its right half after it
    this.children[i] = result.left;
    this.keys.splice(i, 0, result.separator);
    this.children.splice(i + 1, 0, result.right);
    if (this.children.length <= tree._order)
      return { kind: 'absorbed', node: this, added: true };
    return this.splitAt(this.keys.length >> 1);
  }

  /**
   * Moves keys[mid+1..] and children[mid+1..] into a new right sibling.
   * keys[mid] moves up to the parent and is kept by neither half.
   */
  splitAt(mid: index): SplitResult<K, V> {
    check(mid > 0 && mid < this.keys.length - 1, "branch split index", mid, "out of range for", this.keys.length, "keys");
    const separator = this.keys[mid];
    const rightKeys = this.keys.splice(mid).slice(1);
    const right = new BBranch<K, V>(rightKeys, this.children.splice(mid + 1));
    return { kind: 'split', left: this, separator, right };
  }
}
