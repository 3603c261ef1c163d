import type { BNode } from './internal/nodes';

type Compare<K> = (a: K, b: K) => number;

// Boxed so that a key of `undefined` can still act as a bound.
type Bound<K> = { key: K } | undefined;

/**
 * Result of checking every structural invariant of a (sub)tree.
 * `valid` combines sortedness, separator validity, balance and the fanout
 * bound. Minimum occupancy and key/value alignment are reported but do not
 * affect `valid`.
 */
export interface ValidationReport {
  valid: boolean;
  sorted: boolean;
  separatorsValid: boolean;
  balanced: boolean;
  fanoutRespected: boolean;
  occupancyRespected: boolean;
  /** Every leaf has exactly one value per key. */
  aligned: boolean;
  /** Depth of the leaves below `node`, or -1 if they are not all at one depth. */
  height: number;
  /** One line per failed check, prefixed by the node path (`root/1/0`). */
  problems: string[];
}

/** True iff the keys of every node in the subtree are strictly increasing. */
export function isSorted<K, V>(node: BNode<K, V>, compare: Compare<K>): boolean {
  return checkSorted(node, compare, 'root', undefined);
}

/**
 * True iff every branch has one more child than keys, and every key in
 * `children[i]` (at any depth) lies in `[keys[i-1], keys[i])`.
 */
export function separatorsValid<K, V>(node: BNode<K, V>, compare: Compare<K>): boolean {
  return checkSeparators(node, compare, undefined, undefined, 'root', undefined);
}

/** True iff all leaves are at the same depth. */
export function balanced<K, V>(node: BNode<K, V>): boolean {
  return heightOf(node, 'root', undefined) >= 0;
}

/** True iff no leaf holds more than `order - 1` keys and no branch more than `order` children. */
export function fanoutRespected<K, V>(node: BNode<K, V>, order: number): boolean {
  return checkFanout(node, order, 'root', undefined);
}

/**
 * True iff no node below the root is less than half full: leaves hold at
 * least `floor(order/2)` keys and branches at least `ceil(order/2)`
 * children. A root branch needs two children; a root leaf may be empty.
 */
export function occupancyRespected<K, V>(node: BNode<K, V>, order: number): boolean {
  return checkOccupancy(node, order, true, 'root', undefined);
}

export function valid<K, V>(node: BNode<K, V>, order: number, compare: Compare<K>): boolean {
  return isSorted(node, compare) && separatorsValid(node, compare)
    && balanced(node) && fanoutRespected(node, order);
}

/** Runs every check on `node` (treated as a root) and collects all problems. */
export function validateNode<K, V>(node: BNode<K, V>, order: number, compare: Compare<K>): ValidationReport {
  const problems: string[] = [];
  const sorted = checkSorted(node, compare, 'root', problems);
  const separators = checkSeparators(node, compare, undefined, undefined, 'root', problems);
  const height = heightOf(node, 'root', problems);
  const fanout = checkFanout(node, order, 'root', problems);
  const occupancy = checkOccupancy(node, order, true, 'root', problems);
  const aligned = checkAligned(node, 'root', problems);
  return {
    valid: sorted && separators && height >= 0 && fanout,
    sorted,
    separatorsValid: separators,
    balanced: height >= 0,
    fanoutRespected: fanout,
    occupancyRespected: occupancy,
    aligned,
    height,
    problems,
  };
}

// Each check below stops at the first failure when `problems` is undefined,
// and otherwise records every failure and keeps going.

function fail(problems: string[] | undefined, message: string): false {
  if (problems !== undefined)
    problems.push(message);
  return false;
}

function show(key: unknown): string {
  return typeof key === 'string' ? JSON.stringify(key) : String(key);
}

function checkSorted<K, V>(node: BNode<K, V>, compare: Compare<K>, path: string, problems: string[] | undefined): boolean {
  let ok = true;
  const keys = node.keys;
  for (let i = 1; i < keys.length; i++) {
    if (!(compare(keys[i - 1], keys[i]) < 0)) {
      ok = fail(problems, `${path}: keys[${i - 1}] = ${show(keys[i - 1])} is not less than keys[${i}] = ${show(keys[i])}`);
      if (problems === undefined)
        return false;
    }
  }
  if (!node.isLeaf) {
    for (let i = 0; i < node.children.length; i++) {
      if (!checkSorted(node.children[i], compare, `${path}/${i}`, problems)) {
        ok = false;
        if (problems === undefined)
          return false;
      }
    }
  }
  return ok;
}

function checkSeparators<K, V>(node: BNode<K, V>, compare: Compare<K>, low: Bound<K>, high: Bound<K>,
                               path: string, problems: string[] | undefined): boolean {
  let ok = true;
  for (const key of node.keys) {
    if (low !== undefined && !(compare(key, low.key) >= 0))
      ok = fail(problems, `${path}: key ${show(key)} is below the lower separator ${show(low.key)}`);
    else if (high !== undefined && !(compare(key, high.key) < 0))
      ok = fail(problems, `${path}: key ${show(key)} is not below the upper separator ${show(high.key)}`);
    if (!ok && problems === undefined)
      return false;
  }
  if (node.isLeaf)
    return ok;

  const { keys, children } = node;
  if (children.length !== keys.length + 1)
    return fail(problems, `${path}: branch has ${keys.length} keys but ${children.length} children`);
  for (let i = 0; i < children.length; i++) {
    const lo = i === 0 ? low : { key: keys[i - 1] };
    const hi = i === keys.length ? high : { key: keys[i] };
    if (!checkSeparators(children[i], compare, lo, hi, `${path}/${i}`, problems)) {
      ok = false;
      if (problems === undefined)
        return false;
    }
  }
  return ok;
}

// Returns the common depth of the leaves below `node`, or -1.
function heightOf<K, V>(node: BNode<K, V>, path: string, problems: string[] | undefined): number {
  if (node.isLeaf)
    return 0;
  let height: number | undefined, ok = true;
  for (let i = 0; i < node.children.length; i++) {
    const h = heightOf(node.children[i], `${path}/${i}`, problems);
    if (h < 0)
      ok = false;
    else if (height === undefined)
      height = h;
    else if (h !== height)
      ok = fail(problems, `${path}/${i}: subtree height ${h} differs from sibling height ${height}`);
    if (!ok && problems === undefined)
      return -1;
  }
  return ok ? (height ?? 0) + 1 : -1;
}

function checkFanout<K, V>(node: BNode<K, V>, order: number, path: string, problems: string[] | undefined): boolean {
  if (node.isLeaf) {
    if (node.keys.length > order - 1)
      return fail(problems, `${path}: leaf holds ${node.keys.length} keys, more than ${order - 1}`);
    return true;
  }
  let ok = true;
  if (node.children.length > order) {
    ok = fail(problems, `${path}: branch has ${node.children.length} children, more than ${order}`);
    if (problems === undefined)
      return false;
  }
  for (let i = 0; i < node.children.length; i++) {
    if (!checkFanout(node.children[i], order, `${path}/${i}`, problems)) {
      ok = false;
      if (problems === undefined)
        return false;
    }
  }
  return ok;
}

function checkOccupancy<K, V>(node: BNode<K, V>, order: number, isRoot: boolean,
                              path: string, problems: string[] | undefined): boolean {
  if (node.isLeaf) {
    const min = order >> 1;
    if (!isRoot && node.keys.length < min)
      return fail(problems, `${path}: leaf holds ${node.keys.length} keys, fewer than ${min}`);
    return true;
  }
  let ok = true;
  const min = isRoot ? 2 : Math.ceil(order / 2);
  if (node.children.length < min) {
    ok = fail(problems, `${path}: branch has ${node.children.length} children, fewer than ${min}`);
    if (problems === undefined)
      return false;
  }
  for (let i = 0; i < node.children.length; i++) {
    if (!checkOccupancy(node.children[i], order, false, `${path}/${i}`, problems)) {
      ok = false;
      if (problems === undefined)
        return false;
    }
  }
  return ok;
}

function checkAligned<K, V>(node: BNode<K, V>, path: string, problems: string[]): boolean {
  if (node.isLeaf) {
    if (node.values.length !== node.keys.length)
      return fail(problems, `${path}: leaf has ${node.keys.length} keys but ${node.values.length} values`);
    return true;
  }
  let ok = true;
  for (let i = 0; i < node.children.length; i++)
    ok = checkAligned(node.children[i], `${path}/${i}`, problems) && ok;
  return ok;
}
