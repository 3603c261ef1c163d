import BPlusTree from '.';
import SortedArray from './sorted-array';
// Note: The `bintrees` package also includes a `BinTree` type, an unbalanced
// binary tree that becomes extremely slow when filled with sorted data.
import {RBTree} from 'bintrees';

class Timer {
  start = Date.now();
  ms() { return Date.now() - this.start; }
  restart() { var ms = this.ms(); this.start += ms; return ms; }
}

function randInt(max: number) { return Math.random() * max | 0; }

function swap(keys: number[], i: number, j: number) {
  var tmp = keys[i];
  keys[i] = keys[j];
  keys[j] = tmp;
}

function makeArray(size: number, randomOrder: boolean, spacing = 10) {
  var keys: number[] = [], i, n;
  for (i = 0, n = 0; i < size; i++, n += 1 + randInt(spacing))
    keys[i] = n;
  if (randomOrder)
    for (i = 0; i < size; i++)
      swap(keys, i, randInt(size));
  return keys;
}

function measure<T=void>(message: (t:T) => string, callback: () => T, minMillisec: number = 600, log = console.log) {
  var timer = new Timer(), counter = 0, ms, result: T;
  do {
    result = callback();
    counter++;
  } while ((ms = timer.ms()) < minMillisec);
  ms /= counter;
  log((Math.round(ms * 10) / 10) + "\t" + message(result));
  return result;
}

const compare = (a: number, b: number) => a - b;
const ORDERS = [4, 32, 128];

console.log("Benchmark results (milliseconds with integer keys/values)");
console.log("---------------------------------------------------------");

console.log();
console.log("### Insertions at random locations: B+ tree vs the competition ###");

for (let size of [1000, 10000, 100000, 1000000]) {
  console.log();
  var keys = makeArray(size, true);

  for (let order of ORDERS) {
    measure(tree => `Insert ${tree.size} pairs in B+ tree of order ${order} (height ${tree.height})`, () => {
      let tree = new BPlusTree<number, number>(order, compare);
      for (let k of keys)
        tree.insert(k, k);
      return tree;
    });
  }
  measure(tree => `Insert ${tree.size} pairs in B+ tree of order 32 with default comparator`, () => {
    let tree = new BPlusTree<number, number>(32);
    for (let k of keys)
      tree.insert(k, k);
    return tree;
  });
  measure(set => `Insert ${set.size} pairs in bintrees' RBTree (no values)`, () => {
    let set = new RBTree<number>(compare);
    for (let k of keys)
      set.insert(k);
    return set;
  });
  if (size <= 10000) {
    measure(list => `Insert ${list.size} pairs in sorted array`, () => {
      let list = new SortedArray<number, number>(compare);
      for (let k of keys)
        list.set(k, k);
      return list;
    });
  }
  measure(map => `Insert ${map.size} pairs in ES6 Map (unsorted, for comparison)`, () => {
    let map = new Map<number, number>();
    for (let k of keys)
      map.set(k, k);
    return map;
  });
}

console.log();
console.log("### Insert in order ###");

for (let size of [1000, 10000, 100000, 1000000]) {
  console.log();
  var keys = makeArray(size, false);

  for (let order of ORDERS) {
    measure(tree => `Insert ${tree.size} sorted pairs in B+ tree of order ${order} (height ${tree.height})`, () => {
      let tree = new BPlusTree<number, number>(order, compare);
      for (let k of keys)
        tree.insert(k, k * 10);
      return tree;
    });
  }
  measure(set => `Insert ${set.size} sorted keys in bintrees' RBTree (no values)`, () => {
    let set = new RBTree<number>(compare);
    for (let k of keys)
      set.insert(k);
    return set;
  });
}

console.log();
console.log("### Lookups ###");

for (let size of [1000, 10000, 100000, 1000000]) {
  console.log();
  var keys = makeArray(size, true);
  var probes = makeArray(size, true);

  for (let order of ORDERS) {
    let tree = new BPlusTree<number, number>(order, compare);
    for (let k of keys)
      tree.insert(k, k);
    measure(found => `Look up ${size} keys in B+ tree of order ${order}: ${found} found`, () => {
      let found = 0;
      for (let k of probes)
        if (tree.has(k))
          found++;
      return found;
    });
  }
  let rb = new RBTree<number>(compare);
  for (let k of keys)
    rb.insert(k);
  measure(found => `Look up ${size} keys in bintrees' RBTree: ${found} found`, () => {
    let found = 0;
    for (let k of probes)
      if (rb.find(k) !== null)
        found++;
    return found;
  });
  let map = new Map<number, number>();
  for (let k of keys)
    map.set(k, k);
  measure(found => `Look up ${size} keys in ES6 Map: ${found} found`, () => {
    let found = 0;
    for (let k of probes)
      if (map.has(k))
        found++;
    return found;
  });
}

console.log();
console.log("### Validation ###");

for (let size of [1000, 100000]) {
  console.log();
  var keys = makeArray(size, true);
  for (let order of ORDERS) {
    let tree = new BPlusTree<number, number>(order, compare);
    for (let k of keys)
      tree.insert(k, k);
    measure(valid => `Validate B+ tree of order ${order} with ${tree.size} pairs: ${valid}`, () => {
      return tree.validate().valid;
    });
  }
}
