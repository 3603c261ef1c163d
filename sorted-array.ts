import type { ISortedMap } from './interfaces';

/** A super-inefficient sorted list for testing purposes */
export default class SortedArray<K, V> implements ISortedMap<K, V>
{
  a: [K, V][];
  cmp: (a: K, b: K) => number;

  public constructor(compare: (a: K, b: K) => number, entries?: [K, V][]) {
    this.cmp = compare;
    this.a = [];
    if (entries !== undefined)
      for (const e of entries)
        this.set(e[0], e[1]);
  }

  get size() { return this.a.length; }
  get(key: K, defaultValue?: V): V | undefined {
    const i = this.indexOf(key, -1);
    return i < 0 ? defaultValue : this.a[i][1];
  }
  set(key: K, value: V): boolean {
    const i = this.indexOf(key, -1);
    if (i <= -1)
      this.a.splice(~i, 0, [key, value]);
    else
      this.a[i] = [key, value];
    return i <= -1;
  }
  has(key: K): boolean {
    return this.indexOf(key, -1) >= 0;
  }
  toArray(): [K, V][] { return this.a; }
  minKey(): K | undefined { return this.a.length === 0 ? undefined : this.a[0][0]; }
  maxKey(): K | undefined { return this.a.length === 0 ? undefined : this.a[this.a.length - 1][0]; }

  indexOf(key: K, failXor: number): number {
    let lo = 0, hi = this.a.length, mid = hi >> 1;
    while (lo < hi) {
      const c = this.cmp(this.a[mid][0], key);
      if (c < 0)
        lo = mid + 1;
      else if (c > 0) // keys[mid] > key
        hi = mid;
      else if (c === 0)
        return mid;
      else
        throw new Error("Problem: compare failed");
      mid = (lo + hi) >> 1;
    }
    return mid ^ failXor;
  }
}
