/** Read-only view of a key-value collection. */
export interface IMapSource<K = unknown, V = unknown> {
  /** Returns the number of key/value pairs in the map object. */
  readonly size: number;
  /** Returns the value associated to the key, or defaultValue if there is none. */
  get(key: K, defaultValue?: V): V | undefined;
  /** Returns a boolean asserting whether the key exists in the map object or not. */
  has(key: K): boolean;
}

/** Write-only part of a key-value collection. */
export interface IMapSink<K = unknown, V = unknown> {
  /** Sets the value for the key. Returns true if the key was not present before. */
  set(key: K, value: V): boolean;
}

/** An insert-and-lookup map. */
export interface IMap<K = unknown, V = unknown> extends IMapSource<K, V>, IMapSink<K, V> {}

/** A map that keeps its keys sorted. */
export interface ISortedMapSource<K = unknown, V = unknown> extends IMapSource<K, V> {
  /** Gets the lowest key in the collection. */
  minKey(): K | undefined;
  /** Gets the highest key in the collection. */
  maxKey(): K | undefined;
  /** All pairs, sorted by key. */
  toArray(): [K, V][];
}

export interface ISortedMap<K = unknown, V = unknown> extends IMap<K, V>, ISortedMapSource<K, V> {}
