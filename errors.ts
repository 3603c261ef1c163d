/** Base class of every error thrown by this package. */
export class BPlusTreeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Thrown by the BPlusTree constructor when the order is unusable. */
export class ConfigError extends BPlusTreeError {
  readonly order: number;

  constructor(order: number) {
    super(`B+ tree order must be an integer >= 3, got ${order}`);
    this.order = order;
  }
}

/**
 * Signals a broken structural invariant: unsorted keys, a misplaced separator,
 * leaves at unequal depths or an overfull node. Insert cannot produce such a
 * tree through the public API, so this always indicates a bug (or a tree that
 * was assembled by hand from node objects).
 */
export class InvariantViolation extends BPlusTreeError {
  /** One line per failed check. */
  readonly problems: string[];

  constructor(message: string, problems: string[] = [message]) {
    super(message);
    this.problems = problems;
  }
}

/** Thrown when the comparator cannot place a key, e.g. a NaN key with a comparator that returns NaN. */
export class UnorderedKeyError extends BPlusTreeError {
  readonly key: unknown;

  constructor(key: unknown) {
    super(`B+ tree: key ${String(key)} is not ordered by the comparator`);
    this.key = key;
  }
}
