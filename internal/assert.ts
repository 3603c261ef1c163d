import { InvariantViolation } from '../errors';

/** Throws InvariantViolation if `fact` is false. The message is 'B+ tree' followed by `args`. */
export function check(fact: boolean, ...args: unknown[]): asserts fact {
  if (!fact) {
    args.unshift('B+ tree'); // at beginning of message
    throw new InvariantViolation(args.join(' '));
  }
}
