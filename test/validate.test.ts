import {
  balanced, fanoutRespected, isSorted, occupancyRespected, separatorsValid, valid, validateNode
} from '../validate';
import { BLeaf } from '../internal/nodes';
import { branch, compareNumbers, leaf } from './shared';

describe('Validator on hand-built nodes', () =>
{
  test('a sorted leaf is valid at height 0', () => {
    const report = validateNode(leaf(1, 3), 4, compareNumbers);
    expect(report.valid).toBe(true);
    expect(report.height).toBe(0);
    expect(report.problems).toEqual([]);
  });

  test('an empty root leaf is valid', () => {
    expect(valid(leaf(), 3, compareNumbers)).toBe(true);
    expect(occupancyRespected(leaf(), 3)).toBe(true);
  });

  test('unsorted and duplicate keys break sortedness', () => {
    expect(isSorted(leaf(3, 1), compareNumbers)).toBe(false);
    expect(isSorted(leaf(2, 2), compareNumbers)).toBe(false);
    const report = validateNode(leaf(3, 1), 4, compareNumbers);
    expect(report.sorted).toBe(false);
    expect(report.valid).toBe(false);
    expect(report.problems).toEqual(['root: keys[0] = 3 is not less than keys[1] = 1']);
  });

  test('sortedness is checked in every node', () => {
    const tree = branch([5], [leaf(1, 3), leaf(7, 6)]);
    expect(isSorted(tree, compareNumbers)).toBe(false);
    expect(validateNode(tree, 4, compareNumbers).problems)
      .toEqual(['root/1: keys[0] = 7 is not less than keys[1] = 6']);
  });

  test('a key in the right child below the separator is misplaced', () => {
    const tree = branch([5], [leaf(1, 3), leaf(4, 6)]);
    expect(separatorsValid(tree, compareNumbers)).toBe(false);
    expect(isSorted(tree, compareNumbers)).toBe(true);
    expect(validateNode(tree, 4, compareNumbers).problems)
      .toEqual(['root/1: key 4 is below the lower separator 5']);
  });

  test('the separator itself may not appear in the left child', () => {
    const tree = branch([5], [leaf(1, 5), leaf(6, 7)]);
    expect(separatorsValid(tree, compareNumbers)).toBe(false);
    expect(validateNode(tree, 4, compareNumbers).problems)
      .toEqual(['root/0: key 5 is not below the upper separator 5']);
  });

  test('bounds apply to keys at any depth', () => {
    const tree = branch([10], [
      branch([5], [leaf(1, 2), leaf(5, 12)]),
      branch([20], [leaf(10, 11), leaf(20, 21)]),
    ]);
    expect(separatorsValid(tree, compareNumbers)).toBe(false);
    expect(balanced(tree)).toBe(true);
    expect(validateNode(tree, 4, compareNumbers).problems)
      .toEqual(['root/0/1: key 12 is not below the upper separator 10']);
  });

  test('a branch needs one more child than keys', () => {
    const tree = branch([5], [leaf(1)]);
    expect(separatorsValid(tree, compareNumbers)).toBe(false);
    expect(isSorted(tree, compareNumbers)).toBe(true);
    expect(balanced(tree)).toBe(true);
    expect(validateNode(tree, 4, compareNumbers).problems)
      .toContain('root: branch has 1 keys but 1 children');
  });

  test('children at different depths are unbalanced', () => {
    // one leaf child and one branch child
    const tree = branch([5], [leaf(1, 3), branch([7], [leaf(5, 6), leaf(7, 8)])]);
    expect(balanced(tree)).toBe(false);
    expect(isSorted(tree, compareNumbers)).toBe(true);
    expect(separatorsValid(tree, compareNumbers)).toBe(true);
    expect(fanoutRespected(tree, 4)).toBe(true);
    expect(valid(tree, 4, compareNumbers)).toBe(false);
    const report = validateNode(tree, 4, compareNumbers);
    expect(report.height).toBe(-1);
    expect(report.problems).toEqual(['root/1: subtree height 1 differs from sibling height 0']);
  });

  test('a balanced tree reports its height', () => {
    const tree = branch([10], [
      branch([5], [leaf(1, 2), leaf(5, 6)]),
      branch([20], [leaf(10, 11), leaf(20, 21)]),
    ]);
    const report = validateNode(tree, 4, compareNumbers);
    expect(report.valid).toBe(true);
    expect(report.height).toBe(2);
    expect(report.problems).toEqual([]);
  });

  test('an overfull leaf breaks the fanout bound', () => {
    expect(fanoutRespected(leaf(1, 2, 3), 3)).toBe(false);
    expect(fanoutRespected(leaf(1, 2, 3), 4)).toBe(true);
    expect(validateNode(leaf(1, 2, 3), 3, compareNumbers).problems)
      .toEqual(['root: leaf holds 3 keys, more than 2']);
  });

  test('an overfull branch breaks the fanout bound', () => {
    const tree = branch([3, 5, 7], [leaf(1, 2), leaf(3, 4), leaf(5, 6), leaf(7, 8)]);
    expect(fanoutRespected(tree, 3)).toBe(false);
    expect(fanoutRespected(tree, 4)).toBe(true);
    expect(validateNode(tree, 3, compareNumbers).problems)
      .toEqual(['root: branch has 4 children, more than 3']);
  });

  test('underfull nodes are reported without affecting validity', () => {
    const tree = branch([5], [leaf(1), leaf(5, 6)]);
    expect(occupancyRespected(tree, 4)).toBe(false);
    const report = validateNode(tree, 4, compareNumbers);
    expect(report.valid).toBe(true);
    expect(report.occupancyRespected).toBe(false);
    expect(report.problems).toEqual(['root/0: leaf holds 1 keys, fewer than 2']);
  });

  test('a root branch needs two children', () => {
    const tree = branch([], [leaf(1, 2)]);
    expect(occupancyRespected(tree, 4)).toBe(false);
    expect(validateNode(tree, 4, compareNumbers).problems)
      .toEqual(['root: branch has 1 children, fewer than 2']);
  });

  test('a non-root branch needs half its order in children', () => {
    const inner = branch([], [leaf(1, 2, 3)]);
    const tree = branch([10], [inner, branch([20, 30], [leaf(10, 11, 12), leaf(20, 21), leaf(30, 31)])]);
    expect(occupancyRespected(tree, 5)).toBe(false);
    expect(validateNode(tree, 5, compareNumbers).problems)
      .toEqual(['root/0: branch has 1 children, fewer than 3']);
  });

  test('a leaf without one value per key is misaligned', () => {
    const report = validateNode(new BLeaf<number, string>([1, 2], ['a']), 4, compareNumbers);
    expect(report.aligned).toBe(false);
    expect(report.valid).toBe(true);
    expect(report.problems).toEqual(['root: leaf has 2 keys but 1 values']);
  });

  test('every failure is reported', () => {
    const tree = branch([5], [leaf(2, 1), leaf(4, 6, 8, 9)]);
    const report = validateNode(tree, 4, compareNumbers);
    expect(report.sorted).toBe(false);
    expect(report.separatorsValid).toBe(false);
    expect(report.fanoutRespected).toBe(false);
    expect(report.balanced).toBe(true);
    expect(report.problems).toEqual([
      'root/0: keys[0] = 2 is not less than keys[1] = 1',
      'root/1: key 4 is below the lower separator 5',
      'root/1: leaf holds 4 keys, more than 3',
    ]);
  });

  test('string keys are quoted in messages', () => {
    const strings = (a: string, b: string) => a < b ? -1 : a > b ? 1 : 0;
    const report = validateNode(new BLeaf<string, number>(['b', 'a'], [1, 2]), 4, strings);
    expect(report.problems).toEqual(['root: keys[0] = "b" is not less than keys[1] = "a"']);
  });
});
