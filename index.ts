import BPlusTree from './b+tree';

export default BPlusTree;
export { BPlusTree };
export { defaultComparator, simpleComparator } from './b+tree';
export type { DefaultComparable } from './b+tree';
export type { IMapSource, IMapSink, IMap, ISortedMapSource, ISortedMap } from './interfaces';
export { BLeaf, BBranch } from './internal/nodes';
export type { BNode, InsertResult, SplitResult } from './internal/nodes';
export {
  isSorted, separatorsValid, balanced, fanoutRespected, occupancyRespected, valid, validateNode
} from './validate';
export type { ValidationReport } from './validate';
export { BPlusTreeError, ConfigError, InvariantViolation, UnorderedKeyError } from './errors';
