
export { Sll } from './lib/models/lists/sll';
export type { SllOpts, CloneValFn } from './lib/models/lists/sll';
export { SllConstIterator, SllIterator } from './lib/models/lists/sll-iterator';
export { SllContractError } from './lib/models/lists/sll-error';
export {
  defaultEq,
  defaultLess,
  sllCompare,
  sllEquals,
  sllGreaterEq,
  sllGreaterThan,
  sllLessEq,
  sllLessThan,
  sllNotEquals,
  sllSwap,
} from './lib/models/lists/sll-compare';
export type { EqFn, LessFn } from './lib/models/lists/sll-compare';
