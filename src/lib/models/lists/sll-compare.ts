
import type { Sll } from './sll';
import type { SllConstIterator } from './sll-iterator';
import { isBigInt, isBoolean, isDate, isString } from '../../util/validate-primitives';

export type EqFn<TVal> = (a: TVal, b: TVal) => boolean;
export type LessFn<TVal> = (a: TVal, b: TVal) => boolean;

export function defaultEq<TVal>(a: TVal, b: TVal): boolean {
  return a === b;
}

/*
  Orders values of the same primitive kind (and Dates). Anything else
    has no natural "<" and needs a caller supplied LessFn.
*/
export function defaultLess<TVal>(a: TVal, b: TVal): boolean {
  if(
    ((typeof a) === 'number')
    && ((typeof b) === 'number')
  ) {
    return Number(a) < Number(b);
  }
  if(isString(a) && isString(b)) {
    return a < b;
  }
  if(isBigInt(a) && isBigInt(b)) {
    return a < b;
  }
  if(isBoolean(a) && isBoolean(b)) {
    return !a && b;
  }
  if(isDate(a) && isDate(b)) {
    return a.getTime() < b.getTime();
  }
  throw new TypeError(`No default ordering between ${getKindStr(a)} and ${getKindStr(b)}, pass a lessFn`);
}

export function sllEquals<TVal>(
  lhs: Sll<TVal>,
  rhs: Sll<TVal>,
  eqFn: EqFn<TVal> = defaultEq,
): boolean {
  let lhsIt: SllConstIterator<TVal>;
  let rhsIt: SllConstIterator<TVal>;
  if(lhs.length !== rhs.length) {
    return false;
  }
  lhsIt = lhs.cbegin();
  rhsIt = rhs.cbegin();
  while(!lhsIt.isEnd()) {
    if(!eqFn(lhsIt.val, rhsIt.val)) {
      return false;
    }
    lhsIt.advance();
    rhsIt.advance();
  }
  return true;
}

export function sllNotEquals<TVal>(
  lhs: Sll<TVal>,
  rhs: Sll<TVal>,
  eqFn?: EqFn<TVal>,
): boolean {
  return !sllEquals(lhs, rhs, eqFn);
}

/*
  lexicographic: the first differing element decides, and a proper
    prefix is less than the longer list
*/
export function sllLessThan<TVal>(
  lhs: Sll<TVal>,
  rhs: Sll<TVal>,
  lessFn: LessFn<TVal> = defaultLess,
): boolean {
  let lhsIt: SllConstIterator<TVal>;
  let rhsIt: SllConstIterator<TVal>;
  lhsIt = lhs.cbegin();
  rhsIt = rhs.cbegin();
  while(!lhsIt.isEnd()) {
    if(rhsIt.isEnd()) {
      return false;
    }
    if(lessFn(lhsIt.val, rhsIt.val)) {
      return true;
    }
    if(lessFn(rhsIt.val, lhsIt.val)) {
      return false;
    }
    lhsIt.advance();
    rhsIt.advance();
  }
  return !rhsIt.isEnd();
}

export function sllLessEq<TVal>(
  lhs: Sll<TVal>,
  rhs: Sll<TVal>,
  lessFn?: LessFn<TVal>,
): boolean {
  return !sllLessThan(rhs, lhs, lessFn);
}

export function sllGreaterThan<TVal>(
  lhs: Sll<TVal>,
  rhs: Sll<TVal>,
  lessFn?: LessFn<TVal>,
): boolean {
  return sllLessThan(rhs, lhs, lessFn);
}

export function sllGreaterEq<TVal>(
  lhs: Sll<TVal>,
  rhs: Sll<TVal>,
  lessFn?: LessFn<TVal>,
): boolean {
  return !sllLessThan(lhs, rhs, lessFn);
}

/*
  sort comparator, e.g. lists.sort((a, b) => sllCompare(a, b))
*/
export function sllCompare<TVal>(
  lhs: Sll<TVal>,
  rhs: Sll<TVal>,
  lessFn?: LessFn<TVal>,
): -1 | 0 | 1 {
  if(sllLessThan(lhs, rhs, lessFn)) {
    return -1;
  }
  if(sllLessThan(rhs, lhs, lessFn)) {
    return 1;
  }
  return 0;
}

export function sllSwap<TVal>(lhs: Sll<TVal>, rhs: Sll<TVal>) {
  lhs.swap(rhs);
}

function getKindStr(val: unknown): string {
  if(val === null) {
    return 'null';
  }
  if(isDate(val)) {
    return 'Date';
  }
  return typeof val;
}
