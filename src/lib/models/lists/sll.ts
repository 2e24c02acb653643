
import { config } from '../../../config';
import { SllContractError } from './sll-error';
import { SllConstIterator, SllIterator } from './sll-iterator';
import { SllNode } from './sll-node';
import { EqFn, LessFn, sllEquals, sllLessThan } from './sll-compare';

export type SllOpts = {
  /*
    walk the chain to check that positions passed to insertAfter() and
      eraseAfter() belong to this list; O(n) per call
  */
  debugAssert?: boolean;
};

export type CloneValFn<TVal> = (val: TVal) => TVal;

export class Sll<TVal> {
  private _length: number;
  private head: SllNode<TVal>;
  private debugAssert: boolean;

  constructor(vals: Iterable<TVal> = [], opts: SllOpts = {}) {
    this._length = 0;
    this.head = SllNode.initSentinel();
    this.debugAssert = opts.debugAssert ?? config.SLL_DEBUG_ASSERT;
    this.initFromIterable(vals);
  }

  get length(): number {
    return this._length;
  }

  isEmpty(): boolean {
    return this._length === 0;
  }

  /*
    Copies every value into a new, independent list. cloneVal defaults to
      identity, so object values are shared by reference.
  */
  clone(cloneVal?: CloneValFn<TVal>): Sll<TVal> {
    let copy: Sll<TVal>;
    copy = new Sll<TVal>([], {
      debugAssert: this.debugAssert,
    });
    copy.initFromIterable(this, cloneVal);
    return copy;
  }

  /*
    copy-and-swap: the full copy is built before this list is touched,
      so a throwing cloneVal leaves it as it was
  */
  assign(rhs: Sll<TVal>, cloneVal?: CloneValFn<TVal>): this {
    let tmp: Sll<TVal>;
    if(rhs === this) {
      return this;
    }
    tmp = rhs.clone(cloneVal);
    this.swap(tmp);
    tmp.$destroy();
    return this;
  }

  swap(other: Sll<TVal>) {
    let otherFirst: SllNode<TVal> | undefined;
    let otherLength: number;
    if(other === this) {
      return;
    }
    otherFirst = other.head.next;
    otherLength = other._length;
    other.head.next = this.head.next;
    other._length = this._length;
    this.head.next = otherFirst;
    this._length = otherLength;
  }

  beforeBegin(): SllIterator<TVal> {
    return new SllIterator(this.head);
  }

  cbeforeBegin(): SllConstIterator<TVal> {
    return new SllConstIterator(this.head);
  }

  begin(): SllIterator<TVal> {
    return new SllIterator(this.head.next);
  }

  end(): SllIterator<TVal> {
    return new SllIterator<TVal>();
  }

  cbegin(): SllConstIterator<TVal> {
    return new SllConstIterator(this.head.next);
  }

  cend(): SllConstIterator<TVal> {
    return new SllConstIterator<TVal>();
  }

  insertAfter(pos: SllConstIterator<TVal>, val: TVal): SllIterator<TVal> {
    let posNode: SllNode<TVal>;
    let nextNode: SllNode<TVal>;
    posNode = this.getAnchorNode(pos, 'insertAfter');
    nextNode = SllNode.init(val, posNode.next);
    posNode.next = nextNode;
    this._length++;
    return new SllIterator(nextNode);
  }

  eraseAfter(pos: SllConstIterator<TVal>): SllIterator<TVal> {
    let posNode: SllNode<TVal>;
    let delNode: SllNode<TVal> | undefined;
    posNode = this.getAnchorNode(pos, 'eraseAfter');
    delNode = posNode.next;
    if(delNode === undefined) {
      throw new SllContractError('Attempt to eraseAfter() the last position');
    }
    posNode.next = delNode.next;
    delNode.$destroy();
    this._length--;
    return new SllIterator(posNode.next);
  }

  /*
    Inserts new node as first element
  */
  pushFront(val: TVal) {
    this.head.next = SllNode.init(val, this.head.next);
    this._length++;
  }

  popFront(): TVal {
    let currFirst: SllNode<TVal> | undefined;
    let val: TVal;
    currFirst = this.head.next;
    if(currFirst === undefined) {
      throw new SllContractError('Attempt to popFront() on empty Sll');
    }
    val = currFirst.val;
    this.head.next = currFirst.next;
    currFirst.$destroy();
    this._length--;
    return val;
  }

  clear() {
    let currNode: SllNode<TVal> | undefined;
    currNode = this.head.next;
    while(currNode !== undefined) {
      let nextNode: SllNode<TVal> | undefined;
      nextNode = currNode.next;
      currNode.$destroy();
      currNode = nextNode;
    }
    delete this.head.next;
    this._length = 0;
  }

  $destroy() {
    this.clear();
  }

  equals(rhs: Sll<TVal>, eqFn?: EqFn<TVal>): boolean {
    return sllEquals(this, rhs, eqFn);
  }

  lessThan(rhs: Sll<TVal>, lessFn?: LessFn<TVal>): boolean {
    return sllLessThan(this, rhs, lessFn);
  }

  *values(): Generator<TVal, void, undefined> {
    let currNode: SllNode<TVal> | undefined;
    currNode = this.head.next;
    while(currNode !== undefined) {
      yield currNode.val;
      currNode = currNode.next;
    }
  }

  [Symbol.iterator](): Generator<TVal, void, undefined> {
    return this.values();
  }

  /*
    Buffers the source first, then prepends in reverse, so forward-only
      iterables (and this list itself) work as sources.
  */
  private initFromIterable(vals: Iterable<TVal>, cloneVal?: CloneValFn<TVal>) {
    let buffered: TVal[];
    buffered = [];
    for(const val of vals) {
      buffered.push((cloneVal === undefined) ? val : cloneVal(val));
    }
    for(let i = buffered.length - 1; i >= 0; --i) {
      this.pushFront(buffered[i]);
    }
  }

  private getAnchorNode(pos: SllConstIterator<TVal>, action: string): SllNode<TVal> {
    let posNode: SllNode<TVal> | undefined;
    posNode = SllConstIterator.nodeOf(pos);
    if(posNode === undefined) {
      throw new SllContractError(`Attempt to ${action}() the end position`);
    }
    if(posNode.isDestroyed) {
      throw new SllContractError(`Attempt to ${action}() an invalidated position`);
    }
    if(this.debugAssert && !this.ownsNode(posNode)) {
      throw new SllContractError(`Attempt to ${action}() a position from another Sll`);
    }
    return posNode;
  }

  private ownsNode(node: SllNode<TVal>): boolean {
    let currNode: SllNode<TVal> | undefined;
    currNode = this.head;
    while(currNode !== undefined) {
      if(currNode === node) {
        return true;
      }
      currNode = currNode.next;
    }
    return false;
  }
}
