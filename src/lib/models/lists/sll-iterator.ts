
import { SllContractError } from './sll-error';
import { SllNode } from './sll-node';

/*
  A position in an Sll. References the sentinel (beforeBegin), a real node,
    or nothing (end). Positions do not own nodes; erasing a node
    invalidates every position that references it.
*/
export class SllConstIterator<TVal> {
  protected _node: SllNode<TVal> | undefined;

  constructor(node?: SllNode<TVal>) {
    this._node = node;
  }

  /**
   * @internal
   * Used by Sll to anchor insertAfter() and eraseAfter(). Nodes are not
   *   part of the public API.
   */
  static nodeOf<I>(pos: SllConstIterator<I>): SllNode<I> | undefined {
    return pos._node;
  }

  get val(): TVal {
    return this.getNode('dereference').val;
  }

  isEnd(): boolean {
    return this._node === undefined;
  }

  equals(rhs: SllConstIterator<TVal>): boolean {
    return this._node === rhs._node;
  }

  /*
    prefix increment, ++it
  */
  advance(): this {
    let currNode: SllNode<TVal>;
    currNode = this.getNode('advance');
    this._node = currNode.next;
    return this;
  }

  /*
    postfix increment, it++
  */
  postAdvance(): SllConstIterator<TVal> {
    let prev: SllConstIterator<TVal>;
    prev = this.clone();
    this.advance();
    return prev;
  }

  clone(): SllConstIterator<TVal> {
    return new SllConstIterator(this._node);
  }

  protected getNode(action: string): SllNode<TVal> {
    if(this._node === undefined) {
      throw new SllContractError(`Attempt to ${action} end position`);
    }
    if(this._node.isDestroyed) {
      throw new SllContractError(`Attempt to ${action} invalidated position`);
    }
    return this._node;
  }
}

export class SllIterator<TVal> extends SllConstIterator<TVal> {
  get val(): TVal {
    return this.getNode('dereference').val;
  }

  set val(val: TVal) {
    this.getNode('dereference').val = val;
  }

  postAdvance(): SllIterator<TVal> {
    let prev: SllIterator<TVal>;
    prev = this.clone();
    this.advance();
    return prev;
  }

  clone(): SllIterator<TVal> {
    return new SllIterator(this._node);
  }

  toConst(): SllConstIterator<TVal> {
    return new SllConstIterator(this._node);
  }
}
