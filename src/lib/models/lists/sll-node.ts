
import { SllContractError } from './sll-error';

type SllNodeSlot<TVal> = {
  val: TVal;
};

export class SllNode<TVal> {
  next?: SllNode<TVal>;
  /*
    undefined on the sentinel and on destroyed nodes, so TVal itself
      may include undefined
  */
  private slot?: SllNodeSlot<TVal>;
  private destroyed: boolean;

  private constructor(
    slot?: SllNodeSlot<TVal>,
    next?: SllNode<TVal>,
  ) {
    this.destroyed = false;
    if(slot !== undefined) {
      this.slot = slot;
    }
    if(next !== undefined) {
      this.next = next;
    }
  }

  get isSentinel(): boolean {
    return (this.slot === undefined) && !this.destroyed;
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  get val(): TVal {
    return this.getSlot().val;
  }

  set val(val: TVal) {
    this.getSlot().val = val;
  }

  $destroy() {
    delete this.slot;
    delete this.next;
    this.destroyed = true;
  }

  private getSlot(): SllNodeSlot<TVal> {
    if(this.destroyed) {
      throw new SllContractError('Attempt to access "val" of destroyed SllNode');
    }
    if(this.slot === undefined) {
      throw new SllContractError('Attempt to access "val" of sentinel SllNode');
    }
    return this.slot;
  }

  static init<I>(val: I, next?: SllNode<I>): SllNode<I> {
    return new SllNode({ val }, next);
  }

  static initSentinel<I>(): SllNode<I> {
    return new SllNode<I>();
  }
}
