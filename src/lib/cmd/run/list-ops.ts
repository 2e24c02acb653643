
import { Sll } from '../../models/lists/sll';
import { SllIterator } from '../../models/lists/sll-iterator';
import { ListOp, ListVal } from '../parse-sll-args';

export function applyListOp(list: Sll<ListVal>, listOp: ListOp) {
  let pos: SllIterator<ListVal>;
  switch(listOp.kind) {
    case 'push_front':
      list.pushFront(listOp.val);
      break;
    case 'pop_front':
      list.popFront();
      break;
    case 'insert_after':
      pos = getPosAt(list, listOp.idx);
      list.insertAfter(pos, listOp.val);
      break;
    case 'erase_after':
      pos = getPosAt(list, listOp.idx);
      list.eraseAfter(pos);
      break;
    case 'clear':
      list.clear();
      break;
  }
}

/*
  idx -1 is beforeBegin()
*/
export function getPosAt<TVal>(list: Sll<TVal>, idx: number): SllIterator<TVal> {
  let pos: SllIterator<TVal>;
  if(
    (idx < -1)
    || (idx >= list.length)
  ) {
    throw new Error(`Position ${idx} out of range for list of length ${list.length}`);
  }
  pos = list.beforeBegin();
  for(let i = -1; i < idx; ++i) {
    pos.advance();
  }
  return pos;
}

export function formatListOp(listOp: ListOp): string {
  switch(listOp.kind) {
    case 'push_front':
      return `push-front ${listOp.val}`;
    case 'pop_front':
      return 'pop-front';
    case 'insert_after':
      return `insert-after ${listOp.idx} ${listOp.val}`;
    case 'erase_after':
      return `erase-after ${listOp.idx}`;
    case 'clear':
      return 'clear';
  }
}

export function formatList<TVal>(list: Sll<TVal>): string {
  return `[${[ ...list ].join(', ')}] (length ${list.length})`;
}
