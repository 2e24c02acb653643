
import { Sll } from '../../models/lists/sll';
import { ListOp, ListVal, getListOps, getListVal, getRunOpts } from '../parse-sll-args';
import { ParsedArgv } from '../parse-argv';
import { SllCmdOpts } from '../sll-cmd-opts';
import { applyListOp, formatList, formatListOp } from './list-ops';

export async function runMain(parsedArgv: ParsedArgv, opts: SllCmdOpts): Promise<Sll<ListVal>> {
  let numbers: boolean;
  let initVals: ListVal[];
  let listOps: ListOp[];
  let list: Sll<ListVal>;

  let runOpts = getRunOpts([ ...parsedArgv.opts.entries() ]);
  numbers = runOpts.numbers ?? false;
  initVals = (runOpts.init ?? []).map(rawVal => getListVal(rawVal, numbers));
  // validate every op before touching the list
  listOps = getListOps(parsedArgv.args, numbers);

  list = new Sll(initVals);
  opts.logFn(`init -> ${formatList(list)}`);
  for(let i = 0; i < listOps.length; ++i) {
    let currOp: ListOp;
    currOp = listOps[i];
    applyListOp(list, currOp);
    opts.logger?.debug({
      op: currOp,
      length: list.length,
    }, 'applied list op');
    opts.logFn(`${formatListOp(currOp)} -> ${formatList(list)}`);
  }
  return list;
}
