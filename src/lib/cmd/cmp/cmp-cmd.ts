
import { Sll } from '../../models/lists/sll';
import {
  sllEquals,
  sllGreaterEq,
  sllGreaterThan,
  sllLessEq,
  sllLessThan,
  sllNotEquals,
} from '../../models/lists/sll-compare';
import { CmpOpts, ListVal, getCmpOpts, getListVal } from '../parse-sll-args';
import { ParsedArgv } from '../parse-argv';
import { SllCmdOpts } from '../sll-cmd-opts';
import { formatList } from '../run/list-ops';

export type CmpResult = {
  op: string;
  result: boolean;
};

type SllCmpFn = (lhs: Sll<ListVal>, rhs: Sll<ListVal>) => boolean;

const CMP_FNS: [ string, SllCmpFn ][] = [
  [ '==', sllEquals ],
  [ '!=', sllNotEquals ],
  [ '<', sllLessThan ],
  [ '<=', sllLessEq ],
  [ '>', sllGreaterThan ],
  [ '>=', sllGreaterEq ],
];

export async function cmpMain(parsedArgv: ParsedArgv, opts: SllCmdOpts): Promise<CmpResult[]> {
  let cmpOpts: CmpOpts;
  let numbers: boolean;
  let lhs: Sll<ListVal>;
  let rhs: Sll<ListVal>;
  let cmpResults: CmpResult[];

  if(parsedArgv.args.length > 0) {
    throw new Error(`Invalid cmp command: expected no arguments, received: ${parsedArgv.args.length}`);
  }
  cmpOpts = getCmpOpts([ ...parsedArgv.opts.entries() ]);
  numbers = cmpOpts.numbers ?? false;
  lhs = new Sll((cmpOpts.lhs ?? []).map(rawVal => getListVal(rawVal, numbers)));
  rhs = new Sll((cmpOpts.rhs ?? []).map(rawVal => getListVal(rawVal, numbers)));

  opts.logFn(`lhs: ${formatList(lhs)}`);
  opts.logFn(`rhs: ${formatList(rhs)}`);
  cmpResults = CMP_FNS.map(([ op, cmpFn ]) => {
    return {
      op,
      result: cmpFn(lhs, rhs),
    };
  });
  cmpResults.forEach(cmpResult => {
    opts.logFn(`lhs ${cmpResult.op} rhs: ${cmpResult.result}`);
  });
  opts.logger?.debug({
    lhsLength: lhs.length,
    rhsLength: rhs.length,
  }, 'compared lists');
  return cmpResults;
}
