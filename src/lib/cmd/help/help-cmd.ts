
import { CliColors, ColorFormatter } from '../../service/cli-colors';
import { SllCmdOpts } from '../sll-cmd-opts';

const CMD_COLOR: ColorFormatter = CliColors.comb([
  CliColors.bold,
  CliColors.rgb(0, 255, 183),
]);

type HelpEntry = {
  usage: string;
  desc: string[];
};

const HELP_ENTRIES: HelpEntry[] = [
  {
    usage: 'run|r [ops...] [--init|-i vals...] [--numbers|-n]',
    desc: [
      'build a list from the --init values, apply each op in order',
      'ops: push-front:<val> pop-front insert-after:<idx>:<val> erase-after:<idx> clear',
      '<idx> is the index of the anchor element, -1 is before-begin',
    ],
  },
  {
    usage: 'cmp|c --lhs|-l vals... --rhs|-r vals... [--numbers|-n]',
    desc: [
      'compare two lists with ==, !=, <, <=, >, >=',
    ],
  },
  {
    usage: 'help|h',
    desc: [
      'print this message',
    ],
  },
];

export async function helpCmdMain(opts: SllCmdOpts) {
  let cmdColor: ColorFormatter;
  let descColor: ColorFormatter;
  cmdColor = CliColors.when(opts.colors ?? false, CMD_COLOR);
  descColor = CliColors.when(opts.colors ?? false, CliColors.dim);
  opts.logFn('usage: sll <cmd> [args...] [flags...]');
  for(let i = 0; i < HELP_ENTRIES.length; ++i) {
    let currEntry: HelpEntry;
    currEntry = HELP_ENTRIES[i];
    opts.logFn('');
    opts.logFn(`  ${cmdColor(currEntry.usage)}`);
    currEntry.desc.forEach(descLine => {
      opts.logFn(`    ${descColor(descLine)}`);
    });
  }
}
