
import type { Logger } from 'pino';
import { cmpMain } from './cmd/cmp/cmp-cmd';
import { helpCmdMain } from './cmd/help/help-cmd';
import { parseArgv } from './cmd/parse-argv';
import { SLL_CMD_ENUM, getCmdKind } from './cmd/parse-sll-args';
import { runMain } from './cmd/run/run-cmd';
import { SllCmdOpts } from './cmd/sll-cmd-opts';

export async function sllMain(argv: string[], opts: SllCmdOpts) {
  let parsedArgv = parseArgv(argv);
  let cmdKind = getCmdKind(parsedArgv.cmd);
  opts.logger?.info({
    cmd: cmdKind,
  }, 'sll cmd');
  switch(cmdKind) {
    case SLL_CMD_ENUM.RUN:
      await runMain(parsedArgv, opts);
      break;
    case SLL_CMD_ENUM.CMP:
      await cmpMain(parsedArgv, opts);
      break;
    case SLL_CMD_ENUM.HELP:
      await helpCmdMain(opts);
      break;
  }
}

/*
  Reports an error that escaped sllMain() and returns the process exit code.
*/
export function sllMainError(err: unknown, logger: Logger, errFn: (err: unknown) => void): number {
  errFn(err);
  logger.error(err);
  return 1;
}
