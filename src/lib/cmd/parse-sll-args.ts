
import { z } from 'zod';

export enum SLL_CMD_ENUM {
  HELP = 'HELP',
  RUN = 'RUN',
  CMP = 'CMP',
}

const OP_TOKEN_DELIM = ':';
const NUMBERS_FLAGS = [ '-n', '--numbers' ];

const NumbersOptSchema = z.tuple([
  z.literal('-n').or(z.literal('--numbers')).transform(() => 'numbers' as const),
  z.tuple([]).transform(() => [ true ]),
]);

const RunOptsSchema = z.tuple([
  z.literal('-i').or(z.literal('--init')).transform(() => 'init' as const),
  z.array(z.string()),
]).or(NumbersOptSchema);

const CmpOptsSchema = z.tuple([
  z.literal('-l').or(z.literal('--lhs')).transform(() => 'lhs' as const),
  z.array(z.string()),
]).or(
  z.tuple([
    z.literal('-r').or(z.literal('--rhs')).transform(() => 'rhs' as const),
    z.array(z.string()),
  ])
).or(NumbersOptSchema);

/*
  -1 is the before-begin position
*/
const OpIdxSchema = z.string().trim().min(1).pipe(
  z.coerce.number().int().min(-1)
);

export type ListVal = string | number;

export type ListOp =
  | { kind: 'push_front'; val: ListVal }
  | { kind: 'pop_front' }
  | { kind: 'insert_after'; idx: number; val: ListVal }
  | { kind: 'erase_after'; idx: number }
  | { kind: 'clear' };

const ListNumValSchema = z.string().trim().min(1).pipe(
  z.coerce.number().finite()
);

function getListOpSchema(numbers: boolean) {
  let valSchema: z.ZodType<ListVal>;
  valSchema = numbers
    ? ListNumValSchema
    : z.string()
  ;
  return z.tuple([
    z.literal('push-front'),
    valSchema,
  ]).transform(([ , val ]): ListOp => {
    return {
      kind: 'push_front',
      val,
    };
  }).or(
    z.tuple([
      z.literal('pop-front'),
    ]).transform((): ListOp => {
      return {
        kind: 'pop_front',
      };
    })
  ).or(
    z.tuple([
      z.literal('insert-after'),
      OpIdxSchema,
      valSchema,
    ]).transform(([ , idx, val ]): ListOp => {
      return {
        kind: 'insert_after',
        idx,
        val,
      };
    })
  ).or(
    z.tuple([
      z.literal('erase-after'),
      OpIdxSchema,
    ]).transform(([ , idx ]): ListOp => {
      return {
        kind: 'erase_after',
        idx,
      };
    })
  ).or(
    z.tuple([
      z.literal('clear'),
    ]).transform((): ListOp => {
      return {
        kind: 'clear',
      };
    })
  );
}

export type RunOpts = {
  init?: string[];
  numbers?: boolean;
};

export type CmpOpts = {
  lhs?: string[];
  rhs?: string[];
  numbers?: boolean;
};

export function getCmdKind(cmdStr: string): SLL_CMD_ENUM {
  switch(cmdStr) {
    case 'run':
    case 'r':
      return SLL_CMD_ENUM.RUN;
    case 'cmp':
    case 'c':
      return SLL_CMD_ENUM.CMP;
    case 'help':
    case 'h':
      return SLL_CMD_ENUM.HELP;
    default:
      throw new Error(`Invalid command: ${cmdStr}`);
  }
}

/*
  e.g. 'push-front:3', 'insert-after:0:10', 'erase-after:-1'
*/
export function getListOps(args: string[], numbers: boolean): ListOp[] {
  let listOpSchema: ReturnType<typeof getListOpSchema>;
  let listOps: ListOp[];
  listOpSchema = getListOpSchema(numbers);
  listOps = [];
  for(let i = 0; i < args.length; ++i) {
    let opParts: string[];
    opParts = args[i].split(OP_TOKEN_DELIM);
    listOps.push(listOpSchema.parse(opParts));
  }
  return listOps;
}

export function getListVal(rawVal: string, numbers: boolean): ListVal {
  if(numbers) {
    return ListNumValSchema.parse(rawVal);
  }
  return rawVal;
}

export function getRunOpts(opts: [string, string[]][]): RunOpts {
  let runOpts: RunOpts;
  runOpts = {};
  for(let i = 0; i < opts.length; ++i) {
    checkFlagArgs(opts[i]);
    let runOpt = RunOptsSchema.parse(opts[i]);
    switch(runOpt[0]) {
      case 'init':
        runOpts.init = runOpt[1];
        break;
      case 'numbers':
        runOpts.numbers = runOpt[1][0];
        break;
    }
  }
  return runOpts;
}

export function getCmpOpts(opts: [string, string[]][]): CmpOpts {
  let cmpOpts: CmpOpts;
  cmpOpts = {};
  for(let i = 0; i < opts.length; ++i) {
    checkFlagArgs(opts[i]);
    let cmpOpt = CmpOptsSchema.parse(opts[i]);
    switch(cmpOpt[0]) {
      case 'lhs':
        cmpOpts.lhs = cmpOpt[1];
        break;
      case 'rhs':
        cmpOpts.rhs = cmpOpt[1];
        break;
      case 'numbers':
        cmpOpts.numbers = cmpOpt[1][0];
        break;
    }
  }
  return cmpOpts;
}

/*
  parseArgv() gives every arg after a flag to that flag, so ops placed
    after --numbers end up here
*/
function checkFlagArgs(opt: [string, string[]]) {
  let [ flag, flagArgs ] = opt;
  if(NUMBERS_FLAGS.includes(flag) && (flagArgs.length > 0)) {
    throw new Error(`Unexpected args after flag '${flag}': ${flagArgs.join(' ')} (args must come before flags)`);
  }
}
