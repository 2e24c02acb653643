
export type ParsedArgv = {
  cmd: string;
  args: string[];
  opts: Map<string, string[]>;
};

type ArgvToken = {
  kind: ArgvTokenEnum;
  val: string;
};

enum ArgvTokenEnum {
  CMD = 'CMD',
  FLAG = 'FLAG',
  ARG = 'ARG',
  END_OPTS = 'END_OPTS',
}

enum ArgvParserState {
  CMD = 'CMD',
  OPTS = 'OPTS',
  REST = 'REST',
}

const END_OPTS_ARG = '--';

/*
  argv is process.argv: the node binary and script path are skipped.
    Args that follow a flag belong to that flag; args before any flag,
    or after '--', belong to the cmd.
*/
export function parseArgv(argv: string[]): ParsedArgv {
  let cmd: string | undefined;
  let cmdArgs: string[];
  let flags: Map<string, string[]>;
  let currFlagArgs: string[] | undefined;

  cmdArgs = [];
  flags = new Map();

  for(const token of getArgvTokens(argv.slice(2))) {
    switch(token.kind) {
      case ArgvTokenEnum.CMD:
        cmd = token.val;
        break;
      case ArgvTokenEnum.FLAG:
        if(flags.has(token.val)) {
          throw new Error(`Unexpected Token: Attempt to set flag '${token.val}', but flag already set.`);
        }
        currFlagArgs = [];
        flags.set(token.val, currFlagArgs);
        break;
      case ArgvTokenEnum.END_OPTS:
        currFlagArgs = undefined;
        break;
      case ArgvTokenEnum.ARG:
        if(currFlagArgs === undefined) {
          cmdArgs.push(token.val);
        } else {
          currFlagArgs.push(token.val);
        }
        break;
    }
  }

  if(cmd === undefined) {
    throw new Error('cmd is undefined');
  }

  return {
    cmd,
    args: cmdArgs,
    opts: flags,
  };
}

function *getArgvTokens(argv: string[]): Generator<ArgvToken> {
  let parseState: ArgvParserState;
  parseState = ArgvParserState.CMD;
  for(let pos = 0; pos < argv.length; ++pos) {
    let currArg: string;
    currArg = argv[pos];
    switch(parseState) {
      case ArgvParserState.CMD:
        if(!isCmdStr(currArg)) {
          throw new Error(`Parse Error: invalid cmd: '${currArg}'`);
        }
        yield {
          kind: ArgvTokenEnum.CMD,
          val: currArg,
        };
        parseState = ArgvParserState.OPTS;
        break;
      case ArgvParserState.OPTS:
        if(currArg === END_OPTS_ARG) {
          yield {
            kind: ArgvTokenEnum.END_OPTS,
            val: currArg,
          };
          parseState = ArgvParserState.REST;
        } else if(isFlagArg(currArg)) {
          yield {
            kind: ArgvTokenEnum.FLAG,
            val: currArg,
          };
        } else {
          yield {
            kind: ArgvTokenEnum.ARG,
            val: currArg,
          };
        }
        break;
      case ArgvParserState.REST:
        yield {
          kind: ArgvTokenEnum.ARG,
          val: currArg,
        };
        break;
    }
  }
}

/*
  '-n' and '--numbers' are flags, '-1' is an arg
*/
function isFlagArg(argStr: string): boolean {
  return /^-{1,2}[a-zA-Z][a-zA-Z-]*$/.test(argStr);
}

function isCmdStr(cmdStr: string): boolean {
  return /^[a-z0-9]+(-?[a-z0-9]+)*$/.test(cmdStr);
}
