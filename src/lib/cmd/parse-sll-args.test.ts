
import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import {
  ListOp,
  SLL_CMD_ENUM,
  getCmdKind,
  getCmpOpts,
  getListOps,
  getListVal,
  getRunOpts,
} from './parse-sll-args';

const CMD_STR_MAP: Record<string, SLL_CMD_ENUM> = {
  'run': SLL_CMD_ENUM.RUN,
  'r': SLL_CMD_ENUM.RUN,
  'cmp': SLL_CMD_ENUM.CMP,
  'c': SLL_CMD_ENUM.CMP,
  'help': SLL_CMD_ENUM.HELP,
  'h': SLL_CMD_ENUM.HELP,
};

describe('parse-sll-args tests', () => {
  it('tests getCmdKind()', () => {
    let cmdKinds: Set<SLL_CMD_ENUM>;
    cmdKinds = new Set();
    Object.entries(CMD_STR_MAP).forEach(([ cmdStr, cmdEnumVal ]) => {
      let currKind: SLL_CMD_ENUM;
      currKind = getCmdKind(cmdStr);
      expect(currKind).toEqual(cmdEnumVal);
      cmdKinds.add(currKind);
    });
    expect([ ...cmdKinds ].sort()).toEqual([ ...Object.values(SLL_CMD_ENUM) ].sort());
  });

  it('tests getCmdKind() with an invalid command string', () => {
    expect(() => getCmdKind('nope')).toThrowError('Invalid command: nope');
  });

  it('tests getListOps() parses every op kind', () => {
    let listOps: ListOp[];
    listOps = getListOps([
      'push-front:a',
      'pop-front',
      'insert-after:0:b',
      'erase-after:-1',
      'clear',
    ], false);
    expect(listOps).toEqual([
      { kind: 'push_front', val: 'a' },
      { kind: 'pop_front' },
      { kind: 'insert_after', idx: 0, val: 'b' },
      { kind: 'erase_after', idx: -1 },
      { kind: 'clear' },
    ]);
  });

  it('tests getListOps() parses values as numbers', () => {
    let listOps: ListOp[];
    listOps = getListOps([ 'push-front:3', 'insert-after:1:-2.5' ], true);
    expect(listOps).toEqual([
      { kind: 'push_front', val: 3 },
      { kind: 'insert_after', idx: 1, val: -2.5 },
    ]);
  });

  it('tests getListOps() rejects malformed ops', () => {
    expect(() => getListOps([ 'push-front' ], false)).toThrowError(ZodError);
    expect(() => getListOps([ 'pop-front:1' ], false)).toThrowError(ZodError);
    expect(() => getListOps([ 'erase-after:-2' ], false)).toThrowError(ZodError);
    expect(() => getListOps([ 'insert-after:x:1' ], false)).toThrowError(ZodError);
    expect(() => getListOps([ 'reverse' ], false)).toThrowError(ZodError);
    expect(() => getListOps([ 'push-front:abc' ], true)).toThrowError(ZodError);
  });

  it('tests getListOps() rejects empty numbers and indexes', () => {
    expect(() => getListOps([ 'push-front:' ], true)).toThrowError(ZodError);
    expect(() => getListOps([ 'push-front: ' ], true)).toThrowError(ZodError);
    expect(() => getListOps([ 'insert-after::x' ], false)).toThrowError(ZodError);
    expect(() => getListOps([ 'erase-after: ' ], false)).toThrowError(ZodError);
  });

  it('tests getListVal()', () => {
    expect(getListVal('7', false)).toBe('7');
    expect(getListVal('7', true)).toBe(7);
    expect(() => getListVal('seven', true)).toThrowError(ZodError);
    expect(() => getListVal(' ', true)).toThrowError(ZodError);
    expect(() => getListVal('', true)).toThrowError(ZodError);
  });

  it('tests getRunOpts()', () => {
    expect(getRunOpts([
      [ '--init', [ '1', '2' ] ],
      [ '-n', [] ],
    ])).toEqual({
      init: [ '1', '2' ],
      numbers: true,
    });
  });

  it('tests getRunOpts() rejects an unknown flag', () => {
    expect(() => getRunOpts([ [ '--lhs', [ '1' ] ] ])).toThrowError(ZodError);
  });

  it('tests getRunOpts() rejects args on --numbers', () => {
    expect(() => getRunOpts([ [ '--numbers', [ 'yes' ] ] ])).toThrowError(
      "Unexpected args after flag '--numbers': yes (args must come before flags)"
    );
  });

  it('tests getCmpOpts() rejects args on -n', () => {
    expect(() => getCmpOpts([ [ '-n', [ 'push-front:1' ] ] ])).toThrowError(
      "Unexpected args after flag '-n': push-front:1 (args must come before flags)"
    );
  });

  it('tests getCmpOpts()', () => {
    expect(getCmpOpts([
      [ '-l', [ 'a' ] ],
      [ '--rhs', [ 'a', 'b' ] ],
    ])).toEqual({
      lhs: [ 'a' ],
      rhs: [ 'a', 'b' ],
    });
  });
});
