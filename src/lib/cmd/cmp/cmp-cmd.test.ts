
import { describe, it, expect, beforeEach, vi, Mock } from 'vitest';
import { parseArgv } from '../parse-argv';
import { CmpResult, cmpMain } from './cmp-cmd';

describe('cmp-cmd tests', () => {
  let argvMock: string[];
  let logFnMock: Mock;

  beforeEach(() => {
    argvMock = [
      'node',
      'main.js',
      'cmp',
    ];
    logFnMock = vi.fn();
  });

  it('tests cmpMain() compares a prefix with a longer list', async () => {
    let cmpResults: CmpResult[];
    cmpResults = await cmpMain(parseArgv([
      ...argvMock,
      '--lhs', '1', '2',
      '--rhs', '1', '2', '3',
      '-n',
    ]), {
      logFn: logFnMock,
    });
    expect(cmpResults).toEqual([
      { op: '==', result: false },
      { op: '!=', result: true },
      { op: '<', result: true },
      { op: '<=', result: true },
      { op: '>', result: false },
      { op: '>=', result: false },
    ]);
    expect(logFnMock.mock.calls.map(call => call[0])).toEqual([
      'lhs: [1, 2] (length 2)',
      'rhs: [1, 2, 3] (length 3)',
      'lhs == rhs: false',
      'lhs != rhs: true',
      'lhs < rhs: true',
      'lhs <= rhs: true',
      'lhs > rhs: false',
      'lhs >= rhs: false',
    ]);
  });

  it('tests cmpMain() orders strings unless --numbers is set', async () => {
    let strResults: CmpResult[];
    let numResults: CmpResult[];
    strResults = await cmpMain(parseArgv([
      ...argvMock,
      '-l', '10',
      '-r', '9',
    ]), {
      logFn: logFnMock,
    });
    numResults = await cmpMain(parseArgv([
      ...argvMock,
      '-l', '10',
      '-r', '9',
      '--numbers',
    ]), {
      logFn: logFnMock,
    });
    expect(strResults.find(cmpResult => cmpResult.op === '<')?.result).toBe(true);
    expect(numResults.find(cmpResult => cmpResult.op === '<')?.result).toBe(false);
  });

  it('tests cmpMain() with both lists omitted compares two empty lists', async () => {
    let cmpResults: CmpResult[];
    cmpResults = await cmpMain(parseArgv(argvMock), {
      logFn: logFnMock,
    });
    expect(cmpResults.filter(cmpResult => cmpResult.result).map(cmpResult => cmpResult.op)).toEqual([
      '==',
      '<=',
      '>=',
    ]);
  });

  it('tests cmpMain() rejects positional args', async () => {
    await expect(cmpMain(parseArgv([
      ...argvMock,
      'extra',
    ]), {
      logFn: logFnMock,
    })).rejects.toThrowError('Invalid cmp command: expected no arguments, received: 1');
  });
});
