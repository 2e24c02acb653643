
import { describe, it, expect, beforeEach, vi, Mock } from 'vitest';
import { helpCmdMain } from './help-cmd';

describe('help-cmd tests', () => {
  let logFnMock: Mock;

  beforeEach(() => {
    logFnMock = vi.fn();
  });

  it('tests helpCmdMain() prints plain usage without colors', async () => {
    let lines: string[];
    await helpCmdMain({
      logFn: logFnMock,
    });
    lines = logFnMock.mock.calls.map(call => call[0]);
    expect(lines[0]).toBe('usage: sll <cmd> [args...] [flags...]');
    expect(lines).toContain('  run|r [ops...] [--init|-i vals...] [--numbers|-n]');
    expect(lines).toContain('    compare two lists with ==, !=, <, <=, >, >=');
    expect(lines).toHaveLength(12);
  });

  it('tests helpCmdMain() colors cmd usage when colors are on', async () => {
    let lines: string[];
    await helpCmdMain({
      logFn: logFnMock,
      colors: true,
    });
    lines = logFnMock.mock.calls.map(call => call[0]);
    expect(lines).toContain('  \x1B[1m\x1B[38;2;0;255;183mhelp|h\x1B[39m\x1B[22m');
    expect(lines).toContain('    \x1B[2mprint this message\x1B[22m');
  });
});
