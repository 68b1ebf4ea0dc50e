import { describe, expect, it } from 'vitest';
import { classifyArguments, parsePstreeOptions } from '../src/utils/cli-parsing.js';
import { InvalidOptionError } from '../src/utils/pstree-error.js';
import { defaultGraphics, getTerminalWidth, isUnicodeTerminal } from '../src/utils/terminal.js';

describe('parsePstreeOptions', () => {
  it('fills in defaults', () => {
    const options = parsePstreeOptions({ root: true }, ['sshd'], { LANG: 'en_US.UTF-8' });
    expect(options).toEqual({
      all: false,
      user: undefined,
      excludeRootOwned: false,
      pid: undefined,
      search: undefined,
      maxDepth: 100,
      wide: false,
      graphics: 3,
      file: undefined,
      debug: false,
      args: ['sshd'],
    });
  });

  it('maps commander values to the configuration', () => {
    const options = parsePstreeOptions(
      { all: true, user: 'alice', root: false, pid: '42', level: '3', graphics: '2', wide: true },
      [],
      {}
    );
    expect(options.all).toBe(true);
    expect(options.user).toBe('alice');
    expect(options.excludeRootOwned).toBe(true);
    expect(options.pid).toBe(42);
    expect(options.maxDepth).toBe(3);
    expect(options.graphics).toBe(2);
    expect(options.wide).toBe(true);
  });

  it('uses ASCII outside a UTF-8 locale', () => {
    expect(parsePstreeOptions({}, [], { LANG: 'C' }).graphics).toBe(0);
  });

  it('rejects bad numbers', () => {
    expect(() => parsePstreeOptions({ level: '0' }, [], {})).toThrow(InvalidOptionError);
    expect(() => parsePstreeOptions({ level: 'deep' }, [], {})).toThrow(/--level:/);
    expect(() => parsePstreeOptions({ pid: '-4' }, [], {})).toThrow(/--pid:/);
    expect(() => parsePstreeOptions({ user: '' }, [], {})).toThrow('--user: must not be empty');
  });
});

describe('classifyArguments', () => {
  it('treats numbers present in the table as PIDs and everything else as text', () => {
    const targets = classifyArguments(
      { args: ['12', 'bash', '99'], pid: undefined, search: undefined },
      (pid) => pid === 12
    );
    expect(targets).toEqual({ pids: [12], substrings: ['bash', '99'] });
  });

  it('puts explicit options first', () => {
    const targets = classifyArguments(
      { args: ['12', '12'], pid: 5, search: 'x' },
      (pid) => pid === 12
    );
    expect(targets).toEqual({ pids: [5, 12], substrings: ['x'] });
  });
});

describe('terminal', () => {
  it('prefers the stream width, then COLUMNS, then 80', () => {
    expect(getTerminalWidth({ columns: 132 }, { COLUMNS: '100' })).toBe(132);
    expect(getTerminalWidth({}, { COLUMNS: '100' })).toBe(100);
    expect(getTerminalWidth({}, { COLUMNS: 'wide' })).toBe(80);
    expect(getTerminalWidth({ columns: 0 }, {})).toBe(80);
  });

  it('detects UTF-8 locales', () => {
    expect(isUnicodeTerminal({ LC_ALL: 'de_DE.utf8' })).toBe(true);
    expect(isUnicodeTerminal({ LC_CTYPE: 'UTF-8' })).toBe(true);
    expect(isUnicodeTerminal({ LANG: 'C' })).toBe(false);
    expect(defaultGraphics({})).toBe(0);
  });
});
