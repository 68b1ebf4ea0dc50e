import { describe, expect, it } from 'vitest';
import { parsePsOutput, stripPath } from '../src/sources/ps-output.js';
import { PsSource, psCommandFor } from '../src/sources/ps.js';
import { SourceError } from '../src/utils/pstree-error.js';
import { UserDirectory } from '../src/utils/users.js';

const users = new UserDirectory(
  new Map([
    [0, 'root'],
    [1000, 'alice'],
  ]),
  () => false
);

describe('parsePsOutput', () => {
  it('parses the Linux column list and resolves UIDs', () => {
    const output = [
      '  UID   PID  PPID  PGID NLWP COMMAND',
      '    0     1     0     1    1 /sbin/init splash',
      ' 1000  4242     1  4242    3 node server.js --port 80',
      ' 1001  4300  4242  4242    1 sleep 5',
      '',
    ].join('\n');

    expect(parsePsOutput(output, users)).toEqual([
      {
        pid: 1,
        parentPid: 0,
        groupId: 1,
        ownerUid: 0,
        ownerName: 'root',
        commandLine: '/sbin/init splash',
        threadCount: 1,
      },
      {
        pid: 4242,
        parentPid: 1,
        groupId: 4242,
        ownerUid: 1000,
        ownerName: 'alice',
        commandLine: 'node server.js --port 80',
        threadCount: 3,
      },
      {
        pid: 4300,
        parentPid: 4242,
        groupId: 4242,
        ownerUid: 1001,
        ownerName: '#1001',
        commandLine: 'sleep 5',
        threadCount: 1,
      },
    ]);
  });

  it('keeps user names and strips COMM paths', () => {
    const output = [
      'USER   PID  PPID  PGID COMM',
      'root     1     0     1 /sbin/launchd',
      'alice  512     1   512 /Applications/Foo.app/Contents/MacOS/Foo',
    ].join('\n');

    const infos = parsePsOutput(output, users);
    expect(infos.map((p) => [p.ownerUid, p.ownerName, p.commandLine])).toEqual([
      [-1, 'root', 'launchd'],
      [-1, 'alice', 'Foo'],
    ]);
  });

  it('reads ps -ef output without a group column', () => {
    const output = [
      'UID        PID  PPID  C STIME TTY          TIME CMD',
      'root         1     0  0 10:00 ?        00:00:01 /sbin/init',
      'alice      900     1  0 10:01 pts/0    00:00:00 -bash',
    ].join('\n');

    const infos = parsePsOutput(output, users);
    expect(infos).toHaveLength(2);
    expect(infos[1]).toEqual({
      pid: 900,
      parentPid: 1,
      groupId: 0,
      ownerUid: -1,
      ownerName: 'alice',
      commandLine: '-bash',
      threadCount: 1,
    });
  });

  it('skips lines it cannot read', () => {
    const output = ['  PID  PPID COMMAND', 'garbage', '  abc  1 foo', '    7    1 bar'].join('\n');
    expect(parsePsOutput(output, users).map((p) => p.pid)).toEqual([7]);
  });

  it('returns nothing for empty or unknown input', () => {
    expect(parsePsOutput('', users)).toEqual([]);
    expect(parsePsOutput('NAME SIZE\nfoo 1\n', users)).toEqual([]);
  });
});

describe('stripPath', () => {
  it('keeps the last path segment', () => {
    expect(stripPath('/usr/bin/ssh')).toBe('ssh');
    expect(stripPath('ssh')).toBe('ssh');
  });
});

describe('PsSource', () => {
  it('picks the column list per platform', () => {
    expect(psCommandFor('linux')).toEqual(['ps', '-eo', 'uid,pid,ppid,pgid,nlwp,args']);
    expect(psCommandFor('darwin')).toEqual(['ps', '-axwwo', 'user,pid,ppid,pgid,comm']);
    expect(psCommandFor('sunos')).toEqual(['ps', '-ef']);
  });

  it('parses the command output', async () => {
    const calls: string[][] = [];
    const source = new PsSource('linux', (cmd) => {
      calls.push(cmd);
      return {
        exitCode: 0,
        stdout: '  UID PID PPID PGID NLWP COMMAND\n    0   1    0    1    1 init\n',
        stderr: '',
        failed: false,
      };
    });
    const infos = await source.readProcesses({ users });
    expect(calls).toEqual([['ps', '-eo', 'uid,pid,ppid,pgid,nlwp,args']]);
    expect(infos.map((p) => p.commandLine)).toEqual(['init']);
  });

  it('fails when ps exits non-zero', async () => {
    const source = new PsSource('linux', () => ({
      exitCode: 1,
      stdout: '',
      stderr: 'ps: bad option',
      failed: false,
    }));
    await expect(source.readProcesses({ users })).rejects.toThrow(SourceError);
    await expect(source.readProcesses({ users })).rejects.toThrow(
      'ps -eo uid,pid,ppid,pgid,nlwp,args exited with code 1\n\nstderr:\nps: bad option'
    );
  });
});
