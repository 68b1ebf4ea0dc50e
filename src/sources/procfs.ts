import * as fs from 'node:fs';
import * as path from 'node:path';
import type { ProcessInfo } from '../types/index.js';
import type { SourceContext } from '../types/process-source.js';
import { printDebug } from '../utils/output-formatter.js';
import type { UserDirectory } from '../utils/users.js';
import { BaseProcessSource } from './base-source.js';

export interface StatFields {
  pid: number;
  comm: string;
  parentPid: number;
  groupId: number;
  threadCount: number;
}

/**
 * Parse /proc/<pid>/stat. The comm field is wrapped in parentheses and may
 * itself contain spaces or parentheses, so the split happens at the last ')'.
 */
export function parseStat(text: string): StatFields | null {
  const open = text.indexOf('(');
  const close = text.lastIndexOf(')');
  if (open === -1 || close < open) return null;

  const pid = Number.parseInt(text.slice(0, open).trim(), 10);
  // state ppid pgrp session tty_nr tpgid flags ... num_threads is the 18th after ')'
  const rest = text
    .slice(close + 1)
    .trim()
    .split(/\s+/);
  if (!Number.isFinite(pid) || rest.length < 3) return null;

  const parentPid = Number.parseInt(rest[1], 10);
  const groupId = Number.parseInt(rest[2], 10);
  const threads = rest.length > 17 ? Number.parseInt(rest[17], 10) : 1;

  return {
    pid,
    comm: text.slice(open + 1, close),
    parentPid: Number.isFinite(parentPid) ? parentPid : 0,
    groupId: Number.isFinite(groupId) ? groupId : 0,
    threadCount: Number.isFinite(threads) && threads > 0 ? threads : 1,
  };
}

// NUL-separated argv; kernel threads have none.
export function parseCmdline(raw: string): string {
  return raw.replace(/\0/g, ' ').trim();
}

/**
 * Read one /proc/<pid> directory. Returns null when the process is gone or
 * its files are malformed.
 */
export function readProcEntry(dir: string, users: UserDirectory): ProcessInfo | null {
  let uid: number;
  let stat: StatFields | null;
  try {
    uid = fs.statSync(dir).uid;
    stat = parseStat(fs.readFileSync(path.join(dir, 'stat'), 'utf8'));
  } catch (error) {
    printDebug(`Skipping ${dir}: ${String(error)}`);
    return null;
  }
  if (!stat) {
    printDebug(`Skipping ${dir}: malformed stat`);
    return null;
  }

  let commandLine = stat.comm;
  try {
    const cmdline = parseCmdline(fs.readFileSync(path.join(dir, 'cmdline'), 'utf8'));
    if (cmdline) commandLine = cmdline;
  } catch (error) {
    printDebug(`No cmdline for ${dir}: ${String(error)}`);
  }

  return {
    pid: stat.pid,
    parentPid: stat.parentPid,
    groupId: stat.groupId,
    ownerUid: uid,
    ownerName: users.nameOf(uid),
    commandLine,
    threadCount: stat.threadCount,
  };
}

/**
 * Reads the process table straight from procfs (Linux).
 */
export class ProcfsSource extends BaseProcessSource {
  readonly name = 'procfs' as const;

  constructor(private readonly procRoot = '/proc') {
    super();
  }

  isSupported(): boolean {
    if (process.platform !== 'linux' && this.procRoot === '/proc') return false;
    try {
      return fs.statSync(path.join(this.procRoot, 'self')).isDirectory();
    } catch {
      return false;
    }
  }

  protected async listProcesses(context: SourceContext): Promise<ProcessInfo[]> {
    const entries = (await fs.promises.readdir(this.procRoot))
      .filter((entry) => /^\d+$/.test(entry))
      .sort((a, b) => Number(a) - Number(b));
    const result: ProcessInfo[] = [];
    for (const entry of entries) {
      const info = readProcEntry(path.join(this.procRoot, entry), context.users);
      if (info) result.push(info);
    }
    return result;
  }
}
