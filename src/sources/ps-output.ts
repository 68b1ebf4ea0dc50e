import * as path from 'node:path';
import type { ProcessInfo } from '../types/index.js';
import { printDebug } from '../utils/output-formatter.js';
import type { UserDirectory } from '../utils/users.js';

type Column = 'owner' | 'pid' | 'ppid' | 'pgid' | 'threads' | 'command' | 'other';

const HEADER_COLUMNS: Record<string, Column> = {
  UID: 'owner',
  USER: 'owner',
  PID: 'pid',
  PPID: 'ppid',
  PGID: 'pgid',
  PGRP: 'pgid',
  NLWP: 'threads',
  THCNT: 'threads',
  THCOUNT: 'threads',
  COMMAND: 'command',
  CMD: 'command',
  ARGS: 'command',
  COMM: 'command',
};

interface Layout {
  columns: Column[];
  // COMM holds an executable path on BSD-like systems; only its base name is shown
  commandIsPath: boolean;
}

function parseHeader(header: string): Layout | null {
  const names = header.trim().split(/\s+/);
  const columns = names.map((name) => HEADER_COLUMNS[name.toUpperCase()] ?? 'other');
  if (!columns.includes('pid') || !columns.includes('ppid')) return null;
  const commandAt = columns.indexOf('command');
  return {
    columns,
    commandIsPath: commandAt !== -1 && names[commandAt].toUpperCase() === 'COMM',
  };
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || !/^-?\d+/.test(value)) return undefined;
  const n = Number.parseInt(value, 10);
  return Number.isFinite(n) ? n : undefined;
}

export function stripPath(command: string): string {
  return command.includes('/') ? path.posix.basename(command) : command;
}

/**
 * Parse `ps` output into process infos. Columns are found by their header
 * names, so `ps -eo uid,pid,...`, `ps -axo user,pid,...` and `ps -ef` all
 * work. The command column, wherever it is, swallows the rest of the line.
 * Lines that cannot be parsed are skipped.
 */
export function parsePsOutput(output: string, users: UserDirectory): ProcessInfo[] {
  const lines = output.split(/\r?\n/);
  const headerAt = lines.findIndex((l) => l.trim().length > 0);
  if (headerAt === -1) return [];

  const layout = parseHeader(lines[headerAt]);
  if (!layout) {
    printDebug(`Unrecognized ps header: ${lines[headerAt].trim()}`);
    return [];
  }

  const { columns } = layout;
  const commandAt = columns.indexOf('command');
  const fixedCount = commandAt === -1 ? columns.length : commandAt;
  const result: ProcessInfo[] = [];

  for (const line of lines.slice(headerAt + 1)) {
    const fields = line.trim().split(/\s+/);
    if (fields.length < fixedCount || fields[0] === '') continue;

    const value = (column: Column): string | undefined => {
      const at = columns.indexOf(column);
      return at === -1 || at >= fixedCount ? undefined : fields[at];
    };

    const pid = parseInteger(value('pid'));
    if (pid === undefined) {
      printDebug(`Skipping ps line without a PID: ${line.trim()}`);
      continue;
    }

    const owner = value('owner') ?? '';
    const ownerUid = /^\d+$/.test(owner) ? Number.parseInt(owner, 10) : -1;
    const ownerName = ownerUid === -1 ? owner : users.nameOf(ownerUid);

    let commandLine = commandAt === -1 ? '' : fields.slice(commandAt).join(' ');
    if (layout.commandIsPath) commandLine = stripPath(commandLine);

    result.push({
      pid,
      parentPid: parseInteger(value('ppid')) ?? 0,
      groupId: parseInteger(value('pgid')) ?? 0,
      ownerUid,
      ownerName,
      commandLine,
      threadCount: Math.max(parseInteger(value('threads')) ?? 1, 1),
    });
  }

  return result;
}
