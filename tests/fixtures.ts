import type { ProcessInfo } from '../src/types/index.js';

export function proc(pid: number, parentPid: number, extra: Partial<ProcessInfo> = {}): ProcessInfo {
  return {
    pid,
    parentPid,
    groupId: pid,
    ownerUid: 0,
    ownerName: 'root',
    commandLine: `cmd${pid}`,
    threadCount: 1,
    ...extra,
  };
}
