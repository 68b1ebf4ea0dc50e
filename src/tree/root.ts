import type { ProcessRecord } from '../types/index.js';
import { NoRootProcessError } from '../utils/pstree-error.js';
import type { ProcessStore } from './store.js';

// First rule with a match wins
const ROOT_RULES: Array<(record: ProcessRecord) => boolean> = [
  (record) => record.pid === 1,
  (record) => record.parentPid === 0,
  (record) => record.parentPid === 1,
  (record) => record.pid === record.parentPid,
];

/**
 * PID to start rendering from when none was given on the command line.
 * A table without any of these candidates cannot be drawn as a tree.
 */
export function findRootPid(store: ProcessStore): number {
  const records = store.records();
  for (const rule of ROOT_RULES) {
    const match = records.find(rule);
    if (match) return match.pid;
  }
  throw new NoRootProcessError();
}
