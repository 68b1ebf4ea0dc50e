import { NO_INDEX, type ProcessRecord, type SelectionCriteria } from '../types/index.js';
import type { ProcessStore } from './store.js';

export const ROOT_ACCOUNT = 'root';

/**
 * True when any active criterion matches the record. `showAll` is handled by
 * the caller and is not considered here.
 */
export function matchesCriteria(record: ProcessRecord, criteria: SelectionCriteria): boolean {
  if (criteria.owner !== undefined && record.ownerName === criteria.owner) {
    return true;
  }
  if (criteria.excludeRootOwned && record.ownerName !== ROOT_ACCOUNT) {
    return true;
  }
  if (criteria.pids.includes(record.pid)) {
    return true;
  }
  if (
    record.pid !== criteria.selfPid &&
    criteria.substrings.some((text) => text.length > 0 && record.commandLine.includes(text))
  ) {
    return true;
  }
  return false;
}

export function hasActiveCriteria(criteria: SelectionCriteria): boolean {
  return (
    criteria.owner !== undefined ||
    criteria.excludeRootOwned ||
    criteria.pids.length > 0 ||
    criteria.substrings.some((text) => text.length > 0)
  );
}

// Walks parent links; stops on a record already visited so a parent cycle ends.
export function markAncestors(store: ProcessStore, index: number): void {
  const seen = new Set<number>([index]);
  let parent = store.at(index).parentIndex;
  while (parent !== NO_INDEX && !seen.has(parent)) {
    seen.add(parent);
    const record = store.at(parent);
    record.selected = true;
    parent = record.parentIndex;
  }
}

/**
 * Mark a record and its whole subtree, visiting children through the sibling
 * chain with an explicit work stack.
 */
export function markDescendants(store: ProcessStore, index: number): void {
  const seen = new Set<number>();
  const stack = [index];
  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined || seen.has(current)) continue;
    seen.add(current);
    const record = store.at(current);
    record.selected = true;
    let child = record.firstChildIndex;
    while (child !== NO_INDEX) {
      stack.push(child);
      child = store.at(child).nextSiblingIndex;
    }
  }
}

/**
 * Set `selected` on every record that matches, on its ancestors and on its
 * descendants. Returns the number of records that matched directly.
 */
export function markProcesses(store: ProcessStore, criteria: SelectionCriteria): number {
  const records = store.records();
  if (criteria.showAll) {
    for (const record of records) record.selected = true;
    return records.length;
  }

  let matched = 0;
  records.forEach((record, index) => {
    if (!matchesCriteria(record, criteria)) return;
    matched++;
    markAncestors(store, index);
    markDescendants(store, index);
  });
  return matched;
}

function nextSelected(store: ProcessStore, start: number): number {
  let index = start;
  while (index !== NO_INDEX && !store.at(index).selected) {
    index = store.at(index).nextSiblingIndex;
  }
  return index;
}

/**
 * Re-point the child and sibling links of selected records past unselected
 * ones. Links of unselected records are left alone; nothing reaches them.
 */
export function pruneUnselected(store: ProcessStore): void {
  for (const record of store.records()) {
    if (!record.selected) continue;
    record.firstChildIndex = nextSelected(store, record.firstChildIndex);
    record.nextSiblingIndex = nextSelected(store, record.nextSiblingIndex);
  }
}
