import { NO_INDEX } from '../types/index.js';
import type { ProcessStore } from './store.js';

/**
 * Link every record to its parent and chain siblings in discovery order.
 * A record whose parent PID resolves to itself or to nothing becomes a root.
 * Existing links are cleared first, so the store can be rebuilt.
 */
export function buildTree(store: ProcessStore): void {
  const records = store.records();
  for (const record of records) {
    record.parentIndex = NO_INDEX;
    record.firstChildIndex = NO_INDEX;
    record.nextSiblingIndex = NO_INDEX;
  }

  // Tail of each parent's child chain, so appends do not rewalk the chain
  const lastChild = new Map<number, number>();

  records.forEach((record, index) => {
    const parentIndex = store.indexOfPid(record.parentPid);
    if (parentIndex === index || parentIndex === NO_INDEX) return;

    record.parentIndex = parentIndex;
    const tail = lastChild.get(parentIndex);
    if (tail === undefined) {
      records[parentIndex].firstChildIndex = index;
    } else {
      records[tail].nextSiblingIndex = index;
    }
    lastChild.set(parentIndex, index);
  });
}
