import { NO_INDEX, type ProcessInfo, type ProcessRecord } from '../types/index.js';

/**
 * Flat, fixed-order collection of process records. Every tree link is an
 * index into this store, so the forest is just a view over it.
 */
export class ProcessStore {
  private readonly items: ProcessRecord[];

  constructor(infos: Iterable<ProcessInfo>) {
    this.items = Array.from(infos, (info) => ({
      pid: info.pid,
      parentPid: info.parentPid,
      groupId: info.groupId,
      ownerUid: info.ownerUid,
      ownerName: info.ownerName,
      commandLine: info.commandLine,
      threadCount: info.threadCount >= 1 ? info.threadCount : 1,
      parentIndex: NO_INDEX,
      firstChildIndex: NO_INDEX,
      nextSiblingIndex: NO_INDEX,
      selected: false,
    }));
  }

  get size(): number {
    return this.items.length;
  }

  at(index: number): ProcessRecord {
    if (!Number.isInteger(index) || index < 0 || index >= this.items.length) {
      throw new RangeError(`Process index ${index} is outside the store (size ${this.items.length})`);
    }
    return this.items[index];
  }

  records(): readonly ProcessRecord[] {
    return this.items;
  }

  /**
   * Find a record by PID, searching from the end so that the most recently
   * listed record wins when a PID appears twice.
   */
  indexOfPid(pid: number): number {
    for (let i = this.items.length - 1; i >= 0; i--) {
      if (this.items[i].pid === pid) return i;
    }
    return NO_INDEX;
  }

  /**
   * Child indices of a record, following its (possibly pruned) sibling chain.
   */
  childrenOf(index: number): number[] {
    const result: number[] = [];
    let child = this.at(index).firstChildIndex;
    while (child !== NO_INDEX) {
      result.push(child);
      child = this.items[child].nextSiblingIndex;
    }
    return result;
  }
}
