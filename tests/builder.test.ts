import { describe, expect, it } from 'vitest';
import { buildTree } from '../src/tree/builder.js';
import { ProcessStore } from '../src/tree/store.js';
import { NO_INDEX } from '../src/types/index.js';
import { proc } from './fixtures.js';

describe('ProcessStore', () => {
  it('starts every record unlinked and unselected', () => {
    const store = new ProcessStore([proc(1, 0), proc(2, 1, { threadCount: 0 })]);
    expect(store.size).toBe(2);
    expect(store.at(0)).toMatchObject({
      parentIndex: NO_INDEX,
      firstChildIndex: NO_INDEX,
      nextSiblingIndex: NO_INDEX,
      selected: false,
    });
    expect(store.at(1).threadCount).toBe(1);
  });

  it('looks up PIDs from the end of the table', () => {
    const store = new ProcessStore([proc(7, 1), proc(8, 1), proc(7, 1)]);
    expect(store.indexOfPid(7)).toBe(2);
    expect(store.indexOfPid(8)).toBe(1);
    expect(store.indexOfPid(9)).toBe(NO_INDEX);
  });

  it('rejects indices outside the store', () => {
    const store = new ProcessStore([proc(1, 0)]);
    expect(() => store.at(1)).toThrow(RangeError);
    expect(() => store.at(-1)).toThrow(RangeError);
  });
});

describe('buildTree', () => {
  it('links each record to the record holding its parent PID', () => {
    const store = new ProcessStore([
      proc(1, 0),
      proc(2, 1),
      proc(3, 1),
      proc(4, 2),
      proc(5, 5),
      proc(6, 99),
    ]);
    buildTree(store);

    expect(store.records().map((r) => r.parentIndex)).toEqual([
      NO_INDEX,
      0,
      0,
      1,
      NO_INDEX,
      NO_INDEX,
    ]);
    expect(store.childrenOf(0)).toEqual([1, 2]);
    expect(store.childrenOf(1)).toEqual([3]);
    expect(store.childrenOf(4)).toEqual([]);
    expect(store.childrenOf(5)).toEqual([]);
  });

  it('gives every record exactly the children whose parent PID is its PID', () => {
    const infos = [proc(30, 10), proc(10, 1), proc(20, 1), proc(1, 0), proc(40, 10), proc(50, 20)];
    const store = new ProcessStore(infos);
    buildTree(store);

    store.records().forEach((record, index) => {
      const children = store.childrenOf(index).map((i) => store.at(i).pid);
      const expected = infos
        .filter((p) => p.parentPid === record.pid && p.pid !== record.pid)
        .map((p) => p.pid);
      expect(children.sort()).toEqual(expected.sort());
    });
  });

  it('keeps siblings in the order they were listed', () => {
    const store = new ProcessStore([proc(10, 1), proc(1, 0), proc(11, 1), proc(12, 1)]);
    buildTree(store);
    expect(store.childrenOf(1)).toEqual([0, 2, 3]);
  });

  it('attaches children of a reused PID to the later record', () => {
    const store = new ProcessStore([proc(7, 1), proc(1, 0), proc(7, 1), proc(8, 7)]);
    buildTree(store);
    expect(store.at(3).parentIndex).toBe(2);
    expect(store.childrenOf(2)).toEqual([3]);
    expect(store.childrenOf(0)).toEqual([]);
  });

  it('produces the same links when run twice', () => {
    const store = new ProcessStore([proc(1, 0), proc(2, 1), proc(3, 1), proc(4, 3)]);
    buildTree(store);
    const first = store.records().map((r) => [r.parentIndex, r.firstChildIndex, r.nextSiblingIndex]);
    buildTree(store);
    const second = store.records().map((r) => [r.parentIndex, r.firstChildIndex, r.nextSiblingIndex]);
    expect(second).toEqual(first);
  });
});
