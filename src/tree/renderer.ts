import { NO_INDEX, type ProcessRecord, type RenderOptions, type TreeChars } from '../types/index.js';
import type { ProcessStore } from './store.js';

// Longest line the renderer ever emits, escapes included
export const MAX_LINE = 8192;

interface Frame {
  index: number;
  prefix: string;
  depth: number;
  isRoot: boolean;
  isLast: boolean;
}

export function formatPid(pid: number): string {
  return pid < 0 ? `-${String(-pid).padStart(4, '0')}` : String(pid).padStart(5, '0');
}

export function truncateLine(line: string, columns: number): string {
  const limit = Math.max(columns - 1, 0);
  if (line.length <= limit) return line;
  const cut = line.slice(0, limit);
  // Never end on the first half of a surrogate pair
  return /[\ud800-\udbff]$/.test(cut) ? cut.slice(0, -1) : cut;
}

/**
 * Assemble one tree line: graphics prefix, PID, owner, thread count and
 * command. `branch` is empty for the root of the walk.
 */
export function formatLine(
  record: ProcessRecord,
  chars: TreeChars,
  prefix: string,
  branch: string,
  hasChildren: boolean
): string {
  const childGlyph = hasChildren ? chars.P : chars.S2;
  const groupGlyph = record.pid === record.groupId ? chars.PGL : chars.NPGL;
  const threads = record.threadCount > 1 ? `[${record.threadCount}]` : '';
  return (
    `${chars.SG}${prefix}${branch}${childGlyph}${groupGlyph}${chars.EG}` +
    ` ${formatPid(record.pid)} ${record.ownerName} ${threads}${record.commandLine}`
  );
}

function visibleChildren(store: ProcessStore, index: number): number[] {
  const result: number[] = [];
  let child = store.at(index).firstChildIndex;
  while (child !== NO_INDEX) {
    const record = store.at(child);
    if (record.selected) result.push(child);
    child = record.nextSiblingIndex;
  }
  return result;
}

/**
 * Draw the subtree under `rootIndex`, pre-order, one string per process.
 * The starting record is drawn even when it is not selected; everything
 * below it has to be. Records at depth `maxDepth` and deeper are left out.
 */
export function renderTree(store: ProcessStore, rootIndex: number, options: RenderOptions): string[] {
  const { chars, columns, maxDepth } = options;
  const lines: string[] = [];
  const stack: Frame[] = [{ index: rootIndex, prefix: '', depth: 0, isRoot: true, isLast: true }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (frame === undefined || frame.depth >= maxDepth) continue;

    const record = store.at(frame.index);
    const children = visibleChildren(store, frame.index);
    const branch = frame.isRoot ? '' : frame.isLast ? chars.BarL : chars.BarC;
    lines.push(
      truncateLine(formatLine(record, chars, frame.prefix, branch, children.length > 0), columns)
    );

    let childPrefix: string;
    if (frame.isRoot) {
      // Root children take one space of indent, deeper levels two
      childPrefix = ' ';
    } else if (frame.isLast) {
      childPrefix = `${frame.prefix}  `;
    } else {
      childPrefix = `${frame.prefix}${chars.Bar} `;
    }

    for (let i = children.length - 1; i >= 0; i--) {
      stack.push({
        index: children[i],
        prefix: childPrefix,
        depth: frame.depth + 1,
        isRoot: false,
        isLast: i === children.length - 1,
      });
    }
  }

  return lines;
}

/**
 * Usable line width: `width` columns plus room for the graphics escapes,
 * never more than MAX_LINE - 1. A width of 0 means unlimited.
 */
export function computeColumns(width: number, chars: TreeChars): number {
  const base = width > 0 ? width : MAX_LINE - 1;
  return Math.min(base + chars.SG.length + chars.EG.length, MAX_LINE - 1);
}
