// Sentinel for "no link" in the index-based forest.
export const NO_INDEX = -1;

/**
 * One process as delivered by an enumerator. `pid` is not guaranteed to be
 * unique across a listing: a PID can be reused while the table is being read.
 */
export interface ProcessInfo {
  pid: number;
  parentPid: number;
  groupId: number;
  ownerUid: number;
  ownerName: string;
  commandLine: string;
  threadCount: number;
}

/**
 * A process held by the store. The tree-shape fields are indices into the
 * same store (or NO_INDEX); the store never reorders or removes records.
 */
export interface ProcessRecord extends ProcessInfo {
  parentIndex: number;
  firstChildIndex: number;
  nextSiblingIndex: number;
  selected: boolean;
}

export const GraphicsVariant = {
  Ascii: 0,
  Pc850: 1,
  Vt100: 2,
  Utf8: 3,
} as const;

export type GraphicsVariant = (typeof GraphicsVariant)[keyof typeof GraphicsVariant];

export interface TreeChars {
  /** Between the branch and the PID on a leaf */
  S2: string;
  /** Same, when the node has printed children */
  P: string;
  /** Process group leader */
  PGL: string;
  /** Not a process group leader */
  NPGL: string;
  /** Branch with a later sibling */
  BarC: string;
  /** Vertical continuation */
  Bar: string;
  /** Branch of the last sibling */
  BarL: string;
  /** Enter graphics mode */
  SG: string;
  /** Exit graphics mode */
  EG: string;
  /** Sent once before the first line */
  Init: string;
}

export interface SelectionCriteria {
  showAll: boolean;
  owner?: string;
  excludeRootOwned: boolean;
  pids: number[];
  substrings: string[];
  // PID of this tool; never matched by a substring search
  selfPid: number;
}

export interface RenderOptions {
  chars: TreeChars;
  columns: number;
  maxDepth: number;
}

export type SourceKind = 'procfs' | 'ps' | 'file';

/**
 * Validated command-line configuration. Positional arguments are kept raw:
 * whether a number is a PID or a search string depends on the process table.
 */
export interface PstreeOptions {
  all: boolean;
  user?: string;
  excludeRootOwned: boolean;
  pid?: number;
  search?: string;
  maxDepth: number;
  wide: boolean;
  graphics: number;
  file?: string;
  debug: boolean;
  args: string[];
}
