import { sourceRegistry, type SourceRegistry } from '../sources/registry.js';
import { buildTree } from '../tree/builder.js';
import { getTreeChars } from '../tree/charsets.js';
import { computeColumns, renderTree } from '../tree/renderer.js';
import { findRootPid } from '../tree/root.js';
import { hasActiveCriteria, markProcesses, pruneUnselected } from '../tree/selector.js';
import { ProcessStore } from '../tree/store.js';
import {
  GraphicsVariant,
  NO_INDEX,
  type ProcessInfo,
  type PstreeOptions,
  type SelectionCriteria,
} from '../types/index.js';
import { classifyArguments, parsePstreeOptions } from '../utils/cli-parsing.js';
import {
  formatTable,
  isDebugOutput,
  printDebug,
  printError,
  printWarning,
  setDebugOutput,
} from '../utils/output-formatter.js';
import { PstreeError, SourceError, UnknownUserError } from '../utils/pstree-error.js';
import { getTerminalWidth } from '../utils/terminal.js';
import { UserDirectory } from '../utils/users.js';

export interface PstreeResult {
  /** Charset initialization sequence, written once before the first line */
  init: string;
  lines: string[];
}

export interface PstreeDeps {
  registry?: SourceRegistry;
  users?: UserDirectory;
  selfPid?: number;
  /** Terminal width in columns; 0 means unlimited */
  width?: number;
  output?: { write(chunk: string | Uint8Array): unknown };
}

function dumpStore(store: ProcessStore, title: string, selectedOnly: boolean): void {
  if (!isDebugOutput()) return;
  const rows = store
    .records()
    .map((p, i) => ({ p, i }))
    .filter(({ p }) => !selectedOnly || p.selected)
    .map(({ p, i }) => [
      String(i),
      String(p.parentIndex),
      String(p.firstChildIndex),
      String(p.nextSiblingIndex),
      String(p.pid),
      String(p.parentPid),
      p.commandLine,
    ]);
  printDebug(
    `${title}\n${formatTable(['idx', 'parentIdx', 'childIdx', 'siblingIdx', 'PID', 'PPID', 'PROCESS'], rows)}`
  );
}

/**
 * Build, filter and draw the tree for an already-read process table.
 * With no selection criterion at all, every process is shown.
 */
export function drawProcessTree(
  infos: ProcessInfo[],
  options: PstreeOptions,
  context: { selfPid: number; width: number }
): PstreeResult {
  const chars = getTreeChars(options.graphics);
  const store = new ProcessStore(infos);
  if (store.size === 0) {
    printWarning('No processes read');
    return { init: '', lines: [] };
  }

  const targets = classifyArguments(options, (pid) => store.indexOfPid(pid) !== NO_INDEX);
  const criteria: SelectionCriteria = {
    showAll: options.all,
    owner: options.user,
    excludeRootOwned: options.excludeRootOwned,
    pids: targets.pids,
    substrings: targets.substrings,
    selfPid: context.selfPid,
  };
  if (!hasActiveCriteria(criteria)) criteria.showAll = true;

  buildTree(store);
  dumpStore(store, 'After building the tree', false);
  const matched = markProcesses(store, criteria);
  printDebug(`${matched} processes matched`);
  dumpStore(store, 'After marking', true);
  pruneUnselected(store);
  dumpStore(store, 'After pruning', true);

  const roots: number[] = [];
  if (targets.pids.length > 0) {
    for (const pid of targets.pids) {
      const index = store.indexOfPid(pid);
      if (index === NO_INDEX) {
        printWarning(`No process with PID ${pid}`);
        continue;
      }
      roots.push(index);
    }
  } else {
    roots.push(store.indexOfPid(findRootPid(store)));
  }

  const renderOptions = {
    chars,
    columns: computeColumns(options.wide ? 0 : context.width, chars),
    maxDepth: options.maxDepth,
  };
  printDebug(`columns: ${renderOptions.columns}`);

  return {
    init: chars.Init,
    lines: roots.flatMap((index) => renderTree(store, index, renderOptions)),
  };
}

/**
 * Validate options against the host, read the process table and draw it.
 */
export async function runPstree(options: PstreeOptions, deps: PstreeDeps = {}): Promise<PstreeResult> {
  // Fail on a bad charset before doing any work
  getTreeChars(options.graphics);

  const users = deps.users ?? UserDirectory.fromPasswdFile();
  if (options.user !== undefined && !users.hasUser(options.user)) {
    throw new UnknownUserError(options.user);
  }

  const context = { users, file: options.file };
  const source = (deps.registry ?? sourceRegistry).select(context);
  printDebug(`Reading processes with ${source.name}`);

  let infos: ProcessInfo[];
  try {
    infos = await source.readProcesses(context);
  } catch (error) {
    if (error instanceof PstreeError) throw error;
    throw new SourceError(
      `Failed to list processes: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  return drawProcessTree(infos, options, {
    selfPid: deps.selfPid ?? process.pid,
    width: deps.width ?? getTerminalWidth(),
  });
}

export async function pstreeCommand(
  rawOptions: unknown,
  args: string[],
  deps: PstreeDeps = {}
): Promise<void> {
  try {
    const options = parsePstreeOptions(rawOptions, args);
    setDebugOutput(options.debug);
    printDebug(`options: ${JSON.stringify(options)}`);

    const result = await runPstree(options, deps);
    if (result.lines.length === 0 && result.init === '') return;
    const out = deps.output ?? process.stdout;
    const text = result.init + result.lines.map((line) => `${line}\n`).join('');
    // PC850 glyphs are single code page bytes, not UTF-8
    out.write(options.graphics === GraphicsVariant.Pc850 ? Buffer.from(text, 'latin1') : text);
  } catch (error) {
    if (error instanceof PstreeError) {
      printError(error.message);
      process.exit(1);
    }
    throw error;
  }
}
