import { z } from 'zod/v3';
import type { PstreeOptions } from '../types/index.js';
import { InvalidOptionError } from './pstree-error.js';
import { defaultGraphics } from './terminal.js';

export const DEFAULT_MAX_DEPTH = 100;

// Shape of the option bag commander hands to the action handler.
// `--no-root` is commander's negation of `root`, so the key is `root: false`.
export const rawOptionsSchema = z.object({
  all: z.boolean().optional().default(false),
  user: z.string().min(1, 'must not be empty').optional(),
  root: z.boolean().optional().default(true),
  pid: z.coerce.number().int().nonnegative().optional(),
  search: z.string().optional(),
  level: z.coerce.number().int().positive().optional().default(DEFAULT_MAX_DEPTH),
  wide: z.boolean().optional().default(false),
  graphics: z.coerce.number().int().optional(),
  file: z.string().min(1, 'must not be empty').optional(),
  debug: z.boolean().optional().default(false),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const flag = issue.path.length > 0 ? `--${issue.path.join('.')}` : 'options';
      return `${flag}: ${issue.message}`;
    })
    .join('; ');
}

/**
 * Validate commander's options into a PstreeOptions. The graphics default
 * follows the locale in `env`. Range checks on the graphics variant happen
 * when the character set is looked up.
 */
export function parsePstreeOptions(
  raw: unknown,
  args: string[] = [],
  env: Record<string, string | undefined> = process.env
): PstreeOptions {
  const parsed = rawOptionsSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new InvalidOptionError(formatIssues(parsed.error));
  }
  const o = parsed.data;
  return {
    all: o.all,
    user: o.user,
    excludeRootOwned: !o.root,
    pid: o.pid,
    search: o.search,
    maxDepth: o.level,
    wide: o.wide,
    graphics: o.graphics ?? defaultGraphics(env),
    file: o.file,
    debug: o.debug,
    args: [...args],
  };
}

export interface Targets {
  pids: number[];
  substrings: string[];
}

/**
 * Split positional arguments into PIDs and search strings. A numeric
 * argument only counts as a PID when that PID is in the process table;
 * otherwise it is searched for like any other text.
 */
export function classifyArguments(
  options: Pick<PstreeOptions, 'pid' | 'search' | 'args'>,
  hasPid: (pid: number) => boolean
): Targets {
  const pids: number[] = [];
  const substrings: string[] = [];

  if (options.pid !== undefined) pids.push(options.pid);
  if (options.search) substrings.push(options.search);

  for (const arg of options.args) {
    const trimmed = arg.trim();
    if (/^\d+$/.test(trimmed)) {
      const pid = Number.parseInt(trimmed, 10);
      if (hasPid(pid)) {
        if (!pids.includes(pid)) pids.push(pid);
        continue;
      }
    }
    if (arg.length > 0) substrings.push(arg);
  }

  return { pids, substrings };
}
