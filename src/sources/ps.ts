import type { ProcessInfo } from '../types/index.js';
import type { SourceContext } from '../types/process-source.js';
import { makeSourceExitMessage, SourceError } from '../utils/pstree-error.js';
import { spawnSync } from '../utils/spawn.js';
import { BaseProcessSource } from './base-source.js';
import { parsePsOutput } from './ps-output.js';

/**
 * `ps` invocation per OS. Every variant prints a header line that
 * parsePsOutput uses to find its columns.
 */
export function psCommandFor(platform: string): string[] {
  switch (platform) {
    case 'linux':
      return ['ps', '-eo', 'uid,pid,ppid,pgid,nlwp,args'];
    case 'darwin':
    case 'freebsd':
    case 'netbsd':
    case 'openbsd':
      return ['ps', '-axwwo', 'user,pid,ppid,pgid,comm'];
    case 'aix':
      return ['ps', '-eko', 'uid,pid,ppid,pgid,thcount,args'];
    default:
      return ['ps', '-ef'];
  }
}

export type CommandRunner = typeof spawnSync;

/**
 * Lists processes by running the system `ps`.
 */
export class PsSource extends BaseProcessSource {
  readonly name = 'ps' as const;

  constructor(
    private readonly platform: string = process.platform,
    private readonly run: CommandRunner = spawnSync
  ) {
    super();
  }

  isSupported(): boolean {
    return this.platform !== 'win32';
  }

  protected async listProcesses(context: SourceContext): Promise<ProcessInfo[]> {
    const cmd = psCommandFor(this.platform);
    const res = this.run(cmd);
    if (res.failed) {
      throw new SourceError(`Could not run ${cmd[0]}: ${res.stderr.trim() || 'command not found'}`);
    }
    if (res.exitCode !== 0) {
      throw new SourceError(makeSourceExitMessage(cmd.join(' '), res.exitCode, res.stderr));
    }
    return parsePsOutput(res.stdout, context.users);
  }
}
