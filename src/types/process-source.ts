import type { UserDirectory } from '../utils/users.js';
import type { ProcessInfo, SourceKind } from './index.js';

export interface SourceContext {
  users: UserDirectory;
  /** Path of a `ps` listing, `-` for stdin (file source only) */
  file?: string;
}

/**
 * Something that can list the processes of the system. Records that cannot
 * be read are skipped; only a failure of the whole listing is an error.
 */
export interface ProcessSource {
  readonly name: SourceKind;

  /**
   * Whether this source can run on the current host
   */
  isSupported(context: SourceContext): boolean;

  readProcesses(context: SourceContext): Promise<ProcessInfo[]>;
}
