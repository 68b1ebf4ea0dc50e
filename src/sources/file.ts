import * as fs from 'node:fs';
import type { Readable } from 'node:stream';
import type { ProcessInfo } from '../types/index.js';
import type { SourceContext } from '../types/process-source.js';
import { SourceError } from '../utils/pstree-error.js';
import { readAll } from '../utils/spawn.js';
import { BaseProcessSource } from './base-source.js';
import { parsePsOutput } from './ps-output.js';

export const STDIN_PATH = '-';

/**
 * Reads a saved `ps` listing from a file, or from stdin when the path is `-`.
 */
export class FileSource extends BaseProcessSource {
  readonly name = 'file' as const;

  constructor(private readonly stdin?: Readable) {
    super();
  }

  isSupported(context: SourceContext): boolean {
    return context.file !== undefined;
  }

  protected async listProcesses(context: SourceContext): Promise<ProcessInfo[]> {
    const file = context.file;
    if (file === undefined) {
      throw new SourceError('No input file given');
    }

    let text: string;
    try {
      text =
        file === STDIN_PATH
          ? await readAll(this.stdin ?? process.stdin)
          : await fs.promises.readFile(file, 'utf8');
    } catch (error) {
      throw new SourceError(
        `Could not read ${file === STDIN_PATH ? 'stdin' : file}: ${
          error instanceof Error ? error.message : String(error)
        }`,
        { cause: error }
      );
    }
    return parsePsOutput(text, context.users);
  }
}
