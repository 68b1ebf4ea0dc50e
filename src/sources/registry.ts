import type { SourceKind } from '../types/index.js';
import type { ProcessSource, SourceContext } from '../types/process-source.js';
import { SourceError } from '../utils/pstree-error.js';
import { FileSource } from './file.js';
import { ProcfsSource } from './procfs.js';
import { PsSource } from './ps.js';

/**
 * Registry for process sources, in order of preference
 */
export class SourceRegistry {
  private sources = new Map<SourceKind, ProcessSource>();

  constructor(sources: ProcessSource[] = [new FileSource(), new ProcfsSource(), new PsSource()]) {
    for (const source of sources) this.register(source);
  }

  register(source: ProcessSource): void {
    this.sources.set(source.name, source);
  }

  get(name: SourceKind): ProcessSource | null {
    return this.sources.get(name) || null;
  }

  getAll(): ProcessSource[] {
    return Array.from(this.sources.values());
  }

  /**
   * Pick the source for this run: an input file always wins, then the
   * first supported source in registration order.
   */
  select(context: SourceContext): ProcessSource {
    if (context.file !== undefined) {
      const file = this.get('file');
      if (!file) throw new SourceError('Reading from a file is not available');
      return file;
    }
    const source = this.getAll().find((s) => s.name !== 'file' && s.isSupported(context));
    if (!source) {
      throw new SourceError(`No way to list processes on ${process.platform}`);
    }
    return source;
  }
}

export const sourceRegistry = new SourceRegistry();
