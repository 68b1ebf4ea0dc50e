import type { ProcessInfo, SourceKind } from '../types/index.js';
import type { ProcessSource, SourceContext } from '../types/process-source.js';
import { printDebug } from '../utils/output-formatter.js';

/**
 * Base implementation of ProcessSource with common functionality
 */
export abstract class BaseProcessSource implements ProcessSource {
  abstract readonly name: SourceKind;

  abstract isSupported(context: SourceContext): boolean;

  protected abstract listProcesses(context: SourceContext): Promise<ProcessInfo[]>;

  async readProcesses(context: SourceContext): Promise<ProcessInfo[]> {
    const started = Date.now();
    const processes = await this.listProcesses(context);
    printDebug(`${this.name}: read ${processes.length} processes in ${Date.now() - started}ms`);
    return processes;
  }
}
