import type { Readable } from 'node:stream';
import { execaSync } from 'execa';

export interface SpawnOptions {
  stdin?: 'inherit' | 'pipe' | 'ignore';
  stdout?: 'inherit' | 'pipe';
  stderr?: 'inherit' | 'pipe';
  cwd?: string;
  env?: Record<string, string | undefined>;
}

export interface SpawnResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  failed: boolean;
}

export function spawnSync(cmd: string[], options: SpawnOptions = {}): SpawnResult {
  const res = execaSync(cmd[0], cmd.slice(1), {
    stdin: options.stdin ?? 'ignore',
    stdout: options.stdout ?? 'pipe',
    stderr: options.stderr ?? 'pipe',
    cwd: options.cwd,
    env: options.env,
    reject: false,
  });
  return {
    exitCode: res.exitCode ?? 0,
    stdout: typeof res.stdout === 'string' ? res.stdout : '',
    stderr: typeof res.stderr === 'string' ? res.stderr : '',
    // spawn failures (missing binary) leave exitCode undefined
    failed: res.failed && res.exitCode === undefined,
  };
}

// Helper to accumulate an entire Readable stream into a UTF-8 string.
export function readAll(stream?: Readable | null): Promise<string> {
  if (!stream) return Promise.resolve('');
  return new Promise<string>((resolve, reject) => {
    let data = '';
    stream.setEncoding('utf8');
    stream.on('data', (chunk: string) => {
      data += chunk;
    });
    stream.on('end', () => resolve(data));
    stream.on('error', (err) => reject(err));
  });
}
