export type PstreeErrorCode =
  | 'NO_ROOT'
  | 'INVALID_GRAPHICS'
  | 'UNKNOWN_USER'
  | 'INVALID_OPTION'
  | 'SOURCE_FAILED';

/**
 * Fatal condition: the command prints the message and exits non-zero.
 */
export class PstreeError extends Error {
  readonly code: PstreeErrorCode;

  constructor(code: PstreeErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NoRootProcessError extends PstreeError {
  constructor() {
    super('NO_ROOT', 'No process found with PID == 1 || PPID == 0 || PPID == 1 || PID == PPID');
  }
}

export class InvalidGraphicsError extends PstreeError {
  constructor(readonly variant: number) {
    super('INVALID_GRAPHICS', `Invalid graphics variant ${variant} (expected 0, 1, 2 or 3)`);
  }
}

export class UnknownUserError extends PstreeError {
  constructor(readonly userName: string) {
    super('UNKNOWN_USER', `User '${userName}' does not exist`);
  }
}

export class InvalidOptionError extends PstreeError {
  constructor(message: string) {
    super('INVALID_OPTION', message);
  }
}

export class SourceError extends PstreeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SOURCE_FAILED', message);
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

// Build a plain-text diagnostic for a failed `ps` run with its exit code and stderr.
export function makeSourceExitMessage(
  command: string,
  exitCode: number | null | undefined,
  stderr?: string
): string {
  const lines: string[] = [`${command} exited with code ${exitCode ?? 0}`];
  const err = (stderr || '').trim();
  if (err) {
    lines.push('', 'stderr:', err);
  }
  return lines.join('\n');
}
