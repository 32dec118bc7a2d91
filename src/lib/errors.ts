export type ErrorKind =
  | 'NotARepository'
  | 'PreconditionFailed'
  | 'BackendOperationFailed'
  | 'ConflictDuringMerge'
  | 'InvalidConfig';

export class WorktreeError extends Error {
  readonly kind: ErrorKind;
  readonly details?: string;
  readonly conflicts: string[];

  constructor(kind: ErrorKind, message: string, details?: string, conflicts: string[] = []) {
    super(message);
    this.name = 'WorktreeError';
    this.kind = kind;
    this.details = details;
    this.conflicts = conflicts;
  }
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: WorktreeError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function err<T = never>(error: WorktreeError): Result<T> {
  return { ok: false, error };
}

export function preconditionFailed<T = never>(message: string): Result<T> {
  return err(new WorktreeError('PreconditionFailed', message));
}

/**
 * Unwrap a result inside command code, where failures propagate as exceptions
 * up to the CLI action handler.
 */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

const EXIT_CODES: Record<ErrorKind, number> = {
  NotARepository: 128,
  PreconditionFailed: 2,
  BackendOperationFailed: 1,
  ConflictDuringMerge: 3,
  InvalidConfig: 78,
};

export function exitCodeFor(error: unknown): number {
  if (error instanceof WorktreeError) {
    return EXIT_CODES[error.kind];
  }
  return 1;
}

/**
 * Human-readable report for an error reaching the command surface.
 */
export function describeError(error: unknown): string[] {
  if (!(error instanceof WorktreeError)) {
    const message = error instanceof Error ? error.message : String(error);
    return [`❌ ${message}`];
  }

  const lines = [`❌ ${error.message}`];
  if (error.details) {
    lines.push(...error.details.split('\n').map((line) => `   ${line}`));
  }
  if (error.kind === 'ConflictDuringMerge') {
    if (error.conflicts.length > 0) {
      lines.push('   Conflicted files:');
      lines.push(...error.conflicts.map((file) => `     - ${file}`));
    }
    lines.push('⚠️  Resolve the conflicts in the trunk checkout and complete the operation manually.');
  }
  if (error.kind === 'NotARepository') {
    lines.push('⚠️  Run arbor from inside a git repository.');
  }
  return lines;
}

/**
 * Print an error and exit with the code for its kind
 */
export function exitWithError(error: unknown): never {
  for (const line of describeError(error)) {
    console.error(line);
  }
  process.exit(exitCodeFor(error));
}
