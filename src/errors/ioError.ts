import { CsvMapperError } from './base';

export type IOOperation = 'open' | 'read' | 'write' | 'close';

/**
 * A file could not be opened, read, written or closed.
 * Never merged with mapping failures.
 */
export class CsvIOError extends CsvMapperError {
  readonly path: string;
  readonly operation: IOOperation;
  /** errno code of the underlying failure, such as ENOENT */
  readonly code?: string;

  constructor(operation: IOOperation, path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot ${operation} '${path}': ${reason}`, { cause });
    this.name = 'CsvIOError';
    this.path = path;
    this.operation = operation;
    this.code = errnoCode(cause);
  }
}

function errnoCode(cause: unknown): string | undefined {
  if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
}
