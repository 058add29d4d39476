import { EOL } from 'os';
import { CsvMapperError } from './base';

export interface MappingErrorDetails {
  cause?: unknown;
  /** Column the failure is attributed to */
  field?: string;
  /** Offending input line, for decode failures */
  line?: string;
  lineNumber?: number;
}

/**
 * A single record could not be encoded to or decoded from a CSV line.
 */
export class MappingError extends CsvMapperError {
  /** Message without the line location */
  readonly reason: string;
  readonly field?: string;
  readonly line?: string;
  readonly lineNumber?: number;

  constructor(message: string, details: MappingErrorDetails = {}) {
    const where = details.lineNumber === undefined ? '' : ` (line ${details.lineNumber})`;
    super(`${message}${where}`, { cause: details.cause });
    this.name = 'MappingError';
    this.reason = message;
    this.field = details.field;
    this.line = details.line;
    this.lineNumber = details.lineNumber;
  }

  /**
   * Copy of this error attributed to a line of a bulk read.
   */
  atLine(lineNumber: number): MappingError {
    return new MappingError(this.reason, {
      cause: this.cause,
      field: this.field,
      line: this.line,
      lineNumber,
    });
  }

  protected override detail(): string | undefined {
    if (this.line !== undefined) {
      return `input: ${JSON.stringify(this.line)}`;
    }
    return super.detail();
  }
}

/**
 * Raised by fail-fast bulk writes after the whole input was drained, when
 * at least one record could not be encoded.
 */
export class AggregateMappingError extends CsvMapperError {
  readonly errors: readonly MappingError[];

  constructor(errors: readonly MappingError[]) {
    const described = errors.map(error => `${error.toString()},${EOL}`).join('');
    super(`Failed to write lines due to following errors: ${described}`);
    this.name = 'AggregateMappingError';
    this.errors = errors;
  }

  protected override detail(): string | undefined {
    return `${this.errors.length} record(s) failed`;
  }
}
