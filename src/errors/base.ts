/**
 * Base class for every error raised by the mapper.
 * Carries an optional hint and renders a short report with `format()`.
 */
export class CsvMapperError extends Error {
  readonly hint?: string;

  constructor(message: string, options?: { cause?: unknown; hint?: string }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'CsvMapperError';
    this.hint = options?.hint;
  }

  format(): string {
    const lines = [`error: ${this.message}`];

    const detail = this.detail();
    if (detail) {
      lines.push(`   └── ${detail}`);
    }

    if (this.hint) {
      lines.push('');
      lines.push(`help: ${this.hint}`);
    }

    return lines.join('\n');
  }

  protected detail(): string | undefined {
    return this.cause instanceof Error ? this.cause.message : undefined;
  }
}
