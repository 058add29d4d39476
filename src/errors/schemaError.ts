import { CsvMapperError } from './base';

/**
 * Thrown when a record type description or mapper configuration is invalid.
 * Raised once, at build time.
 */
export class SchemaError extends CsvMapperError {
  readonly recordType: string;

  constructor(recordType: string, detail: string, hint?: string) {
    super(`Invalid schema for "${recordType}": ${detail}`, { hint });
    this.name = 'SchemaError';
    this.recordType = recordType;
  }
}
