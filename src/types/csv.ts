/**
 * Mapper configuration and bulk-operation types.
 */

export interface MapperOptions {
  /** Column delimiter, a single character (default: ',') */
  separator: string;
  /** BCP 47 locale used for decimal separators (default: platform locale) */
  locale: string;
  /** Write a header line first; skip exactly one line on reads (default: false) */
  includeHeader: boolean;
  /** Drop blank and whitespace-only lines on reads, after the header (default: false) */
  skipEmptyLines: boolean;
}

/**
 * Receives failures that a collect operation does not throw.
 *
 * Record failures arrive as a MappingError carrying the line number and
 * input line; the conversion or accessor failure behind it is its `cause`.
 * Open, read and write failures arrive as CsvIOError.
 */
export type ErrorHandler = (error: Error) => void;

export type ReadPolicy =
  | { mode: 'fail-fast' }
  | { mode: 'quiet' }
  | { mode: 'collect'; onError: ErrorHandler };

export type WritePolicy = { mode: 'fail-fast' } | { mode: 'collect'; onError: ErrorHandler };

/**
 * Where a bulk read takes its lines from.
 */
export interface LineSource {
  /** Path or label used in error messages */
  readonly description: string;
  /** Throws when the source cannot be opened; called before any line is pulled */
  probe(): void;
  lines(): Iterable<string>;
}

export type RecordDecoder<T> = (line: string) => T;

export type RecordEncoder<T> = (record: T) => string;
