import { Readable } from 'stream';
import { buildSchema } from './config/recordSchema';
import { CodecContext, conformsTo, decimalSeparatorFor, decodeRow, encodeRow, formatHeader } from './parsers/rowCodec';
import { fileSource, iterableSource } from './parsers/lineReader';
import { ReadOptions, streamFromReadable, streamFromSource, streamToDestination } from './parsers/csvStream';
import { InferRecord, RecordShape, RecordType, Schema } from './types/schema';
import { ErrorHandler, MapperOptions, ReadPolicy } from './types/csv';
import { MappingError, SchemaError } from './errors';

const DEFAULT_OPTIONS: MapperOptions = {
  separator: ',',
  locale: new Intl.NumberFormat().resolvedOptions().locale,
  includeHeader: false,
  skipEmptyLines: false,
};

function toMappingError(error: unknown): MappingError {
  return error instanceof MappingError
    ? error
    : new MappingError(error instanceof Error ? error.message : String(error), { cause: error });
}

/**
 * Immutable configuration builder returned by `CsvMapper.from()`.
 * Every setter returns a new builder; `build()` validates once.
 */
export class CsvMapperBuilder<S extends RecordShape> {
  constructor(
    private readonly type: RecordType<S>,
    private readonly options: MapperOptions = DEFAULT_OPTIONS
  ) {}

  withSeparator(separator: string): CsvMapperBuilder<S> {
    return new CsvMapperBuilder(this.type, { ...this.options, separator });
  }

  withLocale(locale: string): CsvMapperBuilder<S> {
    return new CsvMapperBuilder(this.type, { ...this.options, locale });
  }

  withHeader(includeHeader = true): CsvMapperBuilder<S> {
    return new CsvMapperBuilder(this.type, { ...this.options, includeHeader });
  }

  skipEmptyLines(skipEmptyLines = true): CsvMapperBuilder<S> {
    return new CsvMapperBuilder(this.type, { ...this.options, skipEmptyLines });
  }

  build(): CsvMapper<S> {
    const { separator, locale } = this.options;

    if ([...separator].length !== 1) {
      throw new SchemaError(this.type.name, `separator must be a single character, got ${JSON.stringify(separator)}`);
    }
    if (separator === '"' || separator === '\r' || separator === '\n') {
      throw new SchemaError(this.type.name, `separator ${JSON.stringify(separator)} cannot delimit columns`);
    }

    let canonical: string;
    try {
      [canonical] = Intl.getCanonicalLocales(locale);
    } catch {
      throw new SchemaError(this.type.name, `invalid locale "${locale}"`, 'use a BCP 47 tag such as "en-US"');
    }

    return new CsvMapper(this.type, buildSchema(this.type), Object.freeze({ ...this.options, locale: canonical }));
  }
}

/**
 * Maps records of one record type to and from CSV lines, and streams them
 * over files.
 *
 * A mapper holds no mutable state; one instance may be shared freely.
 *
 * @example
 * const User = recordType('User', { name: field.string(), surname: field.string() });
 * const csv = CsvMapper.from(User).build();
 * csv.mapToText({ name: 'John', surname: 'Smith' }); // 'John,Smith\n'
 */
export class CsvMapper<S extends RecordShape> {
  private readonly context: CodecContext;
  private readonly header: string | undefined;

  constructor(
    readonly type: RecordType<S>,
    readonly schema: Schema,
    readonly options: Readonly<MapperOptions>
  ) {
    this.context = {
      separator: options.separator,
      decimalSeparator: decimalSeparatorFor(options.locale),
    };
    this.header = options.includeHeader ? formatHeader(schema, this.context) : undefined;
  }

  static from<S extends RecordShape>(type: RecordType<S>): CsvMapperBuilder<S> {
    return new CsvMapperBuilder(type);
  }

  get columns(): string[] {
    return this.schema.columns.map(column => column.name);
  }

  headerLine(): string | undefined {
    return this.header;
  }

  mapToText(record: InferRecord<S>): string {
    return encodeRow(record, this.schema, this.context);
  }

  mapToTextOrCollect(record: InferRecord<S>, onError: ErrorHandler): string | undefined {
    try {
      return this.mapToText(record);
    } catch (error) {
      onError(toMappingError(error));
      return undefined;
    }
  }

  mapFromText(line: string): InferRecord<S> {
    const decoded = decodeRow(line, this.schema, this.context);
    if (!this.isRecord(decoded)) {
      throw new MappingError(`Decoded value does not match record type "${this.type.name}"`, { line });
    }
    return decoded;
  }

  mapFromTextOrCollect(line: string, onError: ErrorHandler): InferRecord<S> | undefined {
    try {
      return this.mapFromText(line);
    } catch (error) {
      onError(toMappingError(error));
      return undefined;
    }
  }

  /**
   * Lazily read records from a file.
   *
   * Without `onError`, the first failure (including a missing file) is
   * thrown. With `onError`, failures are handed to it and reading goes on.
   */
  readAll(path: string, onError?: ErrorHandler): IterableIterator<InferRecord<S>> {
    return streamFromSource(fileSource(path), this.decoder, this.readOptions, this.readPolicy(onError));
  }

  /**
   * Lazily read records from a file, silently dropping lines that fail to
   * decode. A file that cannot be opened is still thrown.
   */
  readAllQuietly(path: string): IterableIterator<InferRecord<S>> {
    return streamFromSource(fileSource(path), this.decoder, this.readOptions, { mode: 'quiet' });
  }

  /**
   * Same as readAll, over lines already in memory.
   */
  readLines(lines: Iterable<string>, onError?: ErrorHandler): IterableIterator<InferRecord<S>> {
    return streamFromSource(iterableSource(lines), this.decoder, this.readOptions, this.readPolicy(onError));
  }

  readStream(input: Readable, onError?: ErrorHandler): AsyncGenerator<InferRecord<S>, void, undefined> {
    return streamFromReadable(input, this.decoder, this.readOptions, this.readPolicy(onError));
  }

  /**
   * Write records to a file, replacing its contents.
   *
   * Without `onError`, every record is attempted and one
   * AggregateMappingError is thrown at the end if any failed; I/O failures
   * are thrown at once. With `onError`, each failure is reported to it.
   */
  writeAll(records: Iterable<InferRecord<S>>, path: string, onError?: ErrorHandler): void {
    streamToDestination(
      records,
      path,
      record => this.mapToText(record),
      this.header,
      onError ? { mode: 'collect', onError } : { mode: 'fail-fast' }
    );
  }

  private readonly decoder = (line: string): InferRecord<S> => this.mapFromText(line);

  private get readOptions(): ReadOptions {
    return { includeHeader: this.options.includeHeader, skipEmptyLines: this.options.skipEmptyLines };
  }

  private readPolicy(onError?: ErrorHandler): ReadPolicy {
    return onError ? { mode: 'collect', onError } : { mode: 'fail-fast' };
  }

  private isRecord(value: unknown): value is InferRecord<S> {
    return conformsTo(value, this.schema.nodes);
  }
}
