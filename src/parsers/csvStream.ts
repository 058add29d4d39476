import { EOL } from 'os';
import { Readable } from 'stream';
import { createInterface } from 'readline';
import { AggregateMappingError, CsvIOError, IOOperation, MappingError } from '../errors';
import { createLogger } from '../logging/logger';
import { BufferedFileWriter } from './fileWriter';
import { BOM } from './lineReader';
import { LineSource, ReadPolicy, RecordDecoder, RecordEncoder, WritePolicy } from '../types/csv';

const readLog = createLogger('Read');
const writeLog = createLogger('Write');

export interface ReadOptions {
  /** Drop the first line without looking at it */
  includeHeader: boolean;
  skipEmptyLines: boolean;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toIOError(error: unknown, operation: IOOperation, path: string): CsvIOError {
  return error instanceof CsvIOError ? error : new CsvIOError(operation, path, error);
}

/**
 * Applies header skipping, blank-line filtering and the read policy to one
 * line at a time.
 */
class LineDecoder<T> {
  private lineNumber = 0;
  private headerPending: boolean;

  constructor(
    private readonly decode: RecordDecoder<T>,
    private readonly options: ReadOptions,
    private readonly policy: ReadPolicy
  ) {
    this.headerPending = options.includeHeader;
  }

  /**
   * Returns the decoded record, or undefined when the line yields none.
   * Under fail-fast the decode failure is thrown.
   */
  accept(line: string): T | undefined {
    this.lineNumber++;

    if (this.headerPending) {
      this.headerPending = false;
      return undefined;
    }
    if (this.options.skipEmptyLines && line.trim() === '') {
      return undefined;
    }

    try {
      return this.decode(line);
    } catch (error) {
      const failure =
        error instanceof MappingError
          ? error.atLine(this.lineNumber)
          : new MappingError(describe(error), { cause: error, line, lineNumber: this.lineNumber });

      switch (this.policy.mode) {
        case 'fail-fast':
          throw failure;
        case 'quiet':
          readLog.debug(`Discarding line ${this.lineNumber}: ${failure.reason}`);
          return undefined;
        case 'collect':
          this.policy.onError(failure);
          return undefined;
      }
    }
  }
}

function* decodeLines<T>(source: LineSource, decoder: LineDecoder<T>, policy: ReadPolicy): Generator<T, void, undefined> {
  const iterator = source.lines()[Symbol.iterator]();
  try {
    for (;;) {
      let next: IteratorResult<string>;
      try {
        next = iterator.next();
      } catch (error) {
        const ioError = toIOError(error, 'read', source.description);
        if (policy.mode !== 'collect') {
          throw ioError;
        }
        readLog.warn(`Stopped reading ${source.description}: ${ioError.message}`);
        policy.onError(ioError);
        return;
      }

      if (next.done) return;

      const record = decoder.accept(next.value);
      if (record !== undefined) {
        yield record;
      }
    }
  } finally {
    iterator.return?.();
  }
}

/**
 * Lazily decode the lines of `source` into records.
 *
 * The source is probed before anything is returned: an open failure is
 * thrown under fail-fast and quiet, and handed once to `onError` (followed
 * by an empty sequence) under collect. Lines are read and decoded only as
 * the caller pulls; stopping early releases the source.
 */
export function streamFromSource<T>(
  source: LineSource,
  decode: RecordDecoder<T>,
  options: ReadOptions,
  policy: ReadPolicy
): IterableIterator<T> {
  try {
    source.probe();
  } catch (error) {
    const ioError = toIOError(error, 'open', source.description);
    if (policy.mode !== 'collect') {
      throw ioError;
    }
    readLog.warn(`Cannot read ${source.description}: ${ioError.message}`);
    policy.onError(ioError);
    return new Array<T>().values();
  }

  return decodeLines(source, new LineDecoder(decode, options, policy), policy);
}

/**
 * Async counterpart of streamFromSource over a Node readable stream, split
 * into lines with readline. A byte order mark before the first line is dropped.
 */
export async function* streamFromReadable<T>(
  input: Readable,
  decode: RecordDecoder<T>,
  options: ReadOptions,
  policy: ReadPolicy,
  description = '<stream>'
): AsyncGenerator<T, void, undefined> {
  const decoder = new LineDecoder(decode, options, policy);
  const lines = createInterface({ input, crlfDelay: Infinity });
  let first = true;

  try {
    for await (const line of lines) {
      const record = decoder.accept(first && line.startsWith(BOM) ? line.slice(BOM.length) : line);
      first = false;
      if (record !== undefined) {
        yield record;
      }
    }
  } catch (error) {
    if (error instanceof MappingError) {
      throw error;
    }
    const ioError = toIOError(error, 'read', description);
    if (policy.mode !== 'collect') {
      throw ioError;
    }
    policy.onError(ioError);
  } finally {
    lines.close();
  }
}

/**
 * Write `header` (when given) and every encodable record to `path`,
 * truncating it.
 *
 * Fail-fast drains the whole input, then throws one AggregateMappingError
 * listing every encode failure. Collect hands each failure to `onError` as
 * it happens. I/O failures end the loop: thrown under fail-fast, reported
 * once under collect. The file is closed before returning in every case.
 */
export function streamToDestination<T>(
  records: Iterable<T>,
  path: string,
  encode: RecordEncoder<T>,
  header: string | undefined,
  policy: WritePolicy
): void {
  let writer: BufferedFileWriter;
  try {
    writer = BufferedFileWriter.open(path);
  } catch (error) {
    const ioError = toIOError(error, 'open', path);
    if (policy.mode !== 'collect') {
      throw ioError;
    }
    writeLog.warn(`Cannot write ${path}: ${ioError.message}`);
    policy.onError(ioError);
    return;
  }

  const failures: MappingError[] = [];
  let written = 0;
  let aborted: { error: unknown } | undefined;

  try {
    if (header !== undefined) {
      writer.write(header + EOL);
    }

    for (const record of records) {
      let line: string;
      try {
        line = encode(record);
      } catch (error) {
        const failure = error instanceof MappingError ? error : new MappingError(describe(error), { cause: error });
        if (policy.mode === 'collect') {
          policy.onError(failure);
        } else {
          failures.push(failure);
        }
        continue;
      }
      writer.write(line);
      written++;
    }

    writer.flush();
  } catch (error) {
    aborted = { error };
  }

  try {
    writer.close();
  } catch (error) {
    if (aborted === undefined) {
      aborted = { error };
    } else {
      writeLog.warn(`Failed to close ${path} after an earlier error: ${describe(error)}`);
    }
  }

  if (aborted !== undefined) {
    const { error } = aborted;
    if (!(error instanceof CsvIOError) || policy.mode !== 'collect') {
      throw error;
    }
    writeLog.warn(`Stopped writing ${path} after ${written} record(s): ${error.message}`);
    policy.onError(error);
    return;
  }

  writeLog.debug(`Wrote ${written} record(s) to ${path}, ${failures.length} failed`);

  if (failures.length > 0) {
    throw new AggregateMappingError(failures);
  }
}
