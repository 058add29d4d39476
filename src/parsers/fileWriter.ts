import * as fs from 'fs';
import { WRITE_BUFFER_SIZE } from '../config/settings';
import { CsvIOError } from '../errors';

/**
 * Synchronous buffered writer over a file descriptor. Every failure is
 * raised as CsvIOError.
 */
export class BufferedFileWriter {
  private chunks: string[] = [];
  private buffered = 0;
  private closed = false;

  private constructor(
    readonly path: string,
    private readonly fd: number,
    private readonly bufferSize: number
  ) {}

  /**
   * Open `path` for writing, creating or truncating it.
   */
  static open(path: string, bufferSize: number = WRITE_BUFFER_SIZE): BufferedFileWriter {
    try {
      return new BufferedFileWriter(path, fs.openSync(path, 'w'), bufferSize);
    } catch (error) {
      throw new CsvIOError('open', path, error);
    }
  }

  write(text: string): void {
    this.chunks.push(text);
    this.buffered += Buffer.byteLength(text);
    if (this.buffered >= this.bufferSize) {
      this.flush();
    }
  }

  flush(): void {
    if (this.chunks.length === 0) return;

    const data = this.chunks.join('');
    this.chunks = [];
    this.buffered = 0;
    try {
      fs.writeSync(this.fd, data);
    } catch (error) {
      throw new CsvIOError('write', this.path, error);
    }
  }

  /**
   * Release the descriptor without flushing. Safe to call more than once.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    try {
      fs.closeSync(this.fd);
    } catch (error) {
      throw new CsvIOError('close', this.path, error);
    }
  }
}
