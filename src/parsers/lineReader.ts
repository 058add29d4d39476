import * as fs from 'fs';
import { StringDecoder } from 'string_decoder';
import { READ_CHUNK_SIZE } from '../config/settings';
import { CsvIOError } from '../errors';
import { LineSource } from '../types/csv';

const LINE_BREAK = /\r\n|\n|\r/;
export const BOM = '\uFEFF';

/**
 * Iterate the lines of a UTF-8 file, reading `chunkSize` bytes at a time.
 *
 * Lines end at `\n`, `\r\n` or `\r`; a trailing terminator does not produce
 * an extra empty line. The file is opened on the first pull and closed when
 * iteration finishes, fails or is abandoned through `return()`.
 */
export function* readFileLines(path: string, chunkSize: number = READ_CHUNK_SIZE): Generator<string, void, undefined> {
  let fd: number;
  try {
    fd = fs.openSync(path, 'r');
  } catch (error) {
    throw new CsvIOError('open', path, error);
  }

  try {
    const buffer = Buffer.alloc(chunkSize);
    const decoder = new StringDecoder('utf8');
    let pending = '';
    let first = true;

    for (;;) {
      let bytesRead: number;
      try {
        bytesRead = fs.readSync(fd, buffer, 0, chunkSize, null);
      } catch (error) {
        throw new CsvIOError('read', path, error);
      }
      if (bytesRead === 0) break;

      pending += decoder.write(buffer.subarray(0, bytesRead));
      if (first && pending.length > 0) {
        pending = pending.startsWith(BOM) ? pending.slice(1) : pending;
        first = false;
      }

      // A trailing \r may be the first half of \r\n; keep it for the next chunk
      const cut = pending.endsWith('\r') ? pending.length - 1 : pending.length;
      const lines = pending.slice(0, cut).split(LINE_BREAK);
      pending = (lines.pop() ?? '') + pending.slice(cut);

      yield* lines;
    }

    const rest = pending + decoder.end();
    if (rest.length > 0) {
      const lines = rest.split(LINE_BREAK);
      if (lines[lines.length - 1] === '') {
        lines.pop();
      }
      yield* lines;
    }
  } finally {
    fs.closeSync(fd);
  }
}

/**
 * Line source backed by a file. `probe()` checks that the path exists, is a
 * regular file and is readable, without keeping a handle open.
 */
export function fileSource(path: string, chunkSize?: number): LineSource {
  return {
    description: path,
    probe: () => {
      let stats: fs.Stats;
      try {
        stats = fs.statSync(path);
        fs.accessSync(path, fs.constants.R_OK);
      } catch (error) {
        throw new CsvIOError('open', path, error);
      }
      if (stats.isDirectory()) {
        throw new CsvIOError('open', path, new Error('path is a directory'));
      }
    },
    lines: () => readFileLines(path, chunkSize),
  };
}

/**
 * Line source over lines already in memory.
 */
export function iterableSource(lines: Iterable<string>, description = '<lines>'): LineSource {
  return {
    description,
    probe: () => undefined,
    lines: () => lines,
  };
}
