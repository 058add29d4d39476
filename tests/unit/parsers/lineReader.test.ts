import * as fs from 'fs';
import * as path from 'path';
import { fileSource, iterableSource, readFileLines } from '../../../src/parsers/lineReader';
import { CsvIOError } from '../../../src/errors';
import { makeTempDir } from '../../helpers/records';

describe('readFileLines', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = makeTempDir();
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function write(name: string, content: string | Buffer): string {
    const file = path.join(tmpDir, name);
    fs.writeFileSync(file, content);
    return file;
  }

  it('splits on \\n, \\r\\n and \\r', () => {
    const file = write('mixed.csv', 'a\r\nb\rc\nd');

    expect([...readFileLines(file)]).toEqual(['a', 'b', 'c', 'd']);
  });

  it('does not emit an empty line for the final terminator', () => {
    expect([...readFileLines(write('one.csv', 'a\n'))]).toEqual(['a']);
    expect([...readFileLines(write('blank.csv', 'a\n\n'))]).toEqual(['a', '']);
    expect([...readFileLines(write('empty.csv', ''))]).toEqual([]);
  });

  it('handles terminators and multi-byte characters split across reads', () => {
    const file = write('split.csv', 'zażółć\r\ngęś\r\n');

    expect([...readFileLines(file, 1)]).toEqual(['zażółć', 'gęś']);
  });

  it('drops a leading byte order mark', () => {
    const file = write('bom.csv', Buffer.from('\uFEFFname,surname\nA,B\n', 'utf8'));

    expect([...readFileLines(file, 2)]).toEqual(['name,surname', 'A,B']);
  });

  it('opens the file only when the first line is pulled', () => {
    const lines = readFileLines(path.join(tmpDir, 'missing.csv'));

    expect(() => lines.next()).toThrow(CsvIOError);
  });
});

describe('fileSource', () => {
  it('probes a missing file as an open failure', () => {
    const source = fileSource(path.join(makeTempDir(), 'missing.csv'));

    try {
      source.probe();
      throw new Error('probe should fail');
    } catch (error) {
      expect(error).toBeInstanceOf(CsvIOError);
      expect(error).toMatchObject({ operation: 'open', code: 'ENOENT' });
    }
  });

  it('probes a directory as an open failure', () => {
    const dir = makeTempDir();

    expect(() => fileSource(dir).probe()).toThrow(`Cannot open '${dir}': path is a directory`);
  });
});

describe('iterableSource', () => {
  it('returns the given lines', () => {
    const source = iterableSource(['x', 'y'], 'memory');

    expect(source.description).toBe('memory');
    expect(() => source.probe()).not.toThrow();
    expect([...source.lines()]).toEqual(['x', 'y']);
  });
});
