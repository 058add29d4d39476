import { EOL } from 'os';
import { AggregateMappingError, CsvIOError, CsvMapperError, MappingError, SchemaError } from '../../src/errors';

describe('errors', () => {
  it('formats a schema error with its hint', () => {
    const error = new SchemaError('User', 'column "name" is declared twice', 'rename one of the fields');

    expect(error).toBeInstanceOf(CsvMapperError);
    expect(error.format()).toBe(
      'error: Invalid schema for "User": column "name" is declared twice\n\nhelp: rename one of the fields'
    );
  });

  it('shows the offending input of a mapping error', () => {
    const error = new MappingError('Expected 2 column(s) but found 3', { line: 'a,b,c', lineNumber: 7 });

    expect(error.message).toBe('Expected 2 column(s) but found 3 (line 7)');
    expect(error.format()).toBe('error: Expected 2 column(s) but found 3 (line 7)\n   └── input: "a,b,c"');
  });

  it('re-attributes a mapping error to another line', () => {
    const cause = new Error('bad digit');
    const original = new MappingError('Cannot convert', { cause, field: 'n', line: 'x', lineNumber: 1 });

    const moved = original.atLine(12);

    expect(moved.message).toBe('Cannot convert (line 12)');
    expect(moved).toMatchObject({ reason: 'Cannot convert', field: 'n', line: 'x', lineNumber: 12 });
    expect(moved.cause).toBe(cause);
  });

  it('describes the cause when there is no input line', () => {
    const error = new MappingError('Cannot read field "name": boom', { cause: new Error('boom') });

    expect(error.format()).toBe('error: Cannot read field "name": boom\n   └── boom');
  });

  it('keeps the errno code of I/O failures', () => {
    const cause = Object.assign(new Error('ENOENT: no such file or directory'), { code: 'ENOENT' });
    const error = new CsvIOError('open', '/data/in.csv', cause);

    expect(error.message).toBe("Cannot open '/data/in.csv': ENOENT: no such file or directory");
    expect(error).toMatchObject({ operation: 'open', path: '/data/in.csv', code: 'ENOENT' });
  });

  it('concatenates every failure into the aggregate message', () => {
    const error = new AggregateMappingError([new MappingError('first'), new MappingError('second')]);

    expect(error.message).toBe(
      `Failed to write lines due to following errors: MappingError: first,${EOL}MappingError: second,${EOL}`
    );
    expect(error.format().endsWith(`${EOL}\n   └── 2 record(s) failed`)).toBe(true);
  });
});
