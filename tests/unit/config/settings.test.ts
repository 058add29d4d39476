import { parseLogLevel, positiveInt } from '../../../src/config/settings';

describe('settings', () => {
  it('parses log levels case-insensitively', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel(' silent ')).toBe('silent');
  });

  it('falls back for unknown log levels', () => {
    expect(parseLogLevel('verbose')).toBe('warn');
    expect(parseLogLevel(undefined, 'info')).toBe('info');
  });

  it('reads positive integers with a fallback', () => {
    expect(positiveInt('4096', 10)).toBe(4096);
    expect(positiveInt(undefined, 10)).toBe(10);
    expect(positiveInt('abc', 10)).toBe(10);
    expect(positiveInt('-1', 10)).toBe(10);
  });
});
