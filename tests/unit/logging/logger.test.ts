import { createLogger } from '../../../src/logging/logger';

describe('createLogger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('prefixes messages with the component tag', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    createLogger('Read', 'info').info('opened file', { path: 'a.csv' });

    expect(log).toHaveBeenCalledWith('[Read] opened file', { path: 'a.csv' });
  });

  it('drops messages below the configured level', () => {
    const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = createLogger('Write', 'warn');

    logger.debug('hidden');
    logger.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[Write] shown');
    expect(logger.isEnabled('error')).toBe(true);
    expect(logger.isEnabled('info')).toBe(false);
  });

  it('logs nothing when silent', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    createLogger('Schema', 'silent').error('hidden');

    expect(error).not.toHaveBeenCalled();
  });
});
