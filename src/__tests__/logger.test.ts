import { afterEach, describe, expect, it, jest } from '@jest/globals';
import {
  createLogger,
  formatError,
  isLogLevel,
  levelFromVerbosity,
  setLogLevel,
} from '../utils/logger';

describe('logger', () => {
  afterEach(() => {
    setLogLevel('warn');
    jest.restoreAllMocks();
  });

  it('maps -v counts to levels', () => {
    expect([0, 1, 2, 3, 7].map(levelFromVerbosity)).toEqual([
      'warn',
      'info',
      'debug',
      'trace',
      'trace',
    ]);
  });

  it('recognises level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });

  it('drops messages below the current level', () => {
    const info = jest.spyOn(console, 'info').mockImplementation(() => {});
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
    setLogLevel('warn');
    const log = createLogger('Poller');

    log.info('hidden');
    log.warn('shown', 3);

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    const [line, extra] = warn.mock.calls[0];
    expect(line).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[Poller\] shown$/);
    expect(extra).toBe(3);
  });

  it('sends trace output to console.debug', () => {
    const debug = jest.spyOn(console, 'debug').mockImplementation(() => {});
    setLogLevel('trace');
    createLogger('Client').trace('raw body');
    expect(debug).toHaveBeenCalledTimes(1);
  });

  it('formats errors and other thrown values', () => {
    expect(formatError(new Error('boom'))).toBe('boom');
    expect(formatError('plain')).toBe('plain');
    expect(formatError(42)).toBe('42');
  });
});
