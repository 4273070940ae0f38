import { afterEach, describe, expect, jest, test } from '@jest/globals';
import {
  configureLogging,
  createLogger,
  getLoggingConfig,
  loadLoggingFromEnv,
  resetLogging,
} from '../src/util/logger';
import { formatDiagnostic } from '../src/util/diag';

afterEach(() => {
  resetLogging();
});

describe('logger', () => {
  test('defaults to error-only output', () => {
    const spy = jest.spyOn(console, 'warn').mockImplementation(() => {}).mockClear();
    createLogger('timeline').warn('hidden');
    expect(spy).not.toHaveBeenCalled();
  });

  test('prefixes output with the module name', () => {
    configureLogging({ level: 'warn', timestamps: false });
    const spy = jest.spyOn(console, 'warn').mockImplementation(() => {}).mockClear();
    createLogger('xm-reader').warn('odd header', 12);
    expect(spy).toHaveBeenCalledWith('[xm-reader]', 'odd header', 12);
  });

  test('a module allow-list filters other namespaces', () => {
    configureLogging({ level: 'debug', modules: ['timeline'], timestamps: false });
    const spy = jest.spyOn(console, 'log').mockImplementation(() => {}).mockClear();
    createLogger('export').debug('skipped');
    createLogger('timeline').debug('kept');
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith('[timeline]', 'kept');
  });

  test('loads level and modules from the environment', () => {
    loadLoggingFromEnv({ TRACKLINE_LOGLEVEL: 'WARN' });
    expect(getLoggingConfig().level).toBe('warn');

    resetLogging();
    loadLoggingFromEnv({ TRACKLINE_DEBUG: 'xm-reader, timeline' });
    expect(getLoggingConfig()).toMatchObject({ level: 'debug', modules: ['xm-reader', 'timeline'] });
  });

  test('ignores an unknown level', () => {
    loadLoggingFromEnv({ TRACKLINE_LOGLEVEL: 'loud' });
    expect(getLoggingConfig().level).toBe('error');
  });
});

describe('formatDiagnostic', () => {
  test('renders level, component, message and location', () => {
    expect(formatDiagnostic('WARN', 'xm-pattern', 'Pattern 2 data truncated', { file: 'a.xm', offset: 812 }))
      .toBe('[WARN] [xm-pattern] Pattern 2 data truncated file=a.xm, offset=812');
    expect(formatDiagnostic('ERROR', 'xm-header', 'bad')).toBe('[ERROR] [xm-header] bad');
  });
});
