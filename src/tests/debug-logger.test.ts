/**
 * Tests for the in-memory log kept by debugLogger
 */

import { LogLevel, debugLogger } from '../shared/utils/debug-logger';

beforeEach(() => {
  debugLogger.clearLogs();
  jest.spyOn(console, 'debug').mockImplementation(() => undefined);
  jest.spyOn(console, 'info').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  debugLogger.setLogLevel(LogLevel.WARN);
  jest.restoreAllMocks();
});

describe('debugLogger', () => {
  it('records only entries at or above the active level', () => {
    debugLogger.setLogLevel(LogLevel.WARN);

    debugLogger.debug('Wrote 4 bytes', { byteCount: 4 }, 'PrinterService');
    debugLogger.info('Device connected', undefined, 'PrinterService');
    debugLogger.warn('Device not found', undefined, 'PrinterService', 'dev-1');

    expect(debugLogger.getLogs()).toMatchObject([
      { level: LogLevel.WARN, message: 'Device not found', component: 'PrinterService', device: 'dev-1' },
    ]);
    expect(console.debug).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('filters by level, component and count', () => {
    debugLogger.setLogLevel(LogLevel.DEBUG);

    debugLogger.deviceOperation('connected', 'dev-1');
    debugLogger.transferOperation(12, 'dev-1');
    debugLogger.warn('Releasing late connection failed', undefined, 'PrinterTransport');
    debugLogger.error('Connect failed', undefined, 'PrinterService', 'dev-2');

    expect(debugLogger.getLogs().map((entry) => entry.message)).toEqual([
      'Device connected',
      'Wrote 12 bytes',
      'Releasing late connection failed',
      'Connect failed',
    ]);
    expect(debugLogger.getLogs(LogLevel.WARN).map((entry) => entry.message)).toEqual([
      'Releasing late connection failed',
      'Connect failed',
    ]);
    expect(debugLogger.getLogs(undefined, 'PrinterService', 2).map((entry) => entry.message)).toEqual([
      'Wrote 12 bytes',
      'Connect failed',
    ]);
  });

  it('forgets everything on clear', () => {
    debugLogger.error('Connect failed');
    debugLogger.clearLogs();

    expect(debugLogger.getLogs()).toEqual([]);
  });
});
