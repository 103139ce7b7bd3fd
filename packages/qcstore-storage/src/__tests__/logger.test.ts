/**
 * Logger tests
 */

import { LogRecord, consoleSink, createLogger } from '../logger';

describe('createLogger', () => {
  it('should drop records below the level', () => {
    const records: LogRecord[] = [];
    const logger = createLogger('qcstore', { level: 'warn', sink: (r) => records.push(r) });

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');

    expect(records.map((r) => r.level)).toEqual(['warn', 'error']);
  });

  it('should not let fields override the standard keys', () => {
    const records: LogRecord[] = [];
    const logger = createLogger('qcstore', { sink: (r) => records.push(r) });

    logger.info('Energy written', { geometry_id: 3, message: 'ignored', level: 'error' });

    expect(records[0]).toMatchObject({
      level: 'info',
      component: 'qcstore',
      message: 'Energy written',
      geometry_id: 3,
    });
    expect(Number.isNaN(Date.parse(records[0].timestamp))).toBe(false);
  });

  it('should name child components after their parent', () => {
    const records: LogRecord[] = [];
    const logger = createLogger('qcstore', { level: 'debug', sink: (r) => records.push(r) });

    logger.child('sql').child('read').debug('SELECT 1');

    expect(records[0]).toMatchObject({ component: 'qcstore.sql.read', level: 'debug' });
  });
});

describe('consoleSink', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should write one JSON line per record', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const record: LogRecord = { timestamp: '2024-01-01T00:00:00.000Z', level: 'info', component: 'c', message: 'm' };

    consoleSink(record);

    expect(log).toHaveBeenCalledWith(JSON.stringify(record));
  });

  it('should send errors to stderr', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    consoleSink({ timestamp: '2024-01-01T00:00:00.000Z', level: 'error', component: 'c', message: 'boom' });

    expect(error).toHaveBeenCalledTimes(1);
    expect(log).not.toHaveBeenCalled();
  });
});
