import { Logger, parseLevel } from '../utils/logger';

describe('Logger', () => {
  let consoleSpy: jest.SpyInstance;

  beforeEach(() => {
    consoleSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    consoleSpy.mockRestore();
  });

  describe('level threshold', () => {
    it('should drop debug entries at the info level', () => {
      const log = new Logger('info');

      log.debug('location_normalized', { synthetic: true });
      log.info('normalize_request', { count: 1 });

      expect(log.getLogs().map((e) => e.message)).toEqual(['normalize_request']);
      expect(consoleSpy).toHaveBeenCalledTimes(1);
    });

    it('should keep debug entries after setLevel', () => {
      const log = new Logger('info');
      log.setLevel('debug');

      log.debug('location_normalized', { synthetic: false });

      const logs = log.getLogs();
      expect(logs).toHaveLength(1);
      expect(logs[0].level).toBe('debug');
      expect(logs[0].context).toEqual({ synthetic: false });
    });

    it('should only let errors through at the error level', () => {
      const log = new Logger('error');

      log.warn('location_validation_warning');
      log.error('location_error_malformed_code', { code: 'xyz' });

      expect(log.getLogs().map((e) => e.level)).toEqual(['error']);
    });
  });

  describe('parseLevel', () => {
    it('should read known levels case-insensitively', () => {
      expect(parseLevel('DEBUG')).toBe('debug');
      expect(parseLevel('warn')).toBe('warn');
    });

    it('should default to info', () => {
      expect(parseLevel(undefined)).toBe('info');
      expect(parseLevel('verbose')).toBe('info');
    });
  });

  describe('buffer', () => {
    it('should keep only the most recent entries', () => {
      const log = new Logger('info', 3);

      for (let i = 0; i < 5; i++) {
        log.info(`entry_${i}`);
      }

      expect(log.getLogs().map((e) => e.message)).toEqual(['entry_2', 'entry_3', 'entry_4']);
    });

    it('should empty the buffer on clearLogs', () => {
      const log = new Logger('info');
      log.info('normalize_request');
      log.clearLogs();

      expect(log.getLogs()).toEqual([]);
    });
  });
});
