/**
 * Logger utility tests
 */
import { describe, it, expect, vi } from 'vitest';
import { Logger, resolveLogLevel, type LogEntry } from '../../src/utils/logger';

describe('Logger', () => {
  describe('log levels', () => {
    it('should respect log level hierarchy', () => {
      const logs: string[] = [];
      const logger = new Logger({
        level: 'info',
        handler: (entry) => logs.push(`${entry.level}: ${entry.message}`),
      });

      logger.trace('trace message');
      logger.debug('debug message');
      logger.info('info message');
      logger.warn('warn message');
      logger.error('error message');

      expect(logs).toEqual(['info: info message', 'warn: warn message', 'error: error message']);
    });

    it('should log nothing by default', () => {
      const logs: string[] = [];
      const logger = new Logger({ handler: (entry) => logs.push(entry.message) });

      logger.trace('test');
      logger.info('test');
      logger.error('test');

      expect(logs).toEqual([]);
    });

    it('should log everything when level is trace', () => {
      const logs: string[] = [];
      const logger = new Logger({
        level: 'trace',
        handler: (entry) => logs.push(entry.level),
      });

      logger.trace('test');
      logger.debug('test');
      logger.info('test');
      logger.warn('test');
      logger.error('test');

      expect(logs).toEqual(['trace', 'debug', 'info', 'warn', 'error']);
    });

    it('should change level at runtime', () => {
      const logs: string[] = [];
      const logger = new Logger({ level: 'error', handler: (entry) => logs.push(entry.message) });

      logger.info('hidden');
      logger.setLevel('debug');
      logger.info('shown');

      expect(logs).toEqual(['shown']);
      expect(logger.getLevelName()).toBe('debug');
      expect(logger.isLevelEnabled('trace')).toBe(false);
      expect(logger.isLevelEnabled('warn')).toBe(true);
    });
  });

  describe('log entries', () => {
    it('should include an ISO timestamp when enabled', () => {
      const entries: LogEntry[] = [];
      const logger = new Logger({ level: 'info', handler: (e) => entries.push(e) });

      logger.info('test');

      expect(entries[0].timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T/);
    });

    it('should leave timestamp empty when disabled', () => {
      const entries: LogEntry[] = [];
      const logger = new Logger({ level: 'info', timestamps: false, handler: (e) => entries.push(e) });

      logger.info('test');

      expect(entries[0].timestamp).toBe('');
    });

    it('should pass data through', () => {
      const entries: LogEntry[] = [];
      const logger = new Logger({ level: 'debug', handler: (e) => entries.push(e) });

      logger.debug('Query', { command: '*IDN?', response: 'ACME' });

      expect(entries[0].data).toEqual({ command: '*IDN?', response: 'ACME' });
    });

    it('should tag entries with the endpoint once set', () => {
      const entries: LogEntry[] = [];
      const logger = new Logger({ level: 'info', handler: (e) => entries.push(e) });

      logger.info('before');
      logger.setEndpoint('/dev/ttyACM0');
      logger.info('after');

      expect(entries.map((e) => e.endpoint)).toEqual([undefined, '/dev/ttyACM0']);
    });
  });

  describe('child loggers', () => {
    it('should join prefixes and inherit level, handler and endpoint', () => {
      const entries: LogEntry[] = [];
      const parent = new Logger({ level: 'warn', prefix: 'lab', handler: (e) => entries.push(e) });
      parent.setEndpoint('10.0.0.5:5555');

      const child = parent.child('tcp');
      child.info('hidden');
      child.warn('shown');

      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({ prefix: 'lab:tcp', endpoint: '10.0.0.5:5555', message: 'shown' });
    });

    it('should use the bare prefix when the parent has none', () => {
      const entries: LogEntry[] = [];
      const child = new Logger({ level: 'info', handler: (e) => entries.push(e) }).child('session');

      child.info('x');

      expect(entries[0].prefix).toBe('session');
    });
  });

  describe('default handler', () => {
    it('should write formatted lines to the console', () => {
      const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const logger = new Logger({ level: 'warn', prefix: 'scpi', timestamps: false });
      logger.setEndpoint('COM3');

      logger.warn('Connection lost');

      expect(spy).toHaveBeenCalledWith('[scpi] <COM3> WARN Connection lost');
    });

    it('should route trace to console.debug with data', () => {
      const spy = vi.spyOn(console, 'debug').mockImplementation(() => {});
      const logger = new Logger({ level: 'trace', timestamps: false });

      logger.trace('bytes', { length: 4 });

      expect(spy).toHaveBeenCalledWith('TRACE bytes', { length: 4 });
    });
  });
});

describe('resolveLogLevel', () => {
  it('prefers an explicit level over the debug flag', () => {
    expect(resolveLogLevel('warn', true)).toBe('warn');
  });

  it('maps the debug flag to debug', () => {
    expect(resolveLogLevel(undefined, true)).toBe('debug');
  });

  it('defaults to silent', () => {
    expect(resolveLogLevel()).toBe('silent');
  });
});
