/**
 * Logger tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Logger, getLogger, resetLogger, logger } from '../../src/utils/logger.js';

describe('Logger', () => {
  let consoleLog: jest.SpyInstance;
  let consoleWarn: jest.SpyInstance;
  let consoleError: jest.SpyInstance;

  beforeEach(() => {
    consoleLog = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    consoleWarn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    consoleError = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    resetLogger();
  });

  // ==========================================================================
  // Levels
  // ==========================================================================

  describe('levels', () => {
    it('should drop entries below the configured level', () => {
      const log = new Logger({ level: 'warn', silent: true });
      log.debug('d');
      log.info('i');
      log.warn('w');
      log.error('e');

      expect(log.getHistory().map(entry => entry.level)).toEqual(['warn', 'error']);
    });

    it('should change level at runtime', () => {
      const log = new Logger({ level: 'error', silent: true });
      log.setLevel('debug');
      log.debug('now visible');

      expect(log.isDebugEnabled()).toBe(true);
      expect(log.getHistory()).toHaveLength(1);
    });
  });

  // ==========================================================================
  // Output
  // ==========================================================================

  describe('output', () => {
    it('should write JSON lines', () => {
      const log = new Logger({ level: 'info', format: 'json', silent: false, source: 'bus' });
      log.info('hello', { taskId: 't1' });

      expect(consoleLog).toHaveBeenCalledTimes(1);
      const line: string = consoleLog.mock.calls[0][0];
      const parsed: unknown = JSON.parse(line);
      expect(parsed).toMatchObject({ level: 'info', message: 'hello', source: 'bus', taskId: 't1' });
    });

    it('should write plain text without colors or timestamps when disabled', () => {
      const log = new Logger({
        level: 'info',
        format: 'text',
        silent: false,
        enableColors: false,
        enableTimestamps: false,
      });
      log.warn('careful', { n: 1 });

      expect(consoleWarn).toHaveBeenCalledWith('WARN  careful {"n":1}');
    });

    it('should route errors to console.error', () => {
      const log = new Logger({ level: 'info', silent: false, enableColors: false, enableTimestamps: false });
      log.error('failed');

      expect(consoleError).toHaveBeenCalledWith('ERROR failed');
    });

    it('should print nothing when silent but keep history', () => {
      const log = new Logger({ level: 'info', silent: true });
      log.info('quiet');

      expect(consoleLog).not.toHaveBeenCalled();
      expect(log.getHistory()[0].message).toBe('quiet');
    });
  });

  // ==========================================================================
  // Errors and history
  // ==========================================================================

  describe('error context', () => {
    it('should flatten an Error into the context', () => {
      const log = new Logger({ level: 'info', silent: true });
      log.error('boom', new TypeError('bad type'), { taskId: 't1' });

      const context = log.getHistory()[0].context;
      expect(context).toMatchObject({ errorName: 'TypeError', errorMessage: 'bad type', taskId: 't1' });
    });
  });

  describe('history', () => {
    it('should keep at most maxHistory entries', () => {
      const log = new Logger({ level: 'info', silent: true, maxHistory: 3 });
      for (let i = 0; i < 5; i++) {
        log.info(`entry ${i}`);
      }

      expect(log.getHistory().map(entry => entry.message)).toEqual(['entry 2', 'entry 3', 'entry 4']);
      log.clearHistory();
      expect(log.getHistory()).toEqual([]);
    });
  });

  describe('child', () => {
    it('should tag entries with the child source', () => {
      const parent = new Logger({ level: 'info', silent: true, source: 'runtime' });
      const child = parent.child('scheduler');
      child.info('tick');

      expect(child.getHistory()[0].source).toBe('runtime:scheduler');
      expect(child.getLevel()).toBe('info');
    });
  });

  describe('file sink', () => {
    it('should append JSON lines to the log file', () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'taskloom-log-'));
      const filePath = path.join(dir, 'logs', 'app.log');
      const log = new Logger({ level: 'info', silent: true, filePath });

      log.info('first');
      log.warn('second', { n: 2 });
      log.close();
      log.info('after close');

      const lines = fs.readFileSync(filePath, 'utf-8').trim().split('\n');
      expect(lines).toHaveLength(2);
      expect(JSON.parse(lines[1])).toMatchObject({ level: 'warn', message: 'second', n: 2 });

      fs.rmSync(dir, { recursive: true, force: true });
    });
  });

  describe('shared logger', () => {
    it('should delegate to the current instance', () => {
      const instance = getLogger();
      instance.setLevel('debug');
      logger.debug('shared entry');

      expect(instance.getHistory().some(entry => entry.message === 'shared entry')).toBe(true);
      resetLogger();
      expect(getLogger()).not.toBe(instance);
    });
  });
});
