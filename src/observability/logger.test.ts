/**
 * @fileoverview Unit tests for Logger
 */

import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';
import { Logger, ConsoleTransport, MemoryTransport, createLogger, parseSeverity } from './logger.js';
import { Severity, createUniqueId } from '../types/index.js';
import { v4 as uuidv4 } from 'uuid';

describe('Logger', () => {
  let memoryTransport: MemoryTransport;
  let logger: Logger;

  beforeEach(() => {
    memoryTransport = new MemoryTransport(100);
    logger = new Logger({
      minLevel: Severity.DEBUG,
      transports: [memoryTransport],
      module: 'test',
    });
  });

  describe('logging levels', () => {
    it('should log DEBUG messages with data', () => {
      logger.debug('debug message', { key: 'value' });

      const entries = memoryTransport.getEntries();
      expect(entries).toHaveLength(1);
      expect(entries[0]?.level).toBe(Severity.DEBUG);
      expect(entries[0]?.message).toBe('debug message');
      expect(entries[0]?.data).toEqual({ key: 'value' });
      expect(entries[0]?.module).toBe('test');
    });

    it('should log WARN and FATAL messages', () => {
      logger.warn('warn message');
      logger.fatal('fatal message');

      expect(memoryTransport.getEntries().map(e => e.level)).toEqual([Severity.WARN, Severity.FATAL]);
    });

    it('should attach error details without a stack', () => {
      const error = Object.assign(new Error('test error'), { code: 'E_TEST' });
      logger.error('error message', {}, error);

      const entry = memoryTransport.getEntries()[0];
      expect(entry?.error).toEqual({ name: 'Error', message: 'test error', code: 'E_TEST' });
    });
  });

  describe('level filtering', () => {
    it('should filter messages below minimum level', () => {
      const warnLogger = new Logger({
        minLevel: Severity.WARN,
        transports: [memoryTransport],
        module: 'test',
      });

      warnLogger.debug('debug');
      warnLogger.info('info');
      warnLogger.warn('warn');
      warnLogger.error('error');

      const entries = memoryTransport.getEntries();
      expect(entries).toHaveLength(2);
      expect(entries[0]?.level).toBe(Severity.WARN);
      expect(entries[1]?.level).toBe(Severity.ERROR);
    });
  });

  describe('child loggers', () => {
    it('should carry module and run ID into entries', () => {
      const runId = createUniqueId(uuidv4());
      const child = logger.child({ module: 'agent.loop', runId });
      child.info('child message');

      const entries = memoryTransport.findByRunId(runId);
      expect(entries).toHaveLength(1);
      expect(entries[0]?.module).toBe('agent.loop');
    });

    it('should keep the parent module and level when not overridden', () => {
      const child = logger.child({});
      child.debug('message');

      expect(memoryTransport.getEntries()[0]?.module).toBe('test');
      expect(child.minLevel).toBe(Severity.DEBUG);
    });
  });

  describe('MemoryTransport', () => {
    it('should respect max entries limit', () => {
      const smallTransport = new MemoryTransport(3);
      const smallLogger = new Logger({
        minLevel: Severity.DEBUG,
        transports: [smallTransport],
        module: 'test',
      });

      smallLogger.info('message 1');
      smallLogger.info('message 2');
      smallLogger.info('message 3');
      smallLogger.info('message 4');

      const entries = smallTransport.getEntries();
      expect(entries).toHaveLength(3);
      expect(entries[0]?.message).toBe('message 2');
      expect(entries[2]?.message).toBe('message 4');
    });

    it('should find entries by level and clear', () => {
      logger.info('a');
      logger.warn('b');

      expect(memoryTransport.findByLevel(Severity.WARN).map(e => e.message)).toEqual(['b']);

      memoryTransport.clear();
      expect(memoryTransport.getEntries()).toHaveLength(0);
    });
  });

  describe('transport failures', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should keep writing to other transports when one throws', () => {
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const failing = { name: 'failing', write: () => { throw new Error('disk full'); } };
      const resilient = new Logger({ minLevel: Severity.INFO, transports: [failing, memoryTransport] });

      resilient.info('still delivered');

      expect(memoryTransport.getEntries()).toHaveLength(1);
      expect(consoleError).toHaveBeenCalledTimes(1);
    });
  });

  describe('ConsoleTransport', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should write uncoloured lines with module prefix', () => {
      const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
      const consoleLogger = createLogger('cli', {
        minLevel: Severity.INFO,
        transports: [new ConsoleTransport(false)],
      });

      consoleLogger.info('hello');

      expect(info).toHaveBeenCalledTimes(1);
      const line = String(info.mock.calls[0]?.[0]);
      expect(line).toMatch(/^\d{4}-\d{2}-\d{2}T\S+ INFO  \[cli\] hello$/);
    });

    it('should send every level to stderr when asked', () => {
      const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const consoleLogger = createLogger('cli', {
        minLevel: Severity.DEBUG,
        transports: [new ConsoleTransport(false, true)],
      });

      consoleLogger.info('hello');
      consoleLogger.debug('details');

      expect(info).not.toHaveBeenCalled();
      expect(error).toHaveBeenCalledTimes(2);
    });
  });
});

describe('parseSeverity()', () => {
  it('should parse names case-insensitively', () => {
    expect(parseSeverity('debug')).toBe(Severity.DEBUG);
    expect(parseSeverity(' Warn ')).toBe(Severity.WARN);
  });

  it('should return null for unknown names', () => {
    expect(parseSeverity('verbose')).toBeNull();
  });
});
