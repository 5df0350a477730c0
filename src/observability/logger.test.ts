/**
 * @fileoverview Unit tests for Logger
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { v4 as uuidv4 } from 'uuid';
import {
  Logger,
  ConsoleTransport,
  JsonTransport,
  MemoryTransport,
  parseSeverity,
  type LineSink,
} from './logger.js';
import { Severity, createUniqueId } from '../types/index.js';

class CollectingSink implements LineSink {
  readonly lines: string[] = [];

  write(chunk: string): boolean {
    this.lines.push(chunk);
    return true;
  }
}

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
      expect(entries[0].level).toBe(Severity.DEBUG);
      expect(entries[0].message).toBe('debug message');
      expect(entries[0].data).toEqual({ key: 'value' });
    });

    it('should log ERROR messages with error object', () => {
      const error = new Error('test error');
      logger.error('error message', {}, error);

      const entries = memoryTransport.getEntries();
      expect(entries).toHaveLength(1);
      expect(entries[0].error?.message).toBe('test error');
      expect(entries[0].error?.name).toBe('Error');
    });

    it('should keep the code of coded errors', () => {
      const error = Object.assign(new Error('rate limited'), { code: 'RATE_LIMIT' });
      logger.warn('completion retry', {}, error);

      expect(memoryTransport.getEntries()[0].error?.code).toBe('RATE_LIMIT');
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
      expect(entries[0].level).toBe(Severity.WARN);
      expect(entries[1].level).toBe(Severity.ERROR);
    });

    it('should skip metrics entries below minimum level', () => {
      const infoLogger = new Logger({ minLevel: Severity.INFO, transports: [memoryTransport] });
      infoLogger.withMetrics(Severity.DEBUG, 'fast path', { durationMs: 3 });

      expect(memoryTransport.getEntries()).toHaveLength(0);
    });
  });

  describe('child loggers', () => {
    it('should use the child module and inherit transports', () => {
      const child = logger.child({ module: 'agent.decision-loop' });
      child.info('child message');

      const entries = memoryTransport.getEntries();
      expect(entries).toHaveLength(1);
      expect(entries[0].module).toBe('agent.decision-loop');
    });

    it('should tag entries with the session ID', () => {
      const sessionId = createUniqueId(uuidv4());
      const child = logger.child({ sessionId });
      child.info('in session');
      logger.info('outside session');

      expect(memoryTransport.findBySessionId(sessionId)).toHaveLength(1);
      expect(memoryTransport.getEntries()[1].sessionId).toBeNull();
    });
  });

  describe('time()', () => {
    it('should return the wrapped value and record a duration', async () => {
      const value = await logger.time('lookup', () => Promise.resolve(42));

      expect(value).toBe(42);
      const entry = memoryTransport.getEntries()[0];
      expect(entry.message).toBe('lookup completed');
      expect(entry.metrics?.durationMs).toBeGreaterThanOrEqual(0);
    });

    it('should rethrow and log failures', async () => {
      await expect(logger.time('lookup', () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');

      const entry = memoryTransport.getEntries()[0];
      expect(entry.message).toBe('lookup failed');
      expect(entry.level).toBe(Severity.WARN);
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
      expect(entries[0].message).toBe('message 2');
      expect(entries[2].message).toBe('message 4');
    });

    it('should clear entries', () => {
      logger.info('message');
      memoryTransport.clear();
      expect(memoryTransport.getEntries()).toHaveLength(0);
    });
  });

  describe('ConsoleTransport', () => {
    it('should write one uncolored line per entry', () => {
      const sink = new CollectingSink();
      const consoleLogger = new Logger({
        module: 'catalog',
        transports: [new ConsoleTransport({ useColors: false, sink })],
      });

      consoleLogger.info('seeded', { rows: 4 });

      expect(sink.lines).toHaveLength(1);
      expect(sink.lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z INFO  \[catalog\] seeded \{"rows":4\}\n$/);
    });
  });

  describe('JsonTransport', () => {
    it('should write parseable JSON lines', () => {
      const sink = new CollectingSink();
      const jsonLogger = new Logger({ module: 'cli', transports: [new JsonTransport(sink)] });

      jsonLogger.warn('slow tool', { toolId: 'web_search' });

      const parsed: unknown = JSON.parse(sink.lines[0]);
      expect(parsed).toMatchObject({ level: 'WARN', module: 'cli', message: 'slow tool' });
    });
  });

  describe('parseSeverity()', () => {
    it('should accept level names in any case', () => {
      expect(parseSeverity('debug')).toBe(Severity.DEBUG);
      expect(parseSeverity(' Warn ')).toBe(Severity.WARN);
    });

    it('should return null for unknown names', () => {
      expect(parseSeverity('verbose')).toBeNull();
    });
  });
});
