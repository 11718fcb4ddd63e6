import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Logger } from '../Utils/logger.js';

describe('Logger', () => {
  let lines: string[];
  let sink: (line: string) => void;

  beforeEach(() => {
    lines = [];
    sink = (line) => lines.push(line);
  });

  describe('level filtering', () => {
    it('should log at or above the configured level', () => {
      const log = new Logger('test', sink);
      log.setLevel('warn');

      log.debug('skip');
      log.info('skip');
      log.warn('show');
      log.error('show');

      expect(lines).toHaveLength(2);
    });

    it('should only log errors at error level', () => {
      const log = new Logger('test', sink);
      log.setLevel('error');

      log.info('skip');
      log.warn('skip');
      log.error('show');

      expect(lines).toHaveLength(1);
    });
  });

  describe('output format', () => {
    it('should include timestamp, level, context, and message', () => {
      const log = new Logger('fusion:test', sink);
      log.setLevel('info');
      log.info('hello world');

      expect(lines[0]).toMatch(/^\[.+\] \[INFO\] \[fusion:test\] hello world$/);
    });

    it('should append JSON data when provided', () => {
      const log = new Logger('svc', sink);
      log.setLevel('info');
      log.info('with data', { key: 'value' });

      expect(lines[0]).toMatch(/ with data \{"key":"value"\}$/);
    });

    it('should serialize Error objects with code', () => {
      const log = new Logger('svc', sink);
      log.setLevel('error');
      log.error('file missing', Object.assign(new Error('fail'), { code: 'ENOENT' }));

      expect(lines[0]).toContain('"message":"fail"');
      expect(lines[0]).toContain('"code":"ENOENT"');
    });

    it('should serialize Map values as objects', () => {
      const log = new Logger('svc', sink);
      log.setLevel('info');
      log.info('counts', new Map([['py', 2]]));

      expect(lines[0]).toMatch(/ counts \{"py":2\}$/);
    });

    it('should write to console.error by default', () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const log = new Logger('test');
      log.setLevel('info');
      log.info('test message');

      expect(spy).toHaveBeenCalledOnce();
      spy.mockRestore();
    });
  });

  describe('child logger', () => {
    it('should create a child with compound context, level, and sink', () => {
      const parent = new Logger('parent', sink);
      parent.setLevel('warn');
      const child = parent.child('child');

      child.info('skip');
      child.warn('from child');

      expect(lines).toHaveLength(1);
      expect(lines[0]).toContain('[parent:child]');
    });
  });

  describe('level from environment', () => {
    const original = { fusion: process.env.FUSION_LOG_LEVEL, generic: process.env.LOG_LEVEL };

    afterEach(() => {
      for (const [key, value] of [
        ['FUSION_LOG_LEVEL', original.fusion],
        ['LOG_LEVEL', original.generic],
      ] as const) {
        if (value === undefined) delete process.env[key];
        else process.env[key] = value;
      }
    });

    it('should prefer FUSION_LOG_LEVEL over LOG_LEVEL', () => {
      process.env.FUSION_LOG_LEVEL = 'debug';
      process.env.LOG_LEVEL = 'error';
      expect(new Logger('test').getLevel()).toBe('debug');
    });

    it('should default to info for invalid values', () => {
      delete process.env.FUSION_LOG_LEVEL;
      process.env.LOG_LEVEL = 'loud';
      expect(new Logger('test').getLevel()).toBe('info');
    });
  });
});
