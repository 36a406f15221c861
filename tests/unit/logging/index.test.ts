/**
 * Tests for the structured logging API.
 */

import type { DestinationStream } from 'pino';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  createLogger,
  createRootLogger,
  errorMessage,
  getRootLogger,
  logError,
  logInfo,
  logTrace,
  setLogLevel,
  setRootLogger,
} from '../../../src/logging/index.js';

interface CapturedLine {
  [key: string]: unknown;
}

function captureSink(): { sink: DestinationStream; lines: CapturedLine[] } {
  const lines: CapturedLine[] = [];
  return {
    lines,
    sink: {
      write(message: string) {
        lines.push(JSON.parse(message));
      },
    },
  };
}

describe('Logging API', () => {
  let lines: CapturedLine[];

  beforeEach(() => {
    const capture = captureSink();
    lines = capture.lines;
    setRootLogger(createRootLogger({ level: 'debug', name: 'test' }, capture.sink));
  });

  afterEach(() => {
    setRootLogger(createRootLogger({ level: 'silent' }));
  });

  describe('root logger', () => {
    it('returns the logger installed with setRootLogger', () => {
      const logger = createRootLogger({ level: 'warn' }, captureSink().sink);
      setRootLogger(logger);
      expect(getRootLogger()).toBe(logger);
    });

    it('writes the logger name and pid on every line', () => {
      logInfo('hello');
      expect(lines).toHaveLength(1);
      expect(lines[0]?.name).toBe('test');
      expect(lines[0]?.pid).toBe(process.pid);
      expect(lines[0]?.msg).toBe('hello');
    });
  });

  describe('level functions', () => {
    it('writes pino numeric levels', () => {
      logError('failed');
      logInfo('started');
      expect(lines.map((line) => line.level)).toEqual([50, 30]);
    });

    it('drops messages below the configured level', () => {
      logTrace('noise');
      expect(lines).toHaveLength(0);
    });

    it('honours setLogLevel', () => {
      setLogLevel('error');
      logInfo('hidden');
      logError('shown');
      expect(lines.map((line) => line.msg)).toEqual(['shown']);
    });

    it('omits undefined fields', () => {
      logInfo('with fields', { operation: 'bind', port: 8080, host: undefined });
      expect(lines[0]?.operation).toBe('bind');
      expect(lines[0]?.port).toBe(8080);
      expect(lines[0]).not.toHaveProperty('host');
    });
  });

  describe('createLogger', () => {
    it('merges preset fields into every message', () => {
      const logger = createLogger({ component: 'worker', worker_id: 'worker-1' });
      logger.warn('slow request', { duration_ms: 1200 });

      expect(lines[0]).toMatchObject({
        level: 40,
        msg: 'slow request',
        component: 'worker',
        worker_id: 'worker-1',
        duration_ms: 1200,
      });
    });

    it('lets per-call fields override presets', () => {
      const logger = createLogger({ component: 'worker', operation: 'run' });
      logger.info('draining', { operation: 'drain' });
      expect(lines[0]?.operation).toBe('drain');
    });
  });

  describe('errorMessage', () => {
    it('uses the message of an Error', () => {
      expect(errorMessage(new Error('boom'))).toBe('boom');
    });

    it('stringifies other values', () => {
      expect(errorMessage('plain')).toBe('plain');
      expect(errorMessage(42)).toBe('42');
    });
  });
});
