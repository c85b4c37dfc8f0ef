/**
 * Tests for the logger.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('chalk', () => ({
  default: {
    gray: (s: string) => s,
    blue: (s: string) => s,
    yellow: (s: string) => s,
    red: (s: string) => s,
    green: (s: string) => s,
  },
}));

import { Logger, logger } from '../../../src/utils/logger.js';

describe('Logger', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let warnSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    logger.setLevel('info');
  });

  describe('levels', () => {
    it('suppresses debug at the default level', () => {
      const log = new Logger();

      log.debug('hidden');

      expect(logSpy).not.toHaveBeenCalled();
    });

    it('prints debug when enabled', () => {
      const log = new Logger();
      log.setLevel('debug');

      log.debug('shown');

      expect(logSpy).toHaveBeenCalledWith('[DEBUG] shown');
    });

    it('routes warnings to console.warn', () => {
      new Logger().warn('careful');

      expect(warnSpy).toHaveBeenCalledWith('[WARN] careful');
    });

    it('prints nothing when silent', () => {
      const log = new Logger();
      log.setLevel('silent');

      log.info('a');
      log.warn('b');
      log.error('c');
      log.success('d');

      expect(logSpy).not.toHaveBeenCalled();
      expect(warnSpy).not.toHaveBeenCalled();
      expect(errorSpy).not.toHaveBeenCalled();
    });
  });

  describe('data', () => {
    it('prints attached data as indented JSON', () => {
      new Logger().info('loaded', { count: 2 });

      expect(logSpy).toHaveBeenNthCalledWith(1, '[INFO] loaded');
      expect(logSpy).toHaveBeenNthCalledWith(2, '{\n  "count": 2\n}');
    });

    it('prints the stack of an Error', () => {
      const error = new Error('broken');

      new Logger().error('failed', error);

      expect(errorSpy).toHaveBeenNthCalledWith(1, '[ERROR] failed');
      expect(errorSpy).toHaveBeenNthCalledWith(2, error.stack);
    });
  });

  describe('prefixes', () => {
    it('prefixes child messages', () => {
      new Logger().child('check').info('start');

      expect(logSpy).toHaveBeenCalledWith('[INFO] [check] start');
    });

    it('nests child prefixes and inherits the level', () => {
      const parent = new Logger();
      parent.setLevel('warn');

      const child = parent.child('cli').child('verify');
      child.info('hidden');
      child.warn('mismatch');

      expect(logSpy).not.toHaveBeenCalled();
      expect(warnSpy).toHaveBeenCalledWith('[WARN] [cli:verify] mismatch');
    });
  });

  it('marks success lines', () => {
    new Logger().success('done');

    expect(logSpy).toHaveBeenCalledWith('✓ done');
  });
});
