// tests/unit/Logger.test.ts

import { describe, it, expect, afterEach, vi } from 'vitest';
import * as path from 'path';
import { Logger } from '../../src/observability/Logger';
import { makeTempDir, removeDir } from '../helpers/fixtures';

describe('Logger', () => {
  const logger = new Logger({ level: 'debug', format: 'json', silent: true });

  it('should pass metadata through unchanged', () => {
    const info = vi.spyOn(logger['logger'], 'info');
    const meta = { project: 'DEMO', offset: 50, headers: { Accept: 'application/json' } };

    logger.info('Page processed', meta);

    expect(info).toHaveBeenCalledWith('Page processed', meta);
    info.mockRestore();
  });

  it('should log an empty object when no metadata is given', () => {
    const warn = vi.spyOn(logger['logger'], 'warn');

    logger.warn('Stop requested');

    expect(warn).toHaveBeenCalledWith('Stop requested', {});
    warn.mockRestore();
  });

  it('should not throw when logging', () => {
    expect(() => {
      logger.debug('Debug message', { key: 'value' });
      logger.info('Info message');
      logger.warn('Warn message', { key: 'value' });
      logger.error('Error message', { key: 'value' });
      logger.log('info', 'Leveled message');
    }).not.toThrow();
  });

  describe('file transport', () => {
    let dir: string;

    afterEach(() => {
      removeDir(dir);
    });

    it('should add a file transport when a log file is configured', async () => {
      dir = makeTempDir();
      const fileLogger = new Logger({ level: 'info', file: path.join(dir, 'scraper.log'), silent: true });

      expect(fileLogger['logger'].transports).toHaveLength(2);
      await fileLogger.close();
    });

    it('should log to the console only by default', async () => {
      dir = makeTempDir();
      const consoleLogger = new Logger({ silent: true });

      expect(consoleLogger['logger'].transports).toHaveLength(1);
      await consoleLogger.close();
    });
  });
});
