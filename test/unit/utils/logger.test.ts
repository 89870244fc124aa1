import { describe, it, expect, vi, afterEach } from 'vitest';
import { logger } from '../../../src/utils/logger.js';

describe('logger', () => {
  function captureStderr() {
    return vi.spyOn(console, 'error').mockImplementation(() => {});
  }

  afterEach(() => {
    logger.level = 'info';
    vi.restoreAllMocks();
  });

  it('drops debug output at the default level', () => {
    const errorSpy = captureStderr();
    logger.debug('hidden');
    logger.info('shown');

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith('shown');
  });

  it('prints debug output once the level is lowered', () => {
    const errorSpy = captureStderr();
    logger.level = 'debug';
    logger.debug('details');

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(String(errorSpy.mock.calls[0]?.[0])).toContain('[debug] details');
  });

  it('keeps only errors at the error level', () => {
    const errorSpy = captureStderr();
    logger.level = 'error';
    logger.info('a');
    logger.warn('b');
    logger.progress(1, 2, 'c');
    logger.error('d');

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(String(errorSpy.mock.calls[0]?.[0])).toContain('d');
  });

  it('pads the progress counter to the width of the total', () => {
    const errorSpy = captureStderr();
    logger.progress(7, 120, '#7 == -> !=: killed (12ms)');

    const line = String(errorSpy.mock.calls[0]?.[0]);
    expect(line).toContain('[  7/120]');
    expect(line.endsWith(' #7 == -> !=: killed (12ms)')).toBe(true);
  });
});
