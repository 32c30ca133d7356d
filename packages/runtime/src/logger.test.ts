// Tests for loggers

import { describe, it, expect } from 'vitest';
import { createCapturingLogger, createLevelFilter } from './logger.js';

describe('createLevelFilter', () => {
  it('drops entries below the minimum level', () => {
    const capture = createCapturingLogger();
    const logger = createLevelFilter(capture, 'warn');

    logger.debug('d');
    logger.info('i');
    logger.warn('w', { key: 1 });
    logger.error('e');

    expect(capture.entries.map((entry) => [entry.level, entry.message])).toEqual([
      ['warn', 'w'],
      ['error', 'e'],
    ]);
    expect(capture.entries[0].data).toEqual({ key: 1 });
  });

  it('passes everything through at debug', () => {
    const capture = createCapturingLogger();
    const logger = createLevelFilter(capture, 'debug');
    logger.debug('d');
    logger.info('i');
    expect(capture.entries).toHaveLength(2);
  });
});
