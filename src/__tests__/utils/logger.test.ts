// src/__tests__/utils/logger.test.ts

import { describe, it, expect, afterEach } from 'vitest';
import { Logger, LogLevel, parseLogLevel } from '../../utils/logger.js';

describe('parseLogLevel', () => {
  it('should parse level names case-insensitively', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel(' WARN ')).toBe(LogLevel.WARN);
    expect(parseLogLevel('Error')).toBe(LogLevel.ERROR);
  });

  it('should return undefined for missing or unknown names', () => {
    expect(parseLogLevel(undefined)).toBeUndefined();
    expect(parseLogLevel('')).toBeUndefined();
    expect(parseLogLevel('verbose')).toBeUndefined();
  });
});

describe('Logger', () => {
  afterEach(() => {
    Logger.setLevel(LogLevel.INFO);
  });

  it('should prefix each level', () => {
    Logger.setLevel(LogLevel.DEBUG);

    Logger.debug('d');
    Logger.info('i');
    Logger.warn('w');
    Logger.error('e');

    expect(console.debug).toHaveBeenCalledWith('[debug] d');
    expect(console.log).toHaveBeenCalledWith('[info] i');
    expect(console.warn).toHaveBeenCalledWith('[warn] w');
    expect(console.error).toHaveBeenCalledWith('[error] e');
  });

  it('should pass extra arguments through', () => {
    Logger.setLevel(LogLevel.INFO);

    Logger.info('loaded', 3);

    expect(console.log).toHaveBeenCalledWith('[info] loaded', 3);
  });

  it('should drop messages below the current level', () => {
    Logger.setLevel(LogLevel.WARN);

    Logger.debug('d');
    Logger.info('i');
    Logger.warn('w');

    expect(console.debug).not.toHaveBeenCalled();
    expect(console.log).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledWith('[warn] w');
  });

  it('should drop everything below error at the error level', () => {
    Logger.setLevel(LogLevel.ERROR);

    Logger.warn('w');
    Logger.error('e');

    expect(console.warn).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith('[error] e');
  });
});
