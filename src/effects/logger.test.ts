import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { logger, printBanner } from './logger.js';

describe('logger', () => {
  it('should have basic pino logger methods', () => {
    expect(typeof logger.info).toBe('function');
    expect(typeof logger.child).toBe('function');
  });

  it('level can be changed at runtime', () => {
    const previous = logger.level;
    logger.level = 'debug';
    expect(logger.isLevelEnabled('debug')).toBe(true);
    logger.level = previous;
  });
});

describe('printBanner', () => {
  let writeSpy: MockInstance<typeof process.stdout.write>;

  beforeEach(() => {
    writeSpy = vi.spyOn(process.stdout, 'write').mockReturnValue(true);
  });

  afterEach(() => {
    writeSpy.mockRestore();
  });

  it('appends newline to each line', () => {
    printBanner(['line1', 'line2']);
    expect(writeSpy).toHaveBeenCalledTimes(2);
    expect(writeSpy).toHaveBeenNthCalledWith(1, 'line1\n');
    expect(writeSpy).toHaveBeenNthCalledWith(2, 'line2\n');
  });

  it('empty array does not call write', () => {
    printBanner([]);
    expect(writeSpy).not.toHaveBeenCalled();
  });
});
