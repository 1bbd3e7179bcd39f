import { describe, it, expect } from 'vitest';
import { BufferLogger } from '../src/utils/logger.js';

describe('BufferLogger', () => {
  it('should prefix each level', () => {
    const logger = new BufferLogger();
    logger.info('a');
    logger.ok('b');
    logger.warn('c');
    logger.error('d');
    logger.dim('e');
    expect(logger.lines()).toEqual(['[INFO] a', '[OK] b', '[WARN] c', '[ERROR] d', 'e']);
  });

  it('should align table keys', () => {
    const logger = new BufferLogger();
    logger.table([
      ['Library', 'foo'],
      ['To', '/tmp/libs/foo'],
    ]);
    expect(logger.lines()).toEqual(['  Library  foo', '  To       /tmp/libs/foo']);
  });

  it('should empty the buffer on flush', () => {
    const logger = new BufferLogger();
    logger.header('Next');
    expect(logger.flush()).toBe('\n## Next\n──────');
    expect(logger.lines()).toEqual([]);
  });
});
