import { describe, it, expect } from 'vitest';
import { createVcsRunner, describeVcsFailure } from '../src/core/vcs.js';

describe('describeVcsFailure', () => {
  it('should prefer the trimmed stderr', () => {
    const err = Object.assign(new Error('Command failed: git pull'), { stderr: 'fatal: boom\n' });
    expect(describeVcsFailure(err)).toBe('fatal: boom');
  });

  it('should decode buffered stderr', () => {
    const err = Object.assign(new Error('Command failed'), { stderr: Buffer.from('denied\n') });
    expect(describeVcsFailure(err)).toBe('denied');
  });

  it('should fall back to the error message when stderr is empty', () => {
    const err = Object.assign(new Error('Command failed: git clone'), { stderr: '' });
    expect(describeVcsFailure(err)).toBe('Command failed: git clone');
  });

  it('should stringify non-errors', () => {
    expect(describeVcsFailure('timeout')).toBe('timeout');
  });
});

describe('createVcsRunner', () => {
  it('should report a client that cannot be started as a failure', () => {
    const runVcs = createVcsRunner('lib-integrator-missing-client');
    const result = runVcs(['pull']);
    expect(result.success).toBe(false);
    expect(result.message).toContain('ENOENT');
  });
});
