import { execFileSync } from 'node:child_process';
import type { VcsResult, VcsRunner } from '../types/integration.js';

export function describeVcsFailure(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const stderr = 'stderr' in err ? err.stderr : undefined;
  const detail = typeof stderr === 'string'
    ? stderr.trim()
    : Buffer.isBuffer(stderr) ? stderr.toString('utf-8').trim() : '';
  return detail || err.message;
}

/**
 * Runs the version-control client and waits for it to exit.
 * Output is never inspected on success; on failure the message is the
 * client's stderr, or the spawn error when the client could not start.
 */
export function runVcsCommand(command: string, args: string[], cwd?: string): VcsResult {
  const commandLine = [command, ...args].join(' ');
  try {
    execFileSync(command, args, { cwd, stdio: 'pipe', encoding: 'utf-8' });
    return { success: true, message: commandLine };
  } catch (err) {
    return { success: false, message: describeVcsFailure(err) };
  }
}

export function createVcsRunner(command: string): VcsRunner {
  return (args, cwd) => runVcsCommand(command, args, cwd);
}
