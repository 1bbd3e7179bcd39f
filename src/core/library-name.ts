import { IntegrationError } from './errors.js';
import type { IntegrationRequest } from '../types/integration.js';

const GIT_SUFFIX = '.git';

/**
 * Last path segment of a remote locator, minus a trailing `.git`.
 *   https://host/user/foo.git -> foo
 *   git@host:user/foo.git     -> foo
 *   https://host/user/bar/    -> bar
 */
export function deriveLibraryName(sourceUrl: string): string {
  const trimmed = sourceUrl.replace(/[\\/]+$/, '');
  const segments = trimmed.split(/[\\/:]/);
  const last = segments[segments.length - 1] ?? '';
  return last.endsWith(GIT_SUFFIX) ? last.slice(0, -GIT_SUFFIX.length) : last;
}

export function parseArguments(argv: string[]): IntegrationRequest {
  const [sourceUrl, explicitName] = argv;
  if (!sourceUrl) {
    throw new IntegrationError('usage', 'Missing repository URL');
  }

  const libraryName = explicitName || deriveLibraryName(sourceUrl);
  if (!libraryName) {
    throw new IntegrationError('usage', `Cannot derive a library name from "${sourceUrl}"`);
  }

  return { sourceUrl, libraryName };
}
