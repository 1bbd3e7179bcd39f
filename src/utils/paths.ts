import { resolve, join, isAbsolute } from 'node:path';
import { fileURLToPath } from 'node:url';
import { dirname } from 'node:path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DEFAULT_LIBS_DIRNAME = 'libs';

export function getPackageRoot(): string {
  // two levels up from src/utils/ or dist/utils/
  return resolve(__dirname, '..', '..');
}

export function getPackageJsonPath(): string {
  return join(getPackageRoot(), 'package.json');
}

export function resolveLibsDir(packageRoot: string, libsDir: string = DEFAULT_LIBS_DIRNAME): string {
  return isAbsolute(libsDir) ? libsDir : resolve(packageRoot, libsDir);
}

export function getLibraryPath(libsDir: string, libraryName: string): string {
  return join(libsDir, libraryName);
}
