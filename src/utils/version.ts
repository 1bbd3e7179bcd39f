import { readFileSync } from 'node:fs';
import { getPackageJsonPath } from './paths.js';

export function getPackageVersion(pkgPath: string = getPackageJsonPath()): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}
