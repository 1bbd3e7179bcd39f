import { basename, join } from 'node:path';
import type { LibraryEntry, LibraryProperties } from '../types/library.js';
import { listSubdirectories, pathExists, readFileContent } from './file-ops.js';

export const LIBRARY_PROPERTIES_FILE = 'library.properties';

/**
 * `key=value` lines; blank lines and `#` comments are skipped.
 * Later keys overwrite earlier ones.
 */
export function parseLibraryProperties(content: string): LibraryProperties {
  const properties: LibraryProperties = {};
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;
    const eq = line.indexOf('=');
    if (eq <= 0) continue;
    properties[line.slice(0, eq).trim()] = line.slice(eq + 1).trim();
  }
  return properties;
}

export function readLibrary(libraryPath: string): LibraryEntry {
  const content = readFileContent(join(libraryPath, LIBRARY_PROPERTIES_FILE));
  return {
    name: basename(libraryPath),
    path: libraryPath,
    isCheckout: pathExists(join(libraryPath, '.git')),
    properties: content === null ? null : parseLibraryProperties(content),
  };
}

export function listLibraries(libsDir: string): LibraryEntry[] {
  return listSubdirectories(libsDir)
    .map(readLibrary)
    .sort((a, b) => a.name.localeCompare(b.name));
}
