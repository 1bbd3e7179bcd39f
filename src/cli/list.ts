import chalk from 'chalk';
import { listLibraries } from '../core/library-list.js';
import { ConfigError, EXIT_CODES } from '../core/errors.js';
import { pathExists } from '../core/file-ops.js';
import { logger } from '../utils/logger.js';
import { resolveSettings } from './context.js';
import type { ConfigOptions } from './context.js';

export async function listCommand(options: ConfigOptions): Promise<void> {
  let libsDir: string;
  try {
    ({ libsDir } = resolveSettings(options));
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    logger.error(err.message);
    process.exitCode = EXIT_CODES.FAILURE;
    return;
  }

  if (!pathExists(libsDir)) {
    logger.info(`No library directory yet: ${libsDir}`);
    return;
  }

  const libraries = listLibraries(libsDir);
  logger.header(`Libraries in ${libsDir}`);

  if (libraries.length === 0) {
    logger.info('No libraries integrated.');
    return;
  }

  for (const lib of libraries) {
    const mark = lib.isCheckout ? chalk.green('✓') : chalk.yellow('!');
    const version = lib.properties?.version ? chalk.dim(` v${lib.properties.version}`) : '';
    const note = lib.isCheckout ? '' : chalk.dim(' (no .git)');
    console.log(`  ${mark} ${chalk.bold(lib.name)}${version}${note}`);
  }

  console.log('');
  logger.info(`${libraries.length} ${libraries.length === 1 ? 'library' : 'libraries'}`);
}
