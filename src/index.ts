#!/usr/bin/env node
import { Command } from 'commander';
import { getPackageVersion } from './utils/version.js';
import { integrateCommand } from './cli/integrate.js';
import { listCommand } from './cli/list.js';

const program = new Command();

program
  .name('lib-integrator')
  .description('Clone or update an external library into the local libs directory')
  .version(getPackageVersion());

program
  .command('integrate', { isDefault: true })
  .description('Clone a library repository, or pull it if already present')
  .argument('[repository_url]', 'remote to clone (e.g. https://github.com/user/library.git)')
  .argument('[library_name]', 'local directory name (default: derived from the URL)')
  .option('--libs-dir <path>', 'library directory (default: libs/ beside the package)')
  .option('--framework <name>', 'framework named in the follow-up checklist')
  .option('--dry-run', 'show what would happen without cloning or pulling')
  .action(integrateCommand);

program
  .command('list')
  .description('List libraries in the library directory')
  .option('--libs-dir <path>', 'library directory (default: libs/ beside the package)')
  .action(listCommand);

await program.parseAsync();
