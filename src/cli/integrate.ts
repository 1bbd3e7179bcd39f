import { run } from '../core/integrator.js';
import { createVcsRunner } from '../core/vcs.js';
import { ConfigError, EXIT_CODES, describeError } from '../core/errors.js';
import { logger } from '../utils/logger.js';
import { resolveSettings } from './context.js';
import type { ConfigOptions } from './context.js';

interface IntegrateOptions extends ConfigOptions {
  dryRun?: boolean;
}

export async function integrateCommand(
  url: string | undefined,
  name: string | undefined,
  options: IntegrateOptions,
): Promise<void> {
  try {
    const { config, libsDir } = resolveSettings(options);
    const argv = [url, name].filter((arg): arg is string => arg !== undefined);
    process.exitCode = run(argv, {
      libsDir,
      frameworkName: config.frameworkName,
      runVcs: createVcsRunner(config.vcsCommand),
      logger,
      dryRun: options.dryRun,
    });
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error(err.message);
    } else {
      logger.error(`Unexpected failure: ${describeError(err)}`);
    }
    process.exitCode = EXIT_CODES.FAILURE;
  }
}
