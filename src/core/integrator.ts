import type { Logger } from '../utils/logger.js';
import { getLibraryPath } from '../utils/paths.js';
import type {
  IntegrationOutcome,
  IntegrationPlan,
  IntegrationRequest,
  VcsRunner,
} from '../types/integration.js';
import { EXIT_CODES, IntegrationError } from './errors.js';
import { ensureDir, pathExists } from './file-ops.js';
import { parseArguments } from './library-name.js';

export interface IntegrationContext {
  libsDir: string;
  frameworkName: string;
  runVcs: VcsRunner;
  logger: Logger;
  programName?: string;
  dryRun?: boolean;
}

export const NEXT_STEPS = [
  'Review the library structure',
  'Check for compatibility with {framework}',
  'Update library.properties if needed',
  'Test integration',
] as const;

export function planIntegration(request: IntegrationRequest, libsDir: string): IntegrationPlan {
  const destination = getLibraryPath(libsDir, request.libraryName);
  // Any existing entry counts as a previous checkout; it is not validated.
  const action = pathExists(destination) ? 'update' : 'clone';
  return { ...request, libsDir, destination, action };
}

export function printUsage(logger: Logger, programName: string): void {
  logger.info(`Usage: ${programName} <repository_url> [library_name]`);
  logger.info(`Example: ${programName} https://github.com/user/library.git MyLibrary`);
}

function printSummary(plan: IntegrationPlan, context: IntegrationContext): void {
  context.logger.ok('Library integrated successfully!');
  context.logger.info(`Location: ${plan.destination}`);
  context.logger.header('Next steps');
  NEXT_STEPS.forEach((step, index) => {
    context.logger.dim(`  ${index + 1}. ${step.replace('{framework}', context.frameworkName)}`);
  });
}

/**
 * Clones the library into the libs directory, or pulls it when the
 * destination already exists. A failed clone throws; a failed pull is
 * reported as a warning and the run carries on to the summary.
 */
export function integrateLibrary(
  request: IntegrationRequest,
  context: IntegrationContext,
): IntegrationOutcome {
  const { logger, runVcs } = context;
  const dryRun = context.dryRun ?? false;
  const plan = planIntegration(request, context.libsDir);

  logger.header(`Integrating library: ${plan.libraryName}`);
  logger.table([
    ['From', plan.sourceUrl],
    ['To', plan.destination],
  ]);

  if (dryRun) {
    logger.info(`Dry run: would ${plan.action} ${plan.destination}`);
    return { plan, dryRun };
  }

  ensureDir(plan.libsDir);

  let updateWarning: string | undefined;
  if (plan.action === 'update') {
    logger.info(`Directory ${plan.destination} already exists. Updating...`);
    const result = runVcs(['pull'], plan.destination);
    if (!result.success) {
      const failure = new IntegrationError('update', `Failed to update repository: ${result.message}`);
      logger.warn(failure.message);
      updateWarning = failure.message;
    }
  } else {
    logger.info('Cloning repository...');
    const result = runVcs(['clone', plan.sourceUrl, plan.destination]);
    if (!result.success) {
      throw new IntegrationError('clone', `Failed to clone repository: ${result.message}`);
    }
  }

  printSummary(plan, context);
  return { plan, updateWarning, dryRun };
}

export function run(argv: string[], context: IntegrationContext): number {
  const programName = context.programName ?? 'lib-integrator';
  try {
    integrateLibrary(parseArguments(argv), context);
    return EXIT_CODES.SUCCESS;
  } catch (err) {
    if (!(err instanceof IntegrationError)) throw err;
    if (err.kind === 'usage') {
      if (argv.length > 0) context.logger.error(err.message);
      printUsage(context.logger, programName);
    } else {
      context.logger.error(err.message);
    }
    return EXIT_CODES.FAILURE;
  }
}
