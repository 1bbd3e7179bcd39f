import { join } from 'node:path';
import type { IntegratorConfig } from '../types/config.js';
import { CONFIG_FILENAME, DEFAULT_CONFIG, integratorConfigSchema } from '../types/config.js';
import { ConfigError, describeError } from './errors.js';
import { readFileContent } from './file-ops.js';

export function getConfigPath(packageRoot: string): string {
  return join(packageRoot, CONFIG_FILENAME);
}

/**
 * Reads the optional config file beside package.json.
 * A missing file yields the defaults; a malformed one throws ConfigError.
 */
export function loadConfig(packageRoot: string): IntegratorConfig {
  const configPath = getConfigPath(packageRoot);
  const content = readFileContent(configPath);
  if (content === null) return { ...DEFAULT_CONFIG };

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(configPath, describeError(err));
  }

  const result = integratorConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    throw new ConfigError(configPath, issues.join('; '));
  }
  return result.data;
}

export function mergeConfig(
  base: IntegratorConfig,
  overrides: Partial<IntegratorConfig>,
): IntegratorConfig {
  return {
    libsDir: overrides.libsDir ?? base.libsDir,
    vcsCommand: overrides.vcsCommand ?? base.vcsCommand,
    frameworkName: overrides.frameworkName ?? base.frameworkName,
  };
}
