import { loadConfig, mergeConfig } from '../core/config.js';
import type { IntegratorConfig } from '../types/config.js';
import { getPackageRoot, resolveLibsDir } from '../utils/paths.js';

export interface ConfigOptions {
  libsDir?: string;
  framework?: string;
  /** Where package.json and the config file live; not a command-line flag */
  packageRoot?: string;
}

export interface ResolvedSettings {
  config: IntegratorConfig;
  libsDir: string;
}

export function resolveSettings(
  options: ConfigOptions,
  packageRoot: string = options.packageRoot ?? getPackageRoot(),
): ResolvedSettings {
  const config = mergeConfig(loadConfig(packageRoot), {
    libsDir: options.libsDir,
    frameworkName: options.framework,
  });
  return { config, libsDir: resolveLibsDir(packageRoot, config.libsDir) };
}
