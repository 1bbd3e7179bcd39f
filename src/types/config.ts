import { z } from 'zod';
import { DEFAULT_LIBS_DIRNAME } from '../utils/paths.js';

export const CONFIG_FILENAME = 'lib-integrator.config.json';

export const integratorConfigSchema = z
  .object({
    libsDir: z.string().min(1).default(DEFAULT_LIBS_DIRNAME),
    vcsCommand: z.string().min(1).default('git'),
    frameworkName: z.string().min(1).default('the target framework'),
  })
  .strict();

export type IntegratorConfig = z.infer<typeof integratorConfigSchema>;

export const DEFAULT_CONFIG: IntegratorConfig = integratorConfigSchema.parse({});
