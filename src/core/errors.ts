import type { IntegrationErrorKind } from '../types/integration.js';

export class IntegrationError extends Error {
  readonly kind: IntegrationErrorKind;

  constructor(kind: IntegrationErrorKind, message: string) {
    super(message);
    this.name = 'IntegrationError';
    this.kind = kind;
  }
}

export class ConfigError extends Error {
  constructor(configPath: string, message: string) {
    super(`Invalid config ${configPath}: ${message}`);
    this.name = 'ConfigError';
  }
}

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
} as const;

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
