export type IntegrationErrorKind = 'usage' | 'clone' | 'update';

export type IntegrationAction = 'clone' | 'update';

export interface IntegrationRequest {
  sourceUrl: string;
  libraryName: string;
}

export interface IntegrationPlan extends IntegrationRequest {
  libsDir: string;
  destination: string;
  action: IntegrationAction;
}

export interface IntegrationOutcome {
  plan: IntegrationPlan;
  /** Set when the update branch ran and the pull failed */
  updateWarning?: string;
  dryRun: boolean;
}

export interface VcsResult {
  success: boolean;
  message: string;
}

export type VcsRunner = (args: string[], cwd?: string) => VcsResult;
