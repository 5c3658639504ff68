/**
 * Environ Digest — Errors
 *
 * Only configuration failures are thrown past their component.
 * Per-source and per-entry problems travel as values (see FetchOutcome).
 */

export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Source list or site metadata could not be loaded. Aborts the run.
 */
export class ConfigInvalidError extends Error {
  readonly configPath: string;
  readonly issues: ConfigIssue[];

  constructor(configPath: string, message: string, issues: ConfigIssue[] = []) {
    super(`Invalid configuration (${configPath}): ${message}`);
    this.name = 'ConfigInvalidError';
    this.configPath = configPath;
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
