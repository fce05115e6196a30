/**
 * ConfigError
 *
 * Raised when environment settings fail validation. `issues` holds one
 * `KEY: message` line per failing variable.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
