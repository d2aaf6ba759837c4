/**
 * Errors for @llm-dispatch/dispatch-config
 */

/**
 * Configuration values failed validation. `issues` lists every problem,
 * each prefixed with the variable it came from.
 */
export class ConfigValidationError extends Error {
  readonly code = 'CONFIG_VALIDATION_FAILED';
  readonly issues: string[];

  constructor(issues: string[], options?: { cause?: unknown }) {
    super(`Invalid dispatch configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`, options);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}
