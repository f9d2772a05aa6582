/**
 * Error thrown when a CORS policy is internally inconsistent or malformed.
 * Raised while the policy is constructed, never while serving requests.
 */
export class CorsConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid CORS policy:\n${issues.map(issue => `  - ${issue}`).join('\n')}`);
    this.name = 'CorsConfigError';
    this.issues = issues;
  }
}
