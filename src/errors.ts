/**
 * Raised when a configuration is malformed or its counts do not reconcile.
 * Always thrown before any artifact is rendered or written.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join("\n  - ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
