// Error taxonomy. Violations are data (see types.ts); only these two are thrown.

// A document could not be read or decoded. Captured per document, never aborts a run.
export class LoadError extends Error {
  readonly code = 'LOAD_ERROR';
  constructor(readonly documentId: string, message: string) {
    super(message);
    this.name = 'LoadError';
  }
}

// The policy configuration itself is unusable. Fatal before any document is evaluated.
export class ConfigurationError extends Error {
  readonly code = 'CONFIGURATION_ERROR';
  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length ? `${message}\n${issues.map(i => ` - ${i}`).join('\n')}` : message);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
