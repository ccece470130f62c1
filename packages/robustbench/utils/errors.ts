/**
 * Raised for invalid run configuration (unknown strategy names, malformed
 * tables, missing credentials). Always fatal: thrown before any request is sent.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
