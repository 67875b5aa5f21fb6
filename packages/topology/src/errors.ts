/**
 * Raised when resolution cannot produce a valid node/image mapping.
 * Fatal at the CLI boundary.
 */
export class ConfigurationError extends Error {
  readonly path?: string;
  readonly value?: unknown;

  constructor(message: string, options: { path?: string; value?: unknown } = {}) {
    super(message);
    this.name = 'ConfigurationError';
    this.path = options.path;
    this.value = options.value;
  }
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}
