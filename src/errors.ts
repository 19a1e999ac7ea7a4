/** Base class for every error the library raises itself. */
export class CitewiseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Unknown provider, missing API key, or an invalid config value. */
export class ConfigError extends CitewiseError {}

/** The remote model call failed: network, HTTP status, or malformed response. */
export class ProviderError extends CitewiseError {
  readonly provider: string;

  constructor(provider: string, message: string, options?: { cause?: unknown }) {
    super(`[${provider}] ${message}`, options);
    this.provider = provider;
  }
}

/** Input data is missing something an operation needs. */
export class DataError extends CitewiseError {}

export class MissingSourceError extends DataError {
  readonly index: number;

  constructor(index: number) {
    super(`Passage ${index} has no "source" in its metadata`);
    this.index = index;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
