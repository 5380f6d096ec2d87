export class TrackerError extends Error {
  readonly exitCode: number = 1;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends TrackerError {}

export class MissingConfigurationError extends ConfigurationError {
  constructor(readonly missing: string[]) {
    super(`Missing required environment variables: ${missing.join(', ')}`);
  }
}

export class InvalidConfigurationError extends ConfigurationError {
  constructor(
    readonly variable: string,
    value: string,
    expected: string
  ) {
    super(`Invalid value for ${variable}: "${value}" (expected ${expected})`);
  }
}

/** Base class for everything that can go wrong while talking to GitHub. */
export class FetchError extends TrackerError {}

export class AuthenticationError extends FetchError {
  constructor(message = 'GitHub rejected the token (invalid or expired)', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class NetworkError extends FetchError {
  constructor(
    message: string,
    readonly retryable: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class FetchTimeoutError extends FetchError {
  constructor(readonly timeoutMs: number) {
    super(`GitHub request did not complete within ${timeoutMs}ms`);
  }
}

export class InvalidInputError extends TrackerError {}
