/**
 * Error types for registry authentication.
 * @module errors
 */

/**
 * Error kinds for categorizing registry authentication errors.
 */
export enum RegistryAuthErrorKind {
  // Configuration errors
  InvalidConfiguration = 'invalid_configuration',
  InvalidReference = 'invalid_reference',
  ConfigLoadFailed = 'config_load_failed',
  ConfigInvalid = 'config_invalid',

  // Credential helper errors
  HelperNotFound = 'helper_not_found',
  HelperFailed = 'helper_failed',

  // Authentication errors
  CredentialsNotFound = 'credentials_not_found',
  TokenRefreshFailed = 'token_refresh_failed',

  // Generic
  Unknown = 'unknown',
}

/**
 * Base error class for registry authentication errors.
 */
export class RegistryAuthError extends Error {
  /** Error kind */
  public readonly kind: RegistryAuthErrorKind;
  /** Underlying cause */
  public override readonly cause?: Error;
  /** Additional details */
  public readonly details?: Record<string, unknown>;

  constructor(
    kind: RegistryAuthErrorKind,
    message: string,
    options?: {
      cause?: Error;
      details?: Record<string, unknown>;
    }
  ) {
    super(message);
    this.name = 'RegistryAuthError';
    this.kind = kind;
    this.cause = options?.cause;
    this.details = options?.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RegistryAuthError);
    }
  }

  /**
   * Returns true if this error is retryable.
   */
  isRetryable(): boolean {
    return [
      RegistryAuthErrorKind.TokenRefreshFailed,
      RegistryAuthErrorKind.HelperFailed,
    ].includes(this.kind);
  }

  // Convenience factory methods

  static configuration(message: string): RegistryAuthError {
    return new RegistryAuthError(
      RegistryAuthErrorKind.InvalidConfiguration,
      message
    );
  }

  static invalidReference(reference: string, reason: string): RegistryAuthError {
    return new RegistryAuthError(
      RegistryAuthErrorKind.InvalidReference,
      `Invalid image reference "${reference}": ${reason}`,
      { details: { reference } }
    );
  }

  static configLoadFailed(path: string, cause?: Error): RegistryAuthError {
    return new RegistryAuthError(
      RegistryAuthErrorKind.ConfigLoadFailed,
      `Failed to read credential config ${path}${cause ? `: ${cause.message}` : ''}`,
      { cause, details: { path } }
    );
  }

  static configInvalid(path: string, reason: string): RegistryAuthError {
    return new RegistryAuthError(
      RegistryAuthErrorKind.ConfigInvalid,
      `Invalid credential config ${path}: ${reason}`,
      { details: { path } }
    );
  }

  static helperNotFound(program: string, cause?: Error): RegistryAuthError {
    return new RegistryAuthError(
      RegistryAuthErrorKind.HelperNotFound,
      `Credential helper not found: ${program}`,
      { cause, details: { program } }
    );
  }

  static helperFailed(
    program: string,
    reason: string,
    cause?: Error
  ): RegistryAuthError {
    return new RegistryAuthError(
      RegistryAuthErrorKind.HelperFailed,
      `Credential helper ${program} failed: ${reason}`,
      { cause, details: { program } }
    );
  }

  static credentialsNotFound(message: string, cause?: Error): RegistryAuthError {
    return new RegistryAuthError(
      RegistryAuthErrorKind.CredentialsNotFound,
      message,
      { cause }
    );
  }

  /**
   * Formats the error for display.
   */
  override toString(): string {
    return `[${this.kind}] ${this.message}`;
  }
}

/**
 * Type guard for RegistryAuthError.
 */
export function isRegistryAuthError(
  error: unknown
): error is RegistryAuthError {
  return error instanceof RegistryAuthError;
}

/**
 * Checks if an error is an authentication error.
 */
export function isAuthError(error: RegistryAuthError): boolean {
  return [
    RegistryAuthErrorKind.CredentialsNotFound,
    RegistryAuthErrorKind.TokenRefreshFailed,
    RegistryAuthErrorKind.HelperNotFound,
    RegistryAuthErrorKind.HelperFailed,
  ].includes(error.kind);
}
