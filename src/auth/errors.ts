/**
 * Error taxonomy and result type for authentication operations
 */

export type AuthErrorKind =
  | "configuration_error"
  | "credential_format_error"
  | "signing_error"
  | "transport_error"
  | "unknown_strategy_error";

export interface AuthErrorOptions {
  cause?: unknown;
}

export abstract class AuthError extends Error {
  abstract readonly kind: AuthErrorKind;

  constructor(message: string, options: AuthErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
  }

  /**
   * Same error kind with a context prefix, keeping this error as the cause
   */
  abstract withPrefix(prefix: string): AuthError;
}

/**
 * Missing project id, location, API key or auth method
 */
export class ConfigurationError extends AuthError {
  readonly kind = "configuration_error";

  constructor(message: string, options?: AuthErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }

  withPrefix(prefix: string): ConfigurationError {
    return new ConfigurationError(`${prefix}${this.message}`, { cause: this });
  }
}

/**
 * Malformed JSON, missing service account fields, invalid JWT structure
 */
export class CredentialFormatError extends AuthError {
  readonly kind = "credential_format_error";

  constructor(message: string, options?: AuthErrorOptions) {
    super(message, options);
    this.name = "CredentialFormatError";
  }

  withPrefix(prefix: string): CredentialFormatError {
    return new CredentialFormatError(`${prefix}${this.message}`, { cause: this });
  }
}

export interface SigningErrorOptions extends AuthErrorOptions {
  statusCode?: number;
  body?: string;
}

/**
 * Bad private key, or a remote signing / token call answered with an error
 */
export class SigningError extends AuthError {
  readonly kind = "signing_error";
  readonly statusCode?: number;
  readonly body?: string;

  constructor(message: string, options: SigningErrorOptions = {}) {
    super(message, options);
    this.name = "SigningError";
    this.statusCode = options.statusCode;
    this.body = options.body;
  }

  withPrefix(prefix: string): SigningError {
    return new SigningError(`${prefix}${this.message}`, {
      cause: this,
      statusCode: this.statusCode,
      body: this.body,
    });
  }
}

/**
 * Network failure reaching a Google endpoint
 */
export class TransportError extends AuthError {
  readonly kind = "transport_error";

  constructor(message: string, options?: AuthErrorOptions) {
    super(message, options);
    this.name = "TransportError";
  }

  withPrefix(prefix: string): TransportError {
    return new TransportError(`${prefix}${this.message}`, { cause: this });
  }
}

export class UnknownStrategyError extends AuthError {
  readonly kind = "unknown_strategy_error";

  constructor(strategy: unknown, options?: AuthErrorOptions) {
    super(`Unknown authentication strategy: ${String(strategy)}`, options);
    this.name = "UnknownStrategyError";
  }

  withPrefix(prefix: string): UnknownStrategyError {
    const wrapped = new UnknownStrategyError("", { cause: this });
    wrapped.message = `${prefix}${this.message}`;
    return wrapped;
  }
}

/**
 * Result of a fallible authentication operation
 */
export type AuthResult<T> = { success: true; data: T } | { success: false; error: AuthError };

export function ok<T>(data: T): AuthResult<T> {
  return { success: true, data };
}

export function fail(error: AuthError): AuthResult<never> {
  return { success: false, error };
}

/**
 * Human-readable message from anything thrown by a library call
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
