/**
 * Error types raised while verifying a login and resolving its user.
 *
 * Every failure inside a provider's verification is turned into one of these
 * and reported through the login sink; none of them escape as a fault.
 */

/** The remote validator could not be reached or answered with something unusable. */
export class ValidatorTransportError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ValidatorTransportError";
  }
}

/** The remote validator rejected the presented credentials. */
export class VerificationRejectedError extends Error {
  constructor(message = "invalid OAuth credentials") {
    super(message);
    this.name = "VerificationRejectedError";
  }
}

/** The credentials were accepted but are not shaped as expected. */
export class MalformedCredentialError extends Error {
  constructor(message = "malformed authorization header") {
    super(message);
    this.name = "MalformedCredentialError";
  }
}

/** A verified external identity has no usable local user. */
export class UserResolutionError extends Error {
  public readonly externalId: string;

  constructor(externalId: string, cause: unknown) {
    super(`cannot get user details for "${externalId}"`, { cause });
    this.name = "UserResolutionError";
    this.externalId = externalId;
  }
}

export class UserNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UserNotFoundError";
  }
}

/** A login attempt was moved through its states out of order. */
export class LoginStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LoginStateError";
  }
}

/**
 * Render an unknown thrown value as a message, for logging.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
