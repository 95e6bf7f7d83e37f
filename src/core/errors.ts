/**
 * Shared error classes for the Connect client.
 *
 * Centralized here to avoid instanceof checks failing when
 * error classes are defined in multiple modules.
 *
 * Network operations do not throw these: they report them through result
 * records (`error` + `errorType`). Only configuration problems, a dc block
 * without its required fields, and upload failures are thrown.
 */

export type ConnectErrorKind =
  | "validation"
  | "already_submitted"
  | "authorization"
  | "remote"
  | "decode"
  | "not_found"
  | "invalid_verdict"
  | "cancelled"
  | "network";

export abstract class ConnectError extends Error {
  abstract readonly kind: ConnectErrorKind;
}

/** Local pre-flight failure; never sent over the network */
export class ValidationError extends ConnectError {
  readonly kind = "validation";

  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class AlreadySubmittedError extends ConnectError {
  readonly kind = "already_submitted";

  constructor() {
    super("You have already submitted this dataset. Set update=true to resubmit it");
    this.name = "AlreadySubmittedError";
  }
}

/** Still unauthorized after the single credential refresh, or logged out */
export class AuthorizationError extends ConnectError {
  readonly kind = "authorization";

  constructor(
    message: string,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = "AuthorizationError";
  }
}

/** Non-2xx response */
export class RemoteError extends ConnectError {
  readonly kind = "remote";

  constructor(
    message: string,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = "RemoteError";
  }
}

/** Response body could not be decoded, or did not have the expected shape */
export class DecodeError extends ConnectError {
  readonly kind = "decode";

  constructor(
    message: string,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = "DecodeError";
  }
}

export class NotFoundError extends ConnectError {
  readonly kind = "not_found";

  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class InvalidVerdictError extends ConnectError {
  readonly kind = "invalid_verdict";

  constructor(verdict: string, valid: readonly string[]) {
    super(`Verdict '${verdict}' is invalid. Valid verdicts are: ${valid.join(", ")}`);
    this.name = "InvalidVerdictError";
  }
}

export class CurationCancelledError extends ConnectError {
  readonly kind = "cancelled";

  constructor() {
    super("Curation cancelled");
    this.name = "CurationCancelledError";
  }
}

/** The transport rejected before a response was received */
export class NetworkError extends ConnectError {
  readonly kind = "network";

  constructor(message: string) {
    super(message);
    this.name = "NetworkError";
  }
}

// =============================================================================
// § Thrown errors
// =============================================================================

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class MissingRequiredFieldError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MissingRequiredFieldError";
  }
}

export class UploadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "UploadError";
  }
}
