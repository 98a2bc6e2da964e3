/*
Purpose: error types shared by the release engine, adapters, and CLI output.
Assumptions: UserFacingError instances are safe to display to end users.
Usage: throw new ConfigError("..."); throw new UserFacingError({ code, title, message, hint, next, cause }).
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export class BomsmithError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "BomsmithError";
  }
}

export class ConfigError extends BomsmithError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class FormatError extends BomsmithError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "FormatError";
  }
}

export class UnexpectedError extends BomsmithError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "UnexpectedError";
  }
}

export class GitError extends BomsmithError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "GitError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  format: "FORMAT_ERROR",
  git: "GIT_ERROR",
  repository: "REPOSITORY_ERROR",
  unexpected: "UNEXPECTED_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}
