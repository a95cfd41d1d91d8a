/*
Purpose: core error types used across the containerization pipeline and CLI output.
Assumptions: UserFacingError instances are safe to display to end users.
Usage: throw new SourceError("...", { kind: "clone" }); throw new UserFacingError({ code, title, message, hint, next, cause }).
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export class AutocontainError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "AutocontainError";
  }
}

export class ConfigError extends AutocontainError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export type SourceErrorKind = "extraction" | "clone";

export class SourceError extends AutocontainError {
  public readonly kind: SourceErrorKind;

  constructor(message: string, opts: { kind: SourceErrorKind; cause?: unknown }) {
    super(message, opts.cause);
    this.name = "SourceError";
    this.kind = opts.kind;
  }
}

export class DraftingError extends AutocontainError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "DraftingError";
  }
}

export class DockerError extends AutocontainError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "DockerError";
  }
}

// The engine itself is unavailable; nothing the recipe did caused it.
export class InfrastructureError extends DockerError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "InfrastructureError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  source: "SOURCE_ERROR",
  llm: "LLM_ERROR",
  docker: "DOCKER_ERROR",
  recipe: "RECIPE_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  // Verbatim diagnostic output (already truncated), printed after the hint.
  detail?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;
  public readonly detail?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.detail = input.detail;
    this.cause = input.cause;
  }
}
