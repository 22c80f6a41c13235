export class DeckhandError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "DeckhandError";
  }
}

export class ConfigError extends DeckhandError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class DefinitionError extends DeckhandError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "DefinitionError";
  }
}

export class ResolutionError extends DeckhandError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ResolutionError";
  }
}

export class SubmissionError extends DeckhandError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "SubmissionError";
  }
}

export class WaitError extends DeckhandError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "WaitError";
  }
}

export class WaitTimeoutError extends WaitError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "WaitTimeoutError";
  }
}

export class TaskStoppedError extends WaitError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "TaskStoppedError";
  }
}

export class TaskStatusError extends DeckhandError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "TaskStatusError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  definition: "DEFINITION_ERROR",
  resolution: "RESOLUTION_ERROR",
  submission: "SUBMISSION_ERROR",
  wait: "WAIT_ERROR",
  task: "TASK_ERROR",
  unknown: "UNKNOWN_ERROR",
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

export class UserFacingError extends DeckhandError {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;

  constructor(input: UserFacingErrorInput) {
    super(input.message, input.cause);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
  }
}

// =============================================================================
// CONTEXT WRAPPING
// =============================================================================

type DeckhandErrorClass = new (message: string, cause?: unknown) => DeckhandError;

// Most specific first.
const PRESERVED_ERROR_CLASSES: DeckhandErrorClass[] = [
  WaitTimeoutError,
  TaskStoppedError,
  WaitError,
  TaskStatusError,
  SubmissionError,
  ResolutionError,
  DefinitionError,
  ConfigError,
];

/**
 * Prefix an error with the phase that failed, keeping the original as `cause`.
 * Known error classes survive the wrap; anything else becomes `fallback`.
 */
export function wrapError(
  error: unknown,
  context: string,
  fallback: DeckhandErrorClass,
): DeckhandError {
  const detail = error instanceof Error ? error.message : String(error);
  const message = `${context}: ${detail}`;

  const preserved = PRESERVED_ERROR_CLASSES.find((errorClass) => error instanceof errorClass);
  const errorClass = preserved ?? fallback;
  return new errorClass(message, error);
}
