/**
 * Error taxonomy shared by the stores, the engine and the front ends.
 *
 * Every error carries a stable `code` so callers can branch without
 * matching on messages.
 */

export type ErrorCode =
  | "ALREADY_EXISTS"
  | "INVALID_CREDENTIALS"
  | "INVALID_INPUT"
  | "NOT_FOUND"
  | "CONFIG_ERROR";

export class BmiTrackerError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Registration with a username that is already taken */
export class AlreadyExistsError extends BmiTrackerError {
  constructor(username: string, options?: { cause?: unknown }) {
    super("ALREADY_EXISTS", `Username '${username}' already exists`, options);
  }
}

/** Unknown username or wrong password; the two are not told apart */
export class InvalidCredentialsError extends BmiTrackerError {
  constructor() {
    super("INVALID_CREDENTIALS", "Invalid username or password");
  }
}

export class InvalidInputError extends BmiTrackerError {
  constructor(message: string) {
    super("INVALID_INPUT", message);
  }
}

export class NotFoundError extends BmiTrackerError {
  constructor(message: string) {
    super("NOT_FOUND", message);
  }
}

export class ConfigError extends BmiTrackerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_ERROR", message, options);
  }
}

export function isBmiTrackerError(err: unknown): err is BmiTrackerError {
  return err instanceof BmiTrackerError;
}
