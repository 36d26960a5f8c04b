/**
 * Error taxonomy. `statusCode` is read by the HTTP error handler; `code` is the
 * machine-readable `error` field of the JSON body.
 */
export class ServiceError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(message: string, statusCode: number, code: string) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
  }
}

/** Rules or stored preferences name a category/sensitivity the engine does not know. */
export class InvalidConfigurationError extends ServiceError {
  constructor(message: string) {
    super(message, 500, "invalid_configuration");
  }
}

export class InvalidPayloadError extends ServiceError {
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message, 400, "invalid_request");
    this.details = details;
  }
}

export class UnknownUserError extends ServiceError {
  constructor(userId: number | string) {
    super(`User not found: ${userId}`, 404, "unknown_user");
  }
}

export class UsernameTakenError extends ServiceError {
  constructor(username: string) {
    super(`Username already exists: ${username}`, 409, "username_taken");
  }
}
