/** Structured context attached to an error and surfaced as `errorDetails`. */
export type ErrorDetails = Record<string, unknown>;

/**
 * Root of the service's error hierarchy.
 *
 * `code` is the stable identifier tool responses expose as `errorCode`;
 * `name` follows the concrete class, so subclasses only pick a code.
 */
export class BaseError extends Error {
  readonly code: string;
  readonly details?: ErrorDetails;

  constructor(message: string, code: string, details?: ErrorDetails) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    if (details !== undefined) this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Bad environment, missing runtime or unreadable catalog. Fatal at startup. */
export class ConfigurationError extends BaseError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'CONFIGURATION_ERROR', details);
  }
}

/** A command name, payload or command line that does not fit its schema. */
export class ValidationError extends BaseError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'VALIDATION_ERROR', details);
  }
}
