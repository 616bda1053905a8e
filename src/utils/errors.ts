/**
 * Raised when a username is requested for a user whose first name is empty.
 */
export class FirstNameNotSetError extends Error {
  constructor(message = "First name is not set") {
    super(message);
    this.name = "FirstNameNotSetError";
  }
}

/**
 * A form error tied to one field, answered like a failed schema validation.
 */
export class FieldError extends Error {
  constructor(readonly field: string, message: string) {
    super(message);
    this.name = "FieldError";
  }
}
