/**
 * Base class of every error thrown by the model and relation layers.
 *
 * Sets the error `name` from the concrete class and keeps the stack trace
 * starting at the place the error was thrown (V8 only).
 */
export abstract class DatabaseError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = new.target.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}
