/**
 * Application-level errors, mapped to HTTP responses by errorHandler.
 */
export class NotFoundError extends Error {
  constructor(message = 'Note not found') {
    super(message);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised for every authentication failure. The message is the same whatever
 * the cause so nothing about tokens or accounts leaks to the client.
 */
export class UnauthorizedError extends Error {
  constructor(message = 'Could not validate credentials') {
    super(message);
    this.name = 'UnauthorizedError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConflictError extends Error {
  constructor(message = 'Conflict') {
    super(message);
    this.name = 'ConflictError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
