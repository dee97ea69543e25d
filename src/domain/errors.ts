export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A value that breaks a field constraint (e.g. a title that is too long).
 */
export class ValidationError extends DomainError {
  constructor(
    public readonly field: string,
    message: string
  ) {
    super(message);
  }
}

/**
 * A query argument outside its accepted set (unknown sort key, limit out of range).
 */
export class InvalidArgumentError extends DomainError {
  constructor(
    public readonly field: string,
    message: string
  ) {
    super(message);
  }
}
