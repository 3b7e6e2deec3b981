/**
 * Application-level errors for HTTP layer mapping.
 * These extend Error and are used for consistent error handling.
 */
export class NotFoundError extends Error {
  constructor(message = 'Resource not found') {
    super(message);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnauthorizedError extends Error {
  constructor(message = 'Please log in to access this page.') {
    super(message);
    this.name = 'UnauthorizedError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidCredentialsError extends Error {
  constructor(message = 'Invalid username or password') {
    super(message);
    this.name = 'InvalidCredentialsError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ForbiddenError extends Error {
  constructor(message = 'Admin access required!') {
    super(message);
    this.name = 'ForbiddenError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DuplicateUsernameError extends Error {
  constructor(public readonly username: string) {
    super('Username already exists!');
    this.name = 'DuplicateUsernameError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ProtectedResourceError extends Error {
  constructor(message = 'Cannot delete primary admin!') {
    super(message);
    this.name = 'ProtectedResourceError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The bill row was stored but its document could not be produced.
 */
export class BillGenerationError extends Error {
  constructor(cause: unknown) {
    super(`Error generating bill: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'BillGenerationError';
    this.cause = cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
