/**
 * Application-level errors for HTTP layer mapping.
 * Stores and use cases throw these; errorHandler turns them into responses.
 */
export class InvalidInputError extends Error {
  constructor(message = 'Invalid input') {
    super(message);
    this.name = 'InvalidInputError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends Error {
  constructor(message = 'Resource not found') {
    super(message);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class AlreadyExistsError extends Error {
  constructor(message = 'Resource already exists') {
    super(message);
    this.name = 'AlreadyExistsError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Login failure. The message is fixed so that an unknown email and a wrong
 * password are indistinguishable to the caller.
 */
export class InvalidCredentialsError extends Error {
  constructor() {
    super('invalid credentials');
    this.name = 'InvalidCredentialsError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnauthenticatedError extends Error {
  constructor(message = 'Unauthenticated') {
    super(message);
    this.name = 'UnauthenticatedError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
