import { ERROR_CODES } from '../constants';

import type { Binding } from '../types';

export class DatabaseError extends Error {
  constructor(message: string, public code?: string, public override cause?: Error) {
    super(message);
    this.name = 'DatabaseError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export interface ConnectionFailurePayload {
  error: string;
}

export class ConnectionError extends DatabaseError {
  constructor(message: string, public payload?: ConnectionFailurePayload, cause?: Error) {
    super(message, ERROR_CODES.CONNECTION, cause);
    this.name = 'ConnectionError';
  }
}

export class QueryError extends DatabaseError {
  constructor(
    message: string,
    public sql?: string,
    public bindings?: Binding[],
    cause?: Error,
  ) {
    super(message, ERROR_CODES.QUERY, cause);
    this.name = 'QueryError';
  }
}

export class UnsupportedCommandError extends DatabaseError {
  constructor(public command: string) {
    super(`Unknown database command or not supported: ${command}`, ERROR_CODES.UNSUPPORTED_COMMAND);
    this.name = 'UnsupportedCommandError';
  }
}

export class TransactionError extends DatabaseError {
  constructor(message: string, cause?: Error) {
    super(message, ERROR_CODES.TRANSACTION, cause);
    this.name = 'TransactionError';
  }
}

export class ValidationError extends DatabaseError {
  constructor(message: string, public field?: string, cause?: Error) {
    super(message, ERROR_CODES.VALIDATION, cause);
    this.name = 'ValidationError';
  }
}

export class CompoundKeyError extends DatabaseError {
  constructor(message: string) {
    super(message, ERROR_CODES.COMPOUND_KEY);
    this.name = 'CompoundKeyError';
  }
}

export class PropertyConflictError extends DatabaseError {
  constructor(public path: string) {
    super(
      `A property with the name \`${path}\` already exists. This ` +
        `can occur if you have properties which share a prefix - ` +
        `for example \`name\` and \`name.first\`.`,
      ERROR_CODES.PROPERTY_CONFLICT,
    );
    this.name = 'PropertyConflictError';
  }
}

export class DuplicatePropertyError extends DatabaseError {
  constructor(public path: string) {
    super(
      `Duplicate field detected - a field with the name \`${path}\` already exists.`,
      ERROR_CODES.DUPLICATE_PROPERTY,
    );
    this.name = 'DuplicatePropertyError';
  }
}

/**
 * Normalize anything thrown by a driver into an Error instance
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(typeof error === 'string' ? error : JSON.stringify(error));
}
