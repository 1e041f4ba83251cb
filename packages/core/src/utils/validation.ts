import { PORT_RANGE } from '../constants';
import { ValidationError } from '../errors';

import type { Credentials } from '../types';

export function validateCredentials(credentials: Credentials): void {
  if (!credentials) {
    throw new ValidationError('Connection credentials are required');
  }

  if (!credentials.type || typeof credentials.type !== 'string') {
    throw new ValidationError('Database type is required', 'type');
  }

  if (credentials.port !== undefined && credentials.port !== '') {
    const port = Number(credentials.port);
    if (!Number.isInteger(port) || port < PORT_RANGE.MIN || port > PORT_RANGE.MAX) {
      throw new ValidationError(
        `Port must be a number between ${PORT_RANGE.MIN} and ${PORT_RANGE.MAX}`,
        'port',
      );
    }
  }

  if (
    credentials.extraDsnOptions !== undefined &&
    typeof credentials.extraDsnOptions !== 'string'
  ) {
    throw new ValidationError('Extra DSN options must be a string', 'extraDsnOptions');
  }
}

export function validateSQL(sql: string): void {
  if (!sql || typeof sql !== 'string') {
    throw new ValidationError('SQL query must be a non-empty string');
  }

  if (sql.trim().length === 0) {
    throw new ValidationError('SQL query cannot be empty');
  }
}

export function validateLimit(value: number, field: 'limit' | 'offset'): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${field} must be a non-negative integer`, field);
  }
}
