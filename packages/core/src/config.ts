/**
 * Credentials loading from the environment.
 *
 * @example
 * ```typescript
 * // SQLGRID_TYPE=Postgres SQLGRID_HOST=db SQLGRID_DATABASE=crm
 * const credentials = credentialsFromEnv();
 * ```
 */

import type { Credentials } from './types';

export function credentialsFromEnv(
  prefix = 'SQLGRID_',
  env: NodeJS.ProcessEnv = process.env,
): Credentials {
  const read = (key: string): string | undefined => {
    const value = env[`${prefix}${key}`];
    return value === undefined || value === '' ? undefined : value;
  };

  const credentials: Credentials = { type: read('TYPE') ?? '' };
  const user = read('USER');
  const pass = read('PASS');
  const host = read('HOST');
  const port = read('PORT');
  const database = read('DATABASE');
  const dsn = read('DSN');

  if (user !== undefined) credentials.user = user;
  if (pass !== undefined) credentials.pass = pass;
  if (host !== undefined) credentials.host = host;
  if (port !== undefined) credentials.port = port;
  if (database !== undefined) credentials.database = database;
  if (dsn !== undefined) credentials.extraDsnOptions = dsn;

  return credentials;
}
