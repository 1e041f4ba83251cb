import { DEFAULT_PORTS, registerConnector } from '@sqlgrid/core';
import { Client, types } from 'pg';

import { PostgreSQLConnection } from './connection/postgresql-connection';

import type { Connector } from '@sqlgrid/core';
import type { ClientConfig } from 'pg';

/**
 * Parse 64-bit integers (COUNT(*) among them) and numerics to numbers when
 * they fit, instead of pg's default strings
 */
export function configurePgTypes(): void {
  types.setTypeParser(types.builtins.INT8, (val: string) => {
    const num = parseInt(val, 10);
    return Number.isSafeInteger(num) ? num : val;
  });

  types.setTypeParser(types.builtins.FLOAT4, (val: string) => parseFloat(val));
  types.setTypeParser(types.builtins.FLOAT8, (val: string) => parseFloat(val));
  types.setTypeParser(types.builtins.NUMERIC, (val: string) => parseFloat(val));
}

/**
 * Opens one pg client from the credentials. `driverAttributes` are passed
 * to pg as client options.
 */
export const postgresConnector: Connector = async (credentials) => {
  const config: ClientConfig = {
    host: credentials.host ?? 'localhost',
    port: Number(credentials.port ?? DEFAULT_PORTS.Postgres),
    user: credentials.user,
    password: credentials.pass,
    database: credentials.database,
  };
  Object.assign(config, credentials.driverAttributes);

  const client = new Client(config);
  await client.connect();
  return new PostgreSQLConnection(client);
};

// Auto-register the PostgreSQL connector
configurePgTypes();
registerConnector('Postgres', postgresConnector);
