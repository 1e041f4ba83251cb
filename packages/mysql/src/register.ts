import { DEFAULT_PORTS, registerConnector } from '@sqlgrid/core';
import * as mysql from 'mysql2/promise';

import { MySQLConnection } from './connection/mysql-connection';

import type { Connector } from '@sqlgrid/core';

/**
 * Opens one mysql2 connection from the credentials. `driverAttributes`
 * are passed to mysql2 as connection options.
 */
export const mysqlConnector: Connector = async (credentials) => {
  const options: mysql.ConnectionOptions = {
    host: credentials.host ?? 'localhost',
    port: Number(credentials.port ?? DEFAULT_PORTS.Mysql),
    user: credentials.user,
    password: credentials.pass,
    database: credentials.database,
    charset: 'utf8mb4',
  };
  Object.assign(options, credentials.driverAttributes);

  const connection = await mysql.createConnection(options);
  return new MySQLConnection(connection);
};

// Auto-register the MySQL connector
registerConnector('Mysql', mysqlConnector);
