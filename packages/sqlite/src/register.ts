import { registerConnector } from '@sqlgrid/core';
import BetterSqlite3 from 'better-sqlite3';

import { SQLiteConnection } from './connection/sqlite-connection';

import type { Connector } from '@sqlgrid/core';

/**
 * Opens the database file named by `database`, or an in-memory database
 * when none is given. `driverAttributes` are passed to better-sqlite3 as
 * its options.
 */
export const sqliteConnector: Connector = async (credentials) => {
  const options: BetterSqlite3.Options = {};
  Object.assign(options, credentials.driverAttributes);

  const db = new BetterSqlite3(credentials.database || ':memory:', options);
  return new SQLiteConnection(db);
};

// Auto-register the SQLite connector
registerConnector('Sqlite', sqliteConnector);
