export { SQLiteConnection } from './connection/sqlite-connection';
export { SQLitePreparedStatement } from './connection/sqlite-prepared-statement';
export { sqliteConnector } from './register';

// Re-export core types
export type { Credentials, DriverConnection, PreparedStatement, StatementOutcome } from '@sqlgrid/core';
