export { PostgreSQLConnection } from './connection/postgresql-connection';
export { PostgreSQLPreparedStatement } from './connection/postgresql-prepared-statement';
export { postgresConnector, configurePgTypes } from './register';

// Re-export core types
export type { Credentials, DriverConnection, PreparedStatement, StatementOutcome } from '@sqlgrid/core';
