export { MySQLConnection } from './connection/mysql-connection';
export { MySQLPreparedStatement } from './connection/mysql-prepared-statement';
export { mysqlConnector } from './register';

// Re-export core types
export type { Credentials, DriverConnection, PreparedStatement, StatementOutcome } from '@sqlgrid/core';
