/**
 * sqlgrid - All-in-one package
 *
 * Includes the query engine and every bundled connector. Importing it
 * registers the MySQL, PostgreSQL and SQLite connectors:
 *
 * ```bash
 * npm install sqlgrid
 * ```
 *
 * Or install the engine with only the connectors you need:
 *
 * ```bash
 * npm install @sqlgrid/core @sqlgrid/mysql
 * npm install @sqlgrid/core @sqlgrid/postgresql
 * ```
 */

// Re-export everything from core
export * from '@sqlgrid/core';

// Re-export all connectors
export { MySQLConnection, mysqlConnector } from '@sqlgrid/mysql';
export { PostgreSQLConnection, postgresConnector, configurePgTypes } from '@sqlgrid/postgresql';
export { SQLiteConnection, sqliteConnector } from '@sqlgrid/sqlite';

// Convenience default export
import { Database } from '@sqlgrid/core';
export default Database;
