export { SQLDialect } from './sql-dialect';
export type { DialectConfig } from './sql-dialect';
export { MySQLDialect } from './mysql-dialect';
export { PostgreSQLDialect, lookupPostgresPrimaryKey } from './postgresql-dialect';
export { SQLiteDialect } from './sqlite-dialect';
export { SqlServerDialect } from './sqlserver-dialect';
export { OracleDialect, ORACLE_SESSION_SETTINGS } from './oracle-dialect';
export { Db2Dialect } from './db2-dialect';
export { FirebirdDialect } from './firebird-dialect';
export { DialectFactory } from './dialect-factory';
export { LimitOffsetStrategy, OffsetFetchStrategy, RownumWrapStrategy } from './limit-strategy';
export type { LimitStrategy, LimitWindow } from './limit-strategy';
export { LastInsertIdStrategy, ReturningStrategy, OutBindStrategy } from './key-return-strategy';
export type {
  KeyReturnStrategy,
  InsertPlan,
  InsertTarget,
  OutputBinding,
  PrimaryKeyLookup,
  ReturningOptions,
  StatementRunner,
} from './key-return-strategy';
