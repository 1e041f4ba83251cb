/**
 * A value that can be bound to a placeholder or read back from a driver.
 */
export type Scalar = string | number | bigint | boolean | Date | Buffer | null;

/**
 * A flat associative row as returned by the driver.
 */
export type Row = Record<string, unknown>;

export type DialectName =
  | 'Mysql'
  | 'Postgres'
  | 'Sqlite'
  | 'Sqlserver'
  | 'Oracle'
  | 'Db2'
  | 'Firebird';

/**
 * Type hint passed through to the driver's bind call.
 */
export type ParameterType = 'string' | 'int' | 'bool' | 'null' | 'lob';

/**
 * Database credentials, consumed once when the connection is built.
 * @example
 * ```typescript
 * const credentials: Credentials = {
 *   type: 'Mysql',
 *   user: 'app',
 *   pass: 'test-secret',
 *   host: 'localhost',
 *   port: 3306,
 *   database: 'crm',
 * };
 * ```
 */
export interface Credentials {
  type: DialectName | string;
  user?: string;
  pass?: string;
  host?: string;
  port?: number | string;
  database?: string;
  /** Appended to the generated connection string */
  extraDsnOptions?: string;
  /** Passed untouched to the driver when it opens the connection */
  driverAttributes?: Record<string, unknown>;
}

export interface Binding {
  /** Sanitized placeholder including the leading colon */
  name: string;
  value: Scalar;
  type?: ParameterType;
}

export interface CompiledStatement {
  sql: string;
  bindings: Binding[];
}

export interface DebugInfo {
  query: string;
  bindings: Binding[];
}

export type DebugSink = (info: DebugInfo) => void;

export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

export interface DatabaseOptions {
  /**
   * `true` logs to the console with the library prefix
   */
  logger?: Logger | boolean;
  debug?: DebugSink;
  /**
   * Exit the process with a JSON error payload when the connection cannot be
   * opened. Defaults to true.
   */
  abortOnConnectionFailure?: boolean;
}

export interface ConnectOptions extends DatabaseOptions {
  credentials: Credentials;
}

export interface QueryEvent {
  sql: string;
  bindings: Binding[];
  duration: number;
}

export interface QueryErrorEvent {
  sql: string;
  bindings: Binding[];
  error: Error;
}
