/**
 * Constants
 *
 * Centralized values shared by the query engine, the dialects and the
 * editor helpers.
 */

// ============ Connection Defaults ============

export const DEFAULT_PORTS = {
  Mysql: 3306,
  Postgres: 5432,
  Sqlite: null,
  Sqlserver: 1433,
  Oracle: 1521,
  Db2: 50_000,
  Firebird: 3050,
} as const;

export const PORT_RANGE = {
  MIN: 1,
  MAX: 65_535,
} as const;

// ============ Query Engine ============

export const QUERY_DEFAULTS = {
  /** Alias given to the aggregate of a count statement */
  COUNT_ALIAS: 'cnt',
  /** Column alias used by RETURNING clauses that report the new key */
  RETURNING_ALIAS: 'dt_pkey',
  /** Output bind receiving the new key on Oracle */
  PKEY_OUT_BIND: ':editor_pkey_value',
  /** Size of the Oracle output bind buffer */
  PKEY_OUT_LENGTH: 36,
} as const;

export const JOIN_TYPES = ['LEFT', 'RIGHT', 'INNER', 'OUTER', 'LEFT OUTER', 'RIGHT OUTER'] as const;

// ============ Editor ============

export const EDITOR_DEFAULTS = {
  /** Parent row counts below this restrict join lookups with an IN list */
  JOIN_BATCH_LIMIT: 1000,
  /** Alias of the parent key column in join lookups */
  JOIN_KEY_ALIAS: 'dteditor_pkey',
  /** Row identifier property sent to the client */
  ROW_ID: 'DT_RowId',
  /** Prefix of row identifiers, so they are valid DOM ids */
  ID_PREFIX: 'row_',
  /** Request key used by search panes for null selections */
  PANES_NULL: 'searchPanes_null',
} as const;

// ============ Logging ============

export const LOGGING_DEFAULTS = {
  PREFIX: '[sqlgrid]',
  MAX_SQL_LENGTH: 200,
  MAX_BINDINGS_LENGTH: 100,
} as const;

// ============ Error Codes ============

export const ERROR_CODES = {
  CONNECTION: 'CONNECTION_ERROR',
  QUERY: 'QUERY_ERROR',
  UNSUPPORTED_COMMAND: 'UNSUPPORTED_COMMAND',
  TRANSACTION: 'TRANSACTION_ERROR',
  VALIDATION: 'VALIDATION_ERROR',
  COMPOUND_KEY: 'COMPOUND_KEY_ERROR',
  PROPERTY_CONFLICT: 'PROPERTY_CONFLICT',
  DUPLICATE_PROPERTY: 'DUPLICATE_PROPERTY',
} as const;
