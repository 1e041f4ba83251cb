/**
 * Dialect Factory
 *
 * Resolves a database type (as written in credentials) to its dialect.
 * Type names are case-insensitive and accept the usual aliases.
 */

import { ValidationError } from '../errors';
import { Db2Dialect } from './db2-dialect';
import { FirebirdDialect } from './firebird-dialect';
import { MySQLDialect } from './mysql-dialect';
import { OracleDialect } from './oracle-dialect';
import { PostgreSQLDialect } from './postgresql-dialect';
import { SqlServerDialect } from './sqlserver-dialect';
import { SQLiteDialect } from './sqlite-dialect';

import type { DialectName } from '../types';
import type { SQLDialect } from './sql-dialect';

const ALIASES = new Map<string, DialectName>([
  ['mysql', 'Mysql'],
  ['mariadb', 'Mysql'],
  ['postgres', 'Postgres'],
  ['postgresql', 'Postgres'],
  ['pgsql', 'Postgres'],
  ['pg', 'Postgres'],
  ['sqlite', 'Sqlite'],
  ['sqlite3', 'Sqlite'],
  ['sqlserver', 'Sqlserver'],
  ['mssql', 'Sqlserver'],
  ['sqlsrv', 'Sqlserver'],
  ['oracle', 'Oracle'],
  ['oci', 'Oracle'],
  ['db2', 'Db2'],
  ['ibm', 'Db2'],
  ['firebird', 'Firebird'],
]);

const dialectCache = new Map<DialectName, SQLDialect>();

export class DialectFactory {
  /**
   * Get dialect for database type (cached)
   */
  static getDialect(type: string): SQLDialect {
    const name = this.normalizeType(type);

    const cached = dialectCache.get(name);
    if (cached) {
      return cached;
    }

    const dialect = this.createDialect(name);
    dialectCache.set(name, dialect);
    return dialect;
  }

  /**
   * Create new dialect instance (not cached)
   */
  static createDialect(type: string): SQLDialect {
    switch (this.normalizeType(type)) {
      case 'Mysql': {
        return new MySQLDialect();
      }
      case 'Postgres': {
        return new PostgreSQLDialect();
      }
      case 'Sqlite': {
        return new SQLiteDialect();
      }
      case 'Sqlserver': {
        return new SqlServerDialect();
      }
      case 'Oracle': {
        return new OracleDialect();
      }
      case 'Db2': {
        return new Db2Dialect();
      }
      case 'Firebird': {
        return new FirebirdDialect();
      }
    }
  }

  /**
   * Normalize database type aliases
   */
  static normalizeType(type: string): DialectName {
    const name = ALIASES.get(type.trim().toLowerCase());
    if (!name) {
      throw new ValidationError(`Unknown database type: ${type}`, 'type');
    }
    return name;
  }

  /**
   * Check if database type is supported
   */
  static isSupported(type: string): boolean {
    return ALIASES.has(type.trim().toLowerCase());
  }

  /**
   * Clear dialect cache (useful for testing)
   */
  static clearCache(): void {
    dialectCache.clear();
  }
}
