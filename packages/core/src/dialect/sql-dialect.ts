/**
 * SQL Dialect Base Class
 *
 * Everything the query builder needs to know about one engine: quoting,
 * field aliases, LIMIT/OFFSET rendering, how an insert reports its key,
 * connection strings and transaction verbs. The builder never branches on
 * the dialect name; engine differences live in the subclasses.
 */

import { IdentifierQuoter } from '../query/identifier-quoter';

import type { DriverConnection } from '../driver/driver-connection';
import type { ConditionDialect } from '../query/condition-tree';
import type { QuotePair } from '../query/identifier-quoter';
import type { Credentials, DialectName } from '../types';
import type { KeyReturnStrategy } from './key-return-strategy';
import type { LimitStrategy } from './limit-strategy';

export interface DialectConfig {
  /** Characters wrapped around identifiers, null when the engine takes them bare */
  identifierQuote: QuotePair | null;
  /** Character wrapped around display aliases of selected fields */
  fieldQuote: string;
  /** Whether a column alias is written `col as alias` rather than `col alias` */
  supportsAsAlias: boolean;
  defaultPort: number | null;
}

export abstract class SQLDialect implements ConditionDialect {
  abstract readonly name: DialectName;
  abstract readonly config: DialectConfig;
  abstract readonly limitStrategy: LimitStrategy;
  abstract readonly keyReturn: KeyReturnStrategy;

  private quoter: IdentifierQuoter | undefined;

  get identifierQuoter(): IdentifierQuoter {
    if (!this.quoter) {
      this.quoter = new IdentifierQuoter(this.config.identifierQuote);
    }
    return this.quoter;
  }

  /**
   * Escape an identifier (table name, column name)
   */
  escapeIdentifier(identifier: string): string {
    return this.identifierQuoter.quote(identifier);
  }

  /**
   * Escape the field quote inside a display alias
   */
  escapeField(field: string): string {
    const quote = this.config.fieldQuote;
    return field.split(quote).join(`\\${quote}`);
  }

  /**
   * Keyword placed between a column and its alias
   */
  get aliasKeyword(): string {
    return this.config.supportsAsAlias ? ' as ' : ' ';
  }

  /**
   * Case-insensitive text match of a column against a bound pattern
   */
  textSearchFragment(column: string, placeholder: string): string {
    return `${column} like ${placeholder}`;
  }

  /**
   * Build the driver connection string for the given credentials
   */
  abstract connectionString(credentials: Credentials): string;

  /**
   * Session setup run once right after connecting
   */
  async bootstrap(_connection: DriverConnection): Promise<void> {
    // Nothing by default
  }

  async beginTransaction(connection: DriverConnection): Promise<void> {
    await connection.beginTransaction();
  }

  async commit(connection: DriverConnection): Promise<void> {
    await connection.commit();
  }

  async rollback(connection: DriverConnection): Promise<void> {
    await connection.rollBack();
  }

  /**
   * Extra options appended to a connection string, prefixed with `;`
   */
  protected dsnPostfix(extra: string | undefined): string {
    if (!extra) {
      return '';
    }
    return extra.startsWith(';') ? extra : `;${extra}`;
  }

  protected port(credentials: Credentials): string {
    if (credentials.port !== undefined && credentials.port !== '') {
      return String(credentials.port);
    }
    return this.config.defaultPort === null ? '' : String(this.config.defaultPort);
  }
}
