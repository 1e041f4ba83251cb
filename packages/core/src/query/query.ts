/**
 * Query
 *
 * Accumulates the parts of one statement (tables, fields, joins, where
 * conditions, ordering, paging and set values) and renders it for the
 * dialect of its context. A query runs once: build a new one for the next
 * statement.
 *
 * @example
 * ```typescript
 * const result = await db
 *   .query('select', 'users')
 *   .get(['id', 'first_name'])
 *   .where('site', 2)
 *   .where((q) => {
 *     q.where('role', 'admin');
 *     q.orWhere('role', 'owner');
 *   })
 *   .order('last_name asc')
 *   .limit(10)
 *   .exec();
 * ```
 */

import { JOIN_TYPES, QUERY_DEFAULTS } from '../constants';
import { QueryError, UnsupportedCommandError, ValidationError } from '../errors';
import { Result } from '../result/result';
import { validateLimit } from '../utils/validation';
import { BindingList } from './binding-sanitizer';
import { ConditionTree } from './condition-tree';

import type { InsertPlan } from '../dialect/key-return-strategy';
import type { SQLDialect } from '../dialect/sql-dialect';
import type { CompiledStatement, ParameterType, Scalar } from '../types';
import type { Conjunction } from './condition-tree';
import type { QueryContext } from './query-context';

export type WhereCallback = (query: Query) => void;
export type WhereValue = Scalar | readonly Scalar[];
export type WhereMap = Record<string, WhereValue>;

export interface LeftJoinDescriptor {
  table: string;
  field1: string;
  operator?: string | null;
  field2?: string | null;
}

export interface Ordering {
  column: string;
  direction: string;
}

interface SetEntry {
  column: string;
  /** Placeholder for bound values, raw SQL expression otherwise */
  expression: string;
}

const ORDER_SPLIT = /,(?![^(]*\))/;
const ALIAS_SPLIT = / as (?![^(]*\))/i;
const JOIN_CONDITION = /([\w.]+)([\W\s]+)(.+)/;

export class Query {
  private readonly tables: string[] = [];
  private readonly fields: string[] = [];
  private readonly joins: string[] = [];
  private readonly orderings: Ordering[] = [];
  private readonly setEntries: SetEntry[] = [];
  private readonly bindings = new BindingList();
  private readonly conditions: ConditionTree;
  private groupByColumn: string | null = null;
  private limitValue: number | null = null;
  private offsetValue: number | null = null;
  private distinctFlag = false;
  private pkeyColumns: string[] | null = null;
  private spent = false;

  constructor(
    private readonly context: QueryContext,
    public readonly kind: string,
    table?: string | readonly string[],
  ) {
    this.conditions = new ConditionTree(context.dialect, this.bindings);

    if (table !== undefined) {
      this.table(table);
    }
  }

  get dialect(): SQLDialect {
    return this.context.dialect;
  }

  // ============ Composition ============

  /**
   * Add one or more tables. A string may list several, comma separated.
   */
  table(table: string | readonly string[] | null): this {
    if (table === null) {
      return this;
    }

    const names = typeof table === 'string' ? table.split(',') : table;
    for (const name of names) {
      this.tables.push(this.dialect.escapeIdentifier(name.trim()));
    }
    return this;
  }

  /**
   * Add fields to select. A comma separated string without a function
   * call is split into several fields.
   */
  get(...fields: Array<string | readonly string[] | null>): this {
    for (const entry of fields) {
      if (entry === null) {
        continue;
      }

      const list = typeof entry === 'string' ? [entry] : entry;
      for (const field of list) {
        if (field.includes(',') && !field.includes('(')) {
          this.fields.push(...field.split(',').map((part) => part.trim()));
        } else {
          this.fields.push(field.trim());
        }
      }
    }
    return this;
  }

  /**
   * Set a column value for an insert or update. With `bind = false` the
   * value is written into the SQL as is.
   */
  set(field: string | Record<string, Scalar>, value: Scalar = null, bind = true): this {
    const entries: Array<[string, Scalar]> =
      typeof field === 'string' ? [[field, value]] : Object.entries(field);

    for (const [column, columnValue] of entries) {
      let expression: string;

      if (bind) {
        expression = this.bindings.replace(`:${column}`, columnValue).name;
      } else {
        expression = columnValue === null ? 'NULL' : String(columnValue);
      }

      const existing = this.setEntries.find((entry) => entry.column === column);
      if (existing) {
        existing.expression = expression;
      } else {
        this.setEntries.push({ column, expression });
      }
    }
    return this;
  }

  /**
   * AND condition(s). Accepts a field and value, a map of fields to values,
   * a list of values for one field (one condition per value) or a callback
   * that adds a parenthesized group.
   */
  where(
    key: string | WhereMap | WhereCallback | null,
    value?: WhereValue,
    operator = '=',
    bind = true,
  ): this {
    return this.addWhere('AND', key, value, operator, bind);
  }

  andWhere(
    key: string | WhereMap | WhereCallback | null,
    value?: WhereValue,
    operator = '=',
    bind = true,
  ): this {
    return this.where(key, value, operator, bind);
  }

  /**
   * OR condition(s), same shapes as `where`
   */
  orWhere(
    key: string | WhereMap | WhereCallback | null,
    value?: WhereValue,
    operator = '=',
    bind = true,
  ): this {
    return this.addWhere('OR', key, value, operator, bind);
  }

  /**
   * Parenthesize the conditions added by `inOut`, or open (`true`) and close
   * (`false`) a group explicitly
   */
  whereGroup(inOut: boolean | WhereCallback, operator: Conjunction = 'AND'): this {
    if (typeof inOut === 'function') {
      this.conditions.addRawGroup(true, operator);
      inOut(this);
      this.conditions.addRawGroup(false, operator);
    } else {
      this.conditions.addRawGroup(inOut, operator);
    }
    return this;
  }

  whereIn(field: string, values: readonly Scalar[], operator: Conjunction = 'AND'): this {
    this.conditions.addInCondition(field, values, operator);
    return this;
  }

  /**
   * Join a table. Unknown join types fall back to a plain JOIN. With `bind`
   * the two sides of a `field op field` condition are quoted.
   */
  join(table: string, condition: string, type = '', bind = true): this {
    let joinType = type.trim().toUpperCase();
    if (!JOIN_TYPES.some((known) => known === joinType)) {
      joinType = '';
    }

    let on = condition;
    const match = bind ? JOIN_CONDITION.exec(condition) : null;
    if (match) {
      const [, left = '', operator = '', right = ''] = match;
      on =
        condition.slice(0, match.index) +
        this.dialect.escapeIdentifier(left) +
        operator +
        this.dialect.escapeIdentifier(right);
    }

    const keyword = joinType ? `${joinType} JOIN` : 'JOIN';
    this.joins.push(`${keyword} ${this.dialect.escapeIdentifier(table)} ON ${on}`);
    return this;
  }

  /**
   * LEFT JOIN one or more tables. A descriptor without `operator` and
   * `field2` uses `field1` as the full, unquoted condition.
   */
  leftJoin(joins: LeftJoinDescriptor | readonly LeftJoinDescriptor[]): this {
    const list: readonly LeftJoinDescriptor[] = isJoinList(joins) ? joins : [joins];

    for (const join of list) {
      if (!join.operator && !join.field2) {
        this.join(join.table, join.field1, 'LEFT', false);
      } else {
        this.join(join.table, `${join.field1} ${join.operator ?? '='} ${join.field2 ?? ''}`, 'LEFT');
      }
    }
    return this;
  }

  /**
   * Ordering, as `'name asc, id'` or a list of such entries. Commas inside
   * function calls don't split.
   */
  order(order: string | readonly string[] | null): this {
    if (order === null) {
      return this;
    }

    const entries = typeof order === 'string' ? order.split(ORDER_SPLIT) : order;

    for (const raw of entries) {
      const entry = raw.replace(/[\t ]+/g, ' ').trim();
      if (entry === '') {
        continue;
      }

      const space = entry.indexOf(' ');
      const identifier = space === -1 ? entry : entry.slice(0, space);
      const direction = space === -1 ? '' : entry.slice(space + 1);

      this.orderings.push({ column: this.dialect.escapeIdentifier(identifier), direction });
    }
    return this;
  }

  limit(limit: number): this {
    validateLimit(limit, 'limit');
    this.limitValue = limit;
    return this;
  }

  offset(offset: number): this {
    validateLimit(offset, 'offset');
    this.offsetValue = offset;
    return this;
  }

  distinct(distinct = true): this {
    this.distinctFlag = distinct;
    return this;
  }

  groupBy(column: string | null): this {
    this.groupByColumn = column;
    return this;
  }

  /**
   * Primary key column(s), used by inserts to report the new key
   */
  pkey(pkey: string | readonly string[] | null): this {
    this.pkeyColumns = pkey === null ? null : typeof pkey === 'string' ? [pkey] : [...pkey];
    return this;
  }

  /**
   * Bind a value to a named placeholder, for use with raw SQL
   */
  bind(name: string, value: Scalar, type?: ParameterType): this {
    this.bindings.add(name, value, type);
    return this;
  }

  // ============ Rendering ============

  /**
   * Render the statement without running it
   */
  compile(sql?: string): CompiledStatement {
    const text = this.render(sql);
    return { sql: text, bindings: this.bindings.orderedFor(text) };
  }

  /**
   * Run the statement. A query can only be executed once.
   */
  async exec(sql?: string): Promise<Result> {
    if (this.spent) {
      throw new QueryError('This query has already been executed', sql, this.bindings.all());
    }
    this.spent = true;

    const compiled = this.compile(sql);
    const { keyReturn } = this.dialect;
    const { connection } = this.context;

    let plan: InsertPlan = { sql: compiled.sql, outputs: [] };
    if (this.kind === 'insert') {
      plan = await keyReturn.planInsert(compiled.sql, {
        table: this.insertTables()[0] ?? '',
        pkey: this.pkeyColumns,
        run: (text, bindings) => this.context.execute(text, bindings),
        quote: (identifier) => this.dialect.escapeIdentifier(identifier),
      });
    }

    const outcome = await this.context.execute(plan.sql, compiled.bindings, plan.outputs);

    return new Result(outcome, () => keyReturn.insertId(outcome, connection));
  }

  private render(sql?: string): string {
    switch (this.kind) {
      case 'select': {
        return this.renderSelect();
      }
      case 'insert': {
        return this.renderInsert();
      }
      case 'update': {
        return this.renderUpdate();
      }
      case 'delete': {
        return this.renderDelete();
      }
      case 'count': {
        return this.renderCount();
      }
      case 'raw': {
        if (sql === undefined || sql.trim() === '') {
          throw new ValidationError('A raw query needs SQL text to execute', 'sql');
        }
        return sql;
      }
      default: {
        throw new UnsupportedCommandError(this.kind);
      }
    }
  }

  private renderSelect(): string {
    const parts: string[] = ['SELECT'];

    if (this.distinctFlag) {
      parts.push('DISTINCT');
    }

    parts.push(this.buildFields(true));
    parts.push('FROM', this.tables.join(', '));
    parts.push(...this.joins);
    this.pushIfPresent(parts, this.conditions.render());

    if (this.groupByColumn) {
      parts.push('GROUP BY', this.dialect.escapeIdentifier(this.groupByColumn));
    }

    if (this.orderings.length > 0) {
      parts.push('ORDER BY', this.buildOrder());
    }

    const window = { limit: this.limitValue, offset: this.offsetValue };
    this.pushIfPresent(parts, this.dialect.limitStrategy.fragment(window));

    return this.dialect.limitStrategy.finalize(parts.join(' '), window);
  }

  private renderInsert(): string {
    const columns = this.setEntries.map((entry) => this.dialect.escapeIdentifier(entry.column));
    const values = this.setEntries.map((entry) => entry.expression);

    return `INSERT INTO ${this.insertTables().join(', ')} (${columns.join(', ')}) VALUES (${values.join(', ')})`;
  }

  private renderUpdate(): string {
    const assignments = this.setEntries.map(
      (entry) => `${this.dialect.escapeIdentifier(entry.column)} = ${entry.expression}`,
    );
    const parts = ['UPDATE', this.tables.join(', '), 'SET', assignments.join(', ')];
    this.pushIfPresent(parts, this.conditions.render());
    return parts.join(' ');
  }

  private renderDelete(): string {
    const parts = ['DELETE FROM', this.tables.join(', ')];
    this.pushIfPresent(parts, this.conditions.render());
    return parts.join(' ');
  }

  private renderCount(): string {
    const alias = this.dialect.escapeIdentifier(QUERY_DEFAULTS.COUNT_ALIAS);
    const parts = [
      `SELECT COUNT(${this.buildFields(false)})${this.dialect.aliasKeyword}${alias}`,
      'FROM',
      this.tables.join(', '),
      ...this.joins,
    ];
    this.pushIfPresent(parts, this.conditions.render());
    this.pushIfPresent(
      parts,
      this.dialect.limitStrategy.fragment({ limit: this.limitValue, offset: this.offsetValue }),
    );
    return parts.join(' ');
  }

  private buildFields(addAlias: boolean): string {
    const fields = this.fields.length > 0 ? this.fields : ['*'];
    const quote = (identifier: string): string => this.dialect.escapeIdentifier(identifier);
    const fieldQuote = this.dialect.config.fieldQuote;
    const as = this.dialect.aliasKeyword;
    const display = (name: string): string => `${fieldQuote}${name}${fieldQuote}`;

    return fields
      .map((field) => {
        if (!addAlias || field.includes('*')) {
          return quote(field);
        }

        if (!field.includes('(')) {
          const split = field.split(ALIAS_SPLIT);
          return split.length > 1
            ? quote(split[0] ?? field) + as + display(split[1] ?? '')
            : quote(field) + as + display(this.dialect.escapeField(field));
        }

        // Function calls keep an explicit alias, otherwise they're named after themselves
        if (!/ as /i.test(field)) {
          return quote(field) + as + display(this.dialect.escapeField(field));
        }
        return quote(field);
      })
      .join(', ');
  }

  private buildOrder(): string {
    return this.orderings
      .map((ordering) => (ordering.direction ? `${ordering.column} ${ordering.direction}` : ordering.column))
      .join(', ');
  }

  /**
   * Tables without their aliases, as INSERT needs them
   */
  private insertTables(): string[] {
    return this.tables.map((table) => table.replace(/ as /gi, ' ').split(' ')[0] ?? table);
  }

  private pushIfPresent(parts: string[], fragment: string): void {
    if (fragment !== '') {
      parts.push(fragment);
    }
  }

  private addWhere(
    conjunction: Conjunction,
    key: string | WhereMap | WhereCallback | null,
    value: WhereValue | undefined,
    operator: string,
    bind: boolean,
  ): this {
    if (key === null) {
      return this;
    }

    if (typeof key === 'function') {
      this.conditions.addRawGroup(true, conjunction);
      key(this);
      this.conditions.addRawGroup(false, conjunction);
      return this;
    }

    if (typeof key !== 'string') {
      for (const [field, fieldValue] of Object.entries(key)) {
        this.addWhere(conjunction, field, fieldValue, operator, bind);
      }
      return this;
    }

    if (isScalarList(value)) {
      for (const item of value) {
        this.addWhere(conjunction, key, item, operator, bind);
      }
      return this;
    }

    this.conditions.addCondition(key, value, operator, conjunction, bind);
    return this;
  }
}

function isScalarList(value: WhereValue | undefined): value is readonly Scalar[] {
  return Array.isArray(value);
}

function isJoinList(
  joins: LeftJoinDescriptor | readonly LeftJoinDescriptor[],
): joins is readonly LeftJoinDescriptor[] {
  return Array.isArray(joins);
}
