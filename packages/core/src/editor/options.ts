/**
 * Options
 *
 * Value / label list for a select, radio or checkbox input, read from a
 * table (DISTINCT) or produced by a custom function. Manually added options
 * are appended to what the database returns.
 *
 * @example
 * ```typescript
 * const sites = new Options()
 *   .table('sites')
 *   .value('id')
 *   .label(['name', 'city'])
 *   .where({ active: 1 })
 *   .add('Remote', 0);
 *
 * const items = await sites.exec(db);
 * ```
 */

import { scalarToString, toScalar } from '../utils/scalar';
import { compareLabels, orderColumns } from './option-helpers';

import type { Database, WhereInput } from '../database';
import type { LeftJoinDescriptor } from '../query/query';
import type { Row, Scalar } from '../types';

export interface OptionItem {
  label: string;
  value: Scalar;
}

export type OptionRenderer = (row: Row) => string;
export type OptionsFunction = (db: Database) => OptionItem[] | Promise<OptionItem[]>;

export class Options {
  private readonly manual: OptionItem[] = [];
  private alwaysRefreshFlag = true;
  private customFn: OptionsFunction | null = null;
  private labels: string[] = [];
  private readonly leftJoins: LeftJoinDescriptor[] = [];
  private limitValue: number | null = null;
  private orderValue: string | boolean = true;
  private renderer: OptionRenderer | null = null;
  private searchOnlyFlag = false;
  private tableName: string | null = null;
  private valueColumn: string | null = null;
  private whereInput: WhereInput = null;

  /**
   * Add an option that isn't read from the database. The value defaults to
   * the label.
   */
  add(label: string, value?: Scalar): this {
    this.manual.push({ label, value: value === undefined ? label : value });
    return this;
  }

  /**
   * Whether the options are read again when the table data is refreshed
   */
  alwaysRefresh(enabled: boolean): this {
    this.alwaysRefreshFlag = enabled;
    return this;
  }

  getAlwaysRefresh(): boolean {
    return this.alwaysRefreshFlag;
  }

  /**
   * Produce the options with a function instead of a query
   */
  fn(fn: OptionsFunction | null): this {
    this.customFn = fn;
    return this;
  }

  label(label: string | readonly string[]): this {
    this.labels = typeof label === 'string' ? [label] : [...label];
    return this;
  }

  getLabel(): string[] {
    return [...this.labels];
  }

  leftJoin(table: string, field1: string, operator?: string, field2?: string): this {
    this.leftJoins.push({ table, field1, operator: operator ?? null, field2: field2 ?? null });
    return this;
  }

  limit(limit: number | null): this {
    this.limitValue = limit;
    return this;
  }

  /**
   * `true` sorts by label after reading, `false` keeps the database order,
   * a string is used as the ORDER BY clause
   */
  order(order: string | boolean): this {
    this.orderValue = order;
    return this;
  }

  getOrder(): string | boolean {
    return this.orderValue;
  }

  render(renderer: OptionRenderer | null): this {
    this.renderer = renderer;
    return this;
  }

  /**
   * Only produce options for search requests
   */
  searchOnly(enabled: boolean): this {
    this.searchOnlyFlag = enabled;
    return this;
  }

  table(table: string): this {
    this.tableName = table;
    return this;
  }

  getTable(): string | null {
    return this.tableName;
  }

  value(column: string): this {
    this.valueColumn = column;
    return this;
  }

  getValue(): string | null {
    return this.valueColumn;
  }

  where(where: WhereInput): this {
    this.whereInput = where;
    return this;
  }

  /**
   * Read the options. Returns null when they don't apply to this request:
   * a search-only list outside a search, or a refresh the list opts out of.
   */
  async exec(db: Database, refresh = false, search = false): Promise<OptionItem[] | null> {
    if (this.searchOnlyFlag && !search) {
      return null;
    }
    if (refresh && !this.alwaysRefreshFlag) {
      return null;
    }
    if (this.customFn) {
      return this.customFn(db);
    }

    const value = this.valueColumn ?? 'id';
    const labels = this.labels.length > 0 ? this.labels : [value];
    const fields = [value, ...labels];
    const formatter: OptionRenderer =
      this.renderer ?? ((row) => labels.map((label) => scalarToString(row[label])).join(' '));

    const query = db
      .query('select')
      .distinct(true)
      .table(this.tableName)
      .leftJoin(this.leftJoins)
      .get(fields)
      .where(this.whereInput);

    if (typeof this.orderValue === 'string') {
      for (const column of orderColumns(this.orderValue)) {
        if (!fields.includes(column)) {
          query.get(column);
        }
      }
      query.order(this.orderValue);
    }

    if (this.limitValue !== null) {
      query.limit(this.limitValue);
    }

    const rows = (await query.exec()).fetchAll();
    const out: OptionItem[] = rows.map((row) => ({
      label: formatter(row),
      value: toScalar(row[value]),
    }));

    out.push(...this.manual);

    if (this.orderValue === true) {
      out.sort((a, b) => compareLabels(a.label, b.label));
    }
    return out;
  }
}
