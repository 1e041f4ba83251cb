/**
 * SearchBuilderOptions
 *
 * Distinct value / label pairs of a column, offered by a search builder
 * condition on that column.
 */

import { scalarToString, toScalar } from '../utils/scalar';
import { compareLabels, mergeLeftJoins, orderColumns } from './option-helpers';

import type { WhereInput } from '../database';
import type { LeftJoinDescriptor } from '../query/query';
import type { Scalar } from '../types';
import type { EditorHost } from './editor-host';
import type { Field } from './field';

export interface SearchBuilderOption {
  value: Scalar;
  label: string;
}

export type BuilderLabelRenderer = (label: Scalar) => string;

export class SearchBuilderOptions {
  private tableName: string | null = null;
  private valueColumn: string | null = null;
  private labels: string[] = [];
  private readonly leftJoins: LeftJoinDescriptor[] = [];
  private renderer: BuilderLabelRenderer | null = null;
  private whereInput: WhereInput = null;
  private orderValue: string | null = null;

  table(table: string): this {
    this.tableName = table;
    return this;
  }

  value(column: string): this {
    this.valueColumn = column;
    return this;
  }

  label(label: string | readonly string[]): this {
    this.labels = typeof label === 'string' ? [label] : [...label];
    return this;
  }

  leftJoin(table: string, field1: string, operator?: string, field2?: string): this {
    this.leftJoins.push({ table, field1, operator: operator ?? null, field2: field2 ?? null });
    return this;
  }

  render(renderer: BuilderLabelRenderer | null): this {
    this.renderer = renderer;
    return this;
  }

  where(where: WhereInput): this {
    this.whereInput = where;
    return this;
  }

  order(order: string | null): this {
    this.orderValue = order;
    return this;
  }

  async exec(
    field: Field,
    host: EditorHost,
    leftJoinIn: readonly LeftJoinDescriptor[] = [],
  ): Promise<SearchBuilderOption[]> {
    const value = this.valueColumn ?? field.dbField();
    const label = this.labels[0] ?? value;
    const formatter: BuilderLabelRenderer = this.renderer ?? scalarToString;

    let table: string[];
    if (this.tableName !== null) {
      table = [this.tableName];
    } else {
      const readTable = host.readTable();
      table = readTable.length > 0 ? readTable : host.table();
    }

    const query = host.db
      .query('select')
      .table(table)
      .leftJoin(mergeLeftJoins(this.leftJoins, leftJoinIn))
      .where(this.whereInput);

    if (field.apply('get') && !field.hasGetValue()) {
      query.get(`${value} as value`, `${label} as label`).groupBy(value);
    }

    if (this.orderValue !== null) {
      const selected = [label, value];
      for (const column of orderColumns(this.orderValue)) {
        if (!selected.includes(column)) {
          query.get(column);
        }
      }
      query.order(this.orderValue);
    }

    const rows = (await query.exec()).fetchAll();
    const out = rows.map(
      (row): SearchBuilderOption => ({
        value: toScalar(row['value']),
        label: formatter(toScalar(row['label'])),
      }),
    );

    if (this.orderValue === null) {
      out.sort((a, b) => compareLabels(a.label, b.label));
    }
    return out;
  }
}
