/**
 * SearchPaneOptions
 *
 * Distinct values of a column with the number of rows each one matches,
 * for a search pane. When the client asks for counts, or for cascading
 * panes, a second query counts the rows matching the other panes'
 * current selections.
 */

import { EDITOR_DEFAULTS } from '../constants';
import { scalarToString, toScalar } from '../utils/scalar';
import { compareLabels, mergeLeftJoins, orderColumns, requestFlag } from './option-helpers';

import type { WhereInput } from '../database';
import type { LeftJoinDescriptor, Query } from '../query/query';
import type { Row, Scalar } from '../types';
import type { EditorHost } from './editor-host';
import type { Field } from './field';

export interface SearchPaneOption {
  label: string;
  total: number | null;
  value: Scalar;
  count: number | null;
}

export interface SearchPaneRequestOptions {
  viewCount?: boolean | string;
  viewTotal?: boolean | string;
  cascade?: boolean | string;
}

/**
 * The search pane parameters of a table request
 */
export interface SearchPaneRequest {
  searchPanes?: Record<string, Scalar[]>;
  searchPanes_null?: Record<string, Array<boolean | string>>;
  searchPanesLast?: string;
  searchPanes_options?: SearchPaneRequestOptions;
}

export type PaneLabelRenderer = (label: Scalar) => string;

interface Selection {
  value: Scalar;
  isNull: boolean;
}

export class SearchPaneOptions {
  private tableName: string | null = null;
  private valueColumn: string | null = null;
  private labels: string[] = [];
  private readonly leftJoins: LeftJoinDescriptor[] = [];
  private renderer: PaneLabelRenderer | null = null;
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

  render(renderer: PaneLabelRenderer | null): this {
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

  /**
   * Options for the pane of `field`. `fields` are all the editor's fields,
   * used to apply the other panes' selections when counting.
   */
  async exec(
    field: Field,
    host: EditorHost,
    request: SearchPaneRequest,
    fields: readonly Field[],
    leftJoinIn: readonly LeftJoinDescriptor[] = [],
  ): Promise<SearchPaneOption[]> {
    const requestOptions = request.searchPanes_options;
    const viewCount = requestOptions ? requestFlag(requestOptions.viewCount) : true;
    const viewTotal = requestOptions ? requestFlag(requestOptions.viewTotal) : false;
    const cascade = requestOptions ? requestFlag(requestOptions.cascade) : false;

    const value = this.valueColumn ?? field.dbField();
    const label = this.labels[0] ?? value;
    const table = this.resolveTable(host);
    const formatter: PaneLabelRenderer = this.renderer ?? scalarToString;
    const leftJoin = mergeLeftJoins(this.leftJoins, leftJoinIn);

    const query = host.db
      .query('select')
      .distinct(true)
      .table(table)
      .get(`${label} as label`, `${value} as value`)
      .leftJoin(leftJoin)
      .groupBy(value)
      .where(this.whereInput);

    if (viewTotal) {
      query.get('COUNT(*) as total');
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
    const selections = this.activeSelections(field, request, rows);

    let entries: Map<string, Row> | null = null;
    if (viewCount || cascade) {
      entries = await this.countEntries(field, host, request, fields, selections, {
        table,
        value,
        viewCount,
        leftJoin,
      });
    }

    const out = rows.map((row): SearchPaneOption => {
      const rowValue = toScalar(row['value']);
      let total = row['total'] === undefined || row['total'] === null ? null : Number(row['total']);
      let count = total;

      if (entries) {
        const entry = entries.get(scalarToString(rowValue));
        count = entry ? Number(entry['count'] ?? 0) : 0;
        total = total ?? count;
      }

      return {
        label: formatter(toScalar(row['label'])),
        total,
        value: rowValue,
        count,
      };
    });

    if (this.orderValue === null) {
      out.sort((a, b) => compareLabels(a.label, b.label));
    }
    return out;
  }

  private resolveTable(host: EditorHost): string[] {
    if (this.tableName !== null) {
      return [this.tableName];
    }
    const readTable = host.readTable();
    return readTable.length > 0 ? readTable : host.table();
  }

  /**
   * Selections per field, with the selections of `field` narrowed to the
   * values that still exist in its options
   */
  private activeSelections(
    field: Field,
    request: SearchPaneRequest,
    rows: readonly Row[],
  ): Map<string, Selection[]> {
    const selections = new Map<string, Selection[]>();
    const panes = request.searchPanes ?? {};
    const nulls = request[EDITOR_DEFAULTS.PANES_NULL] ?? {};

    for (const [name, values] of Object.entries(panes)) {
      const nullFlags = nulls[name] ?? [];
      selections.set(
        name,
        values.map((value, i) => ({ value, isNull: requestFlag(nullFlags[i]) })),
      );
    }

    const own = selections.get(field.name());
    if (own) {
      const available = rows.map((row) => row['value']);
      selections.set(
        field.name(),
        own.filter((selection) =>
          selection.isNull
            ? available.some((value) => value === null || value === undefined)
            : available.some((value) => scalarToString(value) === scalarToString(selection.value)),
        ),
      );
    }
    return selections;
  }

  /**
   * Count the rows per value that match the selections of the panes
   */
  private async countEntries(
    field: Field,
    host: EditorHost,
    request: SearchPaneRequest,
    fields: readonly Field[],
    selections: Map<string, Selection[]>,
    plan: { table: string[]; value: string; viewCount: boolean; leftJoin: LeftJoinDescriptor[] },
  ): Promise<Map<string, Row>> {
    const query = host.db
      .query('select')
      .distinct(true)
      .table(plan.table)
      .leftJoin(plan.leftJoin);

    if (field.apply('get') && !field.hasGetValue()) {
      query.get(`${plan.value} as value`).groupBy(plan.value);
      query.get(plan.viewCount ? 'COUNT(*) as count' : '(1) as count');
    }

    const last = request.searchPanesLast;
    for (const paneField of fields) {
      const name = paneField.name();
      const selected = selections.get(name);
      if (!selected || (last === field.name() && name === last)) {
        continue;
      }
      applySelections(query, paneField.dbField(), selected);
    }

    const entries = new Map<string, Row>();
    for (const row of (await query.exec()).fetchAll()) {
      entries.set(scalarToString(row['value']), row);
    }
    return entries;
  }
}

function applySelections(query: Query, column: string, selected: readonly Selection[]): void {
  query.where((q) => {
    for (const selection of selected) {
      q.orWhere(column, selection.isNull ? null : selection.value, '=');
    }
  });
}

