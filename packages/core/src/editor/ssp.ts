/**
 * Server-side processing
 *
 * Applies the paging, ordering and filtering of a table request to a read
 * query, and counts the full and the filtered row sets.
 *
 * @example
 * ```typescript
 * const query = db.query('select', 'users').get(['id', 'name']);
 * const ssp = new ServerSideProcessing(host, request, (q) => q.where('site', 2));
 *
 * ssp.apply(query);
 * const rows = (await query.exec()).fetchAll();
 * const { draw, recordsTotal, recordsFiltered } = await ssp.counts();
 * ```
 */

import { EDITOR_DEFAULTS, QUERY_DEFAULTS } from '../constants';
import { ValidationError } from '../errors';
import { requestFlag } from './option-helpers';

import type { Query } from '../query/query';
import type { EditorHost } from './editor-host';
import type { SearchPaneRequest } from './search-pane-options';

export interface SspColumn {
  data: string;
  searchable?: boolean | string;
  search?: { value: string };
}

export interface SspOrder {
  column: number | string;
  dir: string;
}

/**
 * Parameters a table sends when it pages, orders and searches on the server
 */
export interface SspRequest extends SearchPaneRequest {
  draw?: number | string;
  start?: number | string;
  length?: number | string;
  search?: { value: string };
  order?: SspOrder[];
  columns?: SspColumn[];
}

export interface SspInfo {
  draw: number;
  recordsTotal: number;
  recordsFiltered: number;
}

/**
 * Conditions and joins every query on the table needs, such as the
 * editor's own where conditions
 */
export type QueryScope = (query: Query) => void;

export class ServerSideProcessing {
  constructor(
    private readonly host: EditorHost,
    private readonly request: SspRequest,
    private readonly scope: QueryScope = () => undefined,
  ) {}

  /**
   * Whether the request asks for server-side processing at all
   */
  get active(): boolean {
    return this.request.draw !== undefined;
  }

  apply(query: Query): void {
    this.applyLimit(query);
    this.applySort(query);
    this.applyFilter(query);
  }

  /**
   * `length` of -1 means all rows
   */
  applyLimit(query: Query): void {
    const length = Number(this.request.length ?? -1);
    if (length !== -1) {
      query.offset(Number(this.request.start ?? 0)).limit(length);
    }
  }

  /**
   * Requested ordering, or the primary key when there is none
   */
  applySort(query: Query): void {
    const order = this.request.order ?? [];

    for (const entry of order) {
      query.order(`${this.columnField(Number(entry.column))} ${entry.dir === 'asc' ? 'asc' : 'desc'}`);
    }

    if (order.length === 0) {
      query.order(`${this.primaryKey()} asc`);
    }
  }

  applyFilter(query: Query): void {
    const columns = this.request.columns ?? [];
    const term = this.request.search?.value ?? '';

    if (term !== '') {
      query.where((q) => {
        columns.forEach((column, i) => {
          if (requestFlag(column.searchable)) {
            q.orWhere(this.columnField(i), `%${term}%`, 'like');
          }
        });
      });
    }

    const panes = this.request.searchPanes;
    if (panes) {
      const nulls = this.request[EDITOR_DEFAULTS.PANES_NULL] ?? {};

      for (const field of this.host.fields()) {
        const selected = panes[field.name()];
        if (!selected) {
          continue;
        }

        const nullFlags = nulls[field.name()] ?? [];
        query.where((q) => {
          selected.forEach((value, i) => {
            q.orWhere(field.dbField(), requestFlag(nullFlags[i]) ? null : value, '=');
          });
        });
      }
    }

    columns.forEach((column, i) => {
      const search = column.search?.value ?? '';
      if (search !== '' && requestFlag(column.searchable)) {
        query.where(this.columnField(i), `%${search}%`, 'like');
      }
    });
  }

  /**
   * Row counts for the response: all rows in scope, and those left after
   * filtering
   */
  async counts(): Promise<SspInfo> {
    const filtered = this.countQuery();
    this.applyFilter(filtered);

    const filteredRow = (await filtered.exec()).fetch();
    const totalRow = (await this.countQuery().exec()).fetch();

    return {
      draw: Number(this.request.draw ?? 0),
      recordsTotal: Number(totalRow?.[QUERY_DEFAULTS.COUNT_ALIAS] ?? 0),
      recordsFiltered: Number(filteredRow?.[QUERY_DEFAULTS.COUNT_ALIAS] ?? 0),
    };
  }

  /**
   * Database field of the column at `index`. `DT_RowId` maps to the
   * primary key.
   */
  columnField(index: number): string {
    const name = this.request.columns?.[index]?.data;
    if (name === undefined) {
      throw new ValidationError(`Unknown column index: ${index}`, 'columns');
    }

    const field = this.host.fields().find((candidate) => candidate.name() === name);
    if (field) {
      return field.dbField();
    }
    if (name === EDITOR_DEFAULTS.ROW_ID) {
      return this.primaryKey();
    }
    throw new ValidationError(`Unknown field: ${name} (index ${index})`, name);
  }

  private countQuery(): Query {
    const readTable = this.host.readTable();
    const query = this.host.db
      .query('count')
      .table(readTable.length > 0 ? readTable : this.host.table())
      .get(this.primaryKey());
    this.scope(query);
    return query;
  }

  private primaryKey(): string {
    return this.host.pkey()[0] ?? 'id';
  }
}
