/**
 * RowEditor
 *
 * Reads the rows of a table for display and applies create, edit and
 * remove requests to it, together with the joins configured on it. The
 * main table row is written before joined rows are created, and joined
 * rows are removed before the main table row, so foreign keys hold at each
 * step. Writes run in a transaction unless it is turned off.
 *
 * @example
 * ```typescript
 * const editor = new RowEditor(db, { table: 'users', pkey: 'id' })
 *   .field(new Field('first_name'), new Field('last_name'), new Field('site'))
 *   .join(
 *     new Mjoin('dept')
 *       .link('users.id', 'user_dept.user_id')
 *       .link('dept.id', 'user_dept.dept_id')
 *       .fields(new Field('id'), new Field('name')),
 *   );
 *
 * const page = await editor.read({ draw: 1, start: 0, length: 10 });
 * const { data, fieldErrors } = await editor.create({ first_name: 'Ada', site: 2 });
 * ```
 */

import { EDITOR_DEFAULTS } from '../constants';
import { ValidationError } from '../errors';
import { toScalar } from '../utils/scalar';
import { splitTableAlias } from './editor-host';
import { pkeyToArray, pkeyToValue } from './primary-key';
import { ServerSideProcessing } from './ssp';

import type { Database } from '../database';
import type { LeftJoinDescriptor, Query, WhereCallback } from '../query/query';
import type { Scalar } from '../types';
import type { EditorHost } from './editor-host';
import type { Field, FieldError } from './field';
import type { Join } from './join';
import type { NestedData } from './nested-data';
import type { OptionItem } from './options';
import type { SearchBuilderOption } from './search-builder-options';
import type { SearchPaneOption, SearchPaneRequest } from './search-pane-options';
import type { SspInfo, SspRequest } from './ssp';

export interface RowEditorOptions {
  /** Table written to. Several tables may be given, the first is the main one. */
  table: string | readonly string[];
  pkey?: string | readonly string[];
  /** Table or view to read from instead of `table` */
  readTable?: string | readonly string[];
  idPrefix?: string;
  /** Run writes in a transaction. Defaults to true. */
  transaction?: boolean;
}

export interface EditorReadResponse extends Partial<SspInfo> {
  data: NestedData[];
  options: Record<string, OptionItem[]>;
  searchPanes?: { options: Record<string, SearchPaneOption[]> };
  searchBuilder?: { options: Record<string, SearchBuilderOption[]> };
}

export interface EditorWriteResponse {
  data: NestedData[];
  fieldErrors: FieldError[];
}

interface WhereEntry {
  key: string;
  value: Scalar;
  operator: string;
}

export class RowEditor implements EditorHost {
  private readonly tables: string[];
  private readonly readTables: string[];
  private readonly pkeys: string[];
  private readonly prefix: string;
  private readonly useTransaction: boolean;
  private readonly fieldList: Field[] = [];
  private readonly joins: Join[] = [];
  private readonly leftJoins: LeftJoinDescriptor[] = [];
  private readonly whereEntries: Array<WhereEntry | WhereCallback> = [];

  constructor(
    public readonly db: Database,
    options: RowEditorOptions,
  ) {
    this.tables = toList(options.table);
    this.readTables = options.readTable === undefined ? [] : toList(options.readTable);
    this.pkeys = toList(options.pkey ?? 'id');
    this.prefix = options.idPrefix ?? EDITOR_DEFAULTS.ID_PREFIX;
    this.useTransaction = options.transaction ?? true;

    if (this.tables.length === 0) {
      throw new ValidationError('An editor needs a table', 'table');
    }
  }

  // ============ Configuration ============

  field(...fields: Field[]): this {
    this.fieldList.push(...fields);
    return this;
  }

  join(...joins: Join[]): this {
    this.joins.push(...joins);
    return this;
  }

  leftJoin(table: string, field1: string, operator?: string, field2?: string): this {
    this.leftJoins.push({ table, field1, operator: operator ?? null, field2: field2 ?? null });
    return this;
  }

  /**
   * Condition applied to every read and to the row counts
   */
  where(key: string | WhereCallback, value: Scalar = null, operator = '='): this {
    this.whereEntries.push(typeof key === 'function' ? key : { key, value, operator });
    return this;
  }

  // ============ EditorHost ============

  table(): string[] {
    return [...this.tables];
  }

  readTable(): string[] {
    return [...this.readTables];
  }

  pkey(): string[] {
    return [...this.pkeys];
  }

  idPrefix(): string {
    return this.prefix;
  }

  fields(): Field[] {
    return [...this.fieldList];
  }

  // ============ Read ============

  /**
   * Rows for display, with option lists. A request carrying `draw` is
   * paged, ordered and filtered on the server and reports row counts.
   */
  async read(request: SspRequest = {}): Promise<EditorReadResponse> {
    const ssp = new ServerSideProcessing(this, request, (query) => this.scope(query));
    const data = await this.readRows(ssp.active ? ssp : null, null);
    const response: EditorReadResponse = { data, options: await this.options() };

    const panes = await this.searchPanes(request);
    if (Object.keys(panes).length > 0) {
      response.searchPanes = { options: panes };
    }

    const builder = await this.searchBuilder();
    if (Object.keys(builder).length > 0) {
      response.searchBuilder = { options: builder };
    }

    if (ssp.active) {
      Object.assign(response, await ssp.counts());
    }
    return response;
  }

  /**
   * Option lists of the fields and joins
   */
  async options(refresh = false): Promise<Record<string, OptionItem[]>> {
    const out: Record<string, OptionItem[]> = {};

    for (const field of this.fieldList) {
      const items = await field.getOptions()?.exec(this.db, refresh);
      if (items) {
        out[field.name()] = items;
      }
    }
    for (const join of this.joins) {
      await join.options(out, this.db, refresh);
    }
    return out;
  }

  async searchPanes(request: SearchPaneRequest): Promise<Record<string, SearchPaneOption[]>> {
    const out: Record<string, SearchPaneOption[]> = {};

    for (const field of this.fieldList) {
      const panes = field.getSearchPaneOptions();
      if (panes) {
        out[field.name()] = await panes.exec(field, this, request, this.fieldList, this.leftJoins);
      }
    }
    return out;
  }

  async searchBuilder(): Promise<Record<string, SearchBuilderOption[]>> {
    const out: Record<string, SearchBuilderOption[]> = {};

    for (const field of this.fieldList) {
      const builder = field.getSearchBuilderOptions();
      if (builder) {
        out[field.name()] = await builder.exec(field, this, this.leftJoins);
      }
    }
    return out;
  }

  // ============ Write ============

  async create(values: NestedData): Promise<EditorWriteResponse> {
    const fieldErrors = await this.validate(values, 'create', null);
    if (fieldErrors.length > 0) {
      return { data: [], fieldErrors };
    }

    const id = await this.write(async () => {
      const set = this.columnValues('create', values);
      const result = await this.db.insert(this.mainTable().name, set, this.pkeys);
      const key = this.insertedKey(set, result.insertId());

      for (const join of this.joins) {
        await join.create(this, this.parentValue(key), values);
      }
      return key;
    });

    return { data: await this.readRows(null, [id]), fieldErrors: [] };
  }

  async edit(id: string, values: NestedData): Promise<EditorWriteResponse> {
    const fieldErrors = await this.validate(values, 'edit', id);
    if (fieldErrors.length > 0) {
      return { data: [], fieldErrors };
    }

    const nextId = await this.write(async () => {
      const where = this.keyWhere(id);
      const set = this.columnValues('edit', values);

      if (Object.keys(set).length > 0) {
        await this.db.update(this.mainTable().name, set, where);
      }

      for (const join of this.joins) {
        await join.update(this, this.parentValue(id), values);
      }

      // The key itself may have been edited
      const key: NestedData = { ...where };
      for (const column of this.pkeys) {
        if (Object.hasOwn(set, column)) {
          key[column] = set[column];
        }
      }
      return this.prefix + pkeyToValue(key, this.pkeys, true);
    });

    return { data: await this.readRows(null, [nextId]), fieldErrors: [] };
  }

  async remove(ids: readonly string[]): Promise<EditorWriteResponse> {
    if (ids.length > 0) {
      await this.write(async () => {
        const parents = ids.map((id) => this.parentValue(id));
        for (const join of this.joins) {
          await join.remove(this, parents);
        }

        await this.db.delete(this.mainTable().name, (query) => {
          for (const id of ids) {
            const where = this.keyWhere(id);
            query.orWhere((inner) => {
              inner.where(where);
            });
          }
        });
      });
    }

    return { data: [], fieldErrors: [] };
  }

  /**
   * Field and join validation errors for submitted values
   */
  async validate(values: NestedData, action: 'create' | 'edit', id: string | null): Promise<FieldError[]> {
    const errors: FieldError[] = [];

    for (const field of this.fieldList) {
      const status = await field.validate(values, { action, id, db: this.db });
      if (status !== true) {
        errors.push({ name: field.name(), status });
      }
    }
    for (const join of this.joins) {
      await join.validate(errors, this, values, action);
    }
    return errors;
  }

  // ============ Internals ============

  private async readRows(ssp: ServerSideProcessing | null, ids: readonly string[] | null): Promise<NestedData[]> {
    const query = this.db
      .query('select')
      .table(this.readTables.length > 0 ? this.readTables : this.tables)
      .get(this.pkeys);

    for (const field of this.fieldList) {
      if (field.apply('get') && !field.hasGetValue() && !this.pkeys.includes(field.dbField())) {
        query.get(field.dbField());
      }
    }

    this.scope(query);

    if (ids) {
      query.where((q) => {
        for (const id of ids) {
          const where = this.keyWhere(id);
          q.orWhere((inner) => {
            inner.where(where);
          });
        }
      });
    }

    ssp?.apply(query);

    const rows = (await query.exec()).fetchAll();
    const out = rows.map((row) => {
      const item: NestedData = { [EDITOR_DEFAULTS.ROW_ID]: this.prefix + pkeyToValue(row, this.pkeys, true) };
      for (const field of this.fieldList) {
        if (field.apply('get')) {
          field.write(item, row);
        }
      }
      return item;
    });

    for (const join of this.joins) {
      await join.data(this, out);
    }
    return out;
  }

  private scope(query: Query): void {
    query.leftJoin(this.leftJoins);

    for (const entry of this.whereEntries) {
      if (typeof entry === 'function') {
        entry(query);
      } else {
        query.where(entry.key, entry.value, entry.operator);
      }
    }
  }

  private async write<T>(work: () => Promise<T>): Promise<T> {
    return this.useTransaction ? this.db.transactional(work) : work();
  }

  private mainTable(): { name: string; local: string } {
    const { name, alias } = splitTableAlias(this.tables[0] ?? '');
    return { name, local: alias ?? name };
  }

  /**
   * Submitted values of the main table's fields, keyed by column
   */
  private columnValues(action: 'create' | 'edit', values: NestedData): Record<string, Scalar> {
    const { name, local } = this.mainTable();
    const set: Record<string, Scalar> = {};

    for (const field of this.fieldList) {
      const dbField = field.dbField();
      const dot = dbField.indexOf('.');
      const table = dot === -1 ? null : dbField.slice(0, dot);

      if (table !== null && table !== name && table !== local) {
        continue;
      }
      if (field.apply(action, values)) {
        set[dbField.slice(dot + 1)] = toScalar(field.val('set', values));
      }
    }
    return set;
  }

  /**
   * Row identifier of an inserted row, from the generated key or the
   * submitted key values
   */
  private insertedKey(set: Record<string, Scalar>, insertId: Scalar): string {
    const key: NestedData = { ...set };
    const [first] = this.pkeys;

    if (this.pkeys.length === 1 && first !== undefined && insertId !== null) {
      key[first] = insertId;
    }
    return this.prefix + pkeyToValue(key, this.pkeys, true);
  }

  private keyWhere(id: string): Record<string, Scalar> {
    const parts = pkeyToArray(id, this.pkeys, { idPrefix: this.prefix, flat: true });
    const where: Record<string, Scalar> = {};
    for (const [column, value] of Object.entries(parts)) {
      where[column] = toScalar(value);
    }
    return where;
  }

  /**
   * Value joins reference the parent row by
   */
  private parentValue(id: string): Scalar {
    const [first] = this.pkeys;
    if (this.pkeys.length === 1 && first !== undefined) {
      return this.keyWhere(id)[first] ?? null;
    }
    return id.split(this.prefix).join('');
  }
}

function toList(value: string | readonly string[]): string[] {
  return typeof value === 'string' ? [value] : [...value];
}
