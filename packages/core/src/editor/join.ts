/**
 * Join
 *
 * Reads and writes the rows of a child table that belong to each row of the
 * main table, either through a foreign key in the child table or through a
 * link table holding pairs of keys. The child rows for a whole page of
 * parent rows are read with one query and grouped in memory, not one query
 * per parent row.
 *
 * @example
 * ```typescript
 * // users ←→ user_dept ←→ dept, one array of departments per user
 * const depts = new Mjoin('dept')
 *   .link('users.id', 'user_dept.user_id')
 *   .link('dept.id', 'user_dept.dept_id')
 *   .fields(new Field('id'), new Field('name'));
 *
 * await depts.data(host, rows);
 * // rows[0].dept → [{ id: 1, name: 'Sales' }, ...]
 * ```
 */

import { EDITOR_DEFAULTS } from '../constants';
import { CompoundKeyError, ValidationError } from '../errors';
import { scalarToString, toScalar } from '../utils/scalar';
import { splitTableAlias } from './editor-host';
import { isNestedData, propExists, readProp } from './nested-data';

import type { Database } from '../database';
import type { LeftJoinDescriptor, Query, WhereCallback } from '../query/query';
import type { Scalar } from '../types';
import type { EditorHost } from './editor-host';
import type { Field, FieldError } from './field';
import type { NestedData } from './nested-data';
import type { OptionItem } from './options';

export type JoinType = 'object' | 'array';

/**
 * Validator for the whole submitted join value. Returns an error message,
 * or anything else when valid.
 */
export type JoinValidator = (
  host: EditorHost,
  action: 'create' | 'edit',
  data: unknown,
) => string | true | null | Promise<string | true | null>;

type JoinConfig =
  | { kind: 'direct'; parent: string; child: string }
  | { kind: 'link'; table: string; parent: [string, string]; child: [string, string] };

interface WhereEntry {
  key: string;
  value: Scalar;
  operator: string;
}

interface ParentTable {
  name: string;
  /** Name used in conditions: the alias when the table is aliased */
  local: string;
}

export class Join {
  private tableName = '';
  private joinName = '';
  private joinType: JoinType;
  private getEnabled = true;
  private setEnabled = true;
  private customOrder: string | null = null;
  private whereSetEnabled = false;
  private config: JoinConfig | null = null;
  private readonly links: string[] = [];
  private readonly fieldList: Field[] = [];
  private readonly leftJoins: LeftJoinDescriptor[] = [];
  private readonly whereEntries: Array<WhereEntry | WhereCallback> = [];
  private readonly validators: Array<{ fieldName: string; fn: JoinValidator }> = [];

  constructor(table?: string, type: JoinType = 'object') {
    if (table !== undefined) {
      this.table(table);
    }
    this.joinType = type;
  }

  // ============ Configuration ============

  /**
   * Child table. Also sets the name the join is read and written under;
   * call `name()` afterwards for a different one.
   */
  table(table: string): this {
    this.tableName = table;
    this.joinName = table;
    return this;
  }

  getTable(): string {
    return this.tableName;
  }

  name(name: string): this {
    this.joinName = name;
    return this;
  }

  getName(): string {
    return this.joinName;
  }

  type(type: JoinType): this {
    this.joinType = type;
    return this;
  }

  getType(): JoinType {
    return this.joinType;
  }

  get(enabled: boolean): this {
    this.getEnabled = enabled;
    return this;
  }

  set(enabled: boolean): this {
    this.setEnabled = enabled;
    return this;
  }

  fields(...fields: Field[]): this {
    this.fieldList.push(...fields);
    return this;
  }

  getFields(): Field[] {
    return [...this.fieldList];
  }

  /**
   * A configured field by its client-side name
   */
  field(name: string): Field {
    const field = this.fieldList.find((candidate) => candidate.name() === name);
    if (!field) {
      throw new ValidationError(`Unknown field: ${name}`, name);
    }
    return field;
  }

  /**
   * Explicit join columns. Without `table` the child table holds `child`, a
   * reference to the parent's `parent` column. With a link table, `parent`
   * is [parent column, link column] and `child` is [child column, link
   * column].
   */
  join(parent: string, child: string): this;
  join(parent: [string, string], child: [string, string], table: string): this;
  join(parent: string | [string, string], child: string | [string, string], table?: string): this {
    if (typeof parent === 'string' && typeof child === 'string') {
      this.config = { kind: 'direct', parent, child };
    } else if (typeof parent !== 'string' && typeof child !== 'string' && table !== undefined) {
      this.config = { kind: 'link', table, parent, child };
    } else {
      throw new ValidationError('A link table join needs column pairs for both sides', 'join');
    }
    return this;
  }

  /**
   * Join columns as `table.column` pairs. Once for a direct join, twice
   * when going through a link table (parent side first).
   */
  link(field1: string, field2: string): this {
    if (!field1.includes('.') || !field2.includes('.')) {
      throw new ValidationError('Link fields must contain both the table name and the column name', 'link');
    }
    if (this.links.length >= 4) {
      throw new ValidationError('Link method cannot be called more than twice for a single instance', 'link');
    }

    this.links.push(field1, field2);
    return this;
  }

  leftJoin(table: string, field1: string, operator?: string, field2?: string): this {
    this.leftJoins.push({ table, field1, operator: operator ?? null, field2: field2 ?? null });
    return this;
  }

  order(order: string | null): this {
    this.customOrder = order;
    return this;
  }

  getOrder(): string | null {
    return this.customOrder;
  }

  /**
   * Condition on the child table, applied when reading and removing
   */
  where(key: string | WhereCallback, value: Scalar = null, operator = '='): this {
    this.whereEntries.push(typeof key === 'function' ? key : { key, value, operator });
    return this;
  }

  /**
   * Also write the `where` values into created and updated child rows
   */
  whereSet(enabled: boolean): this {
    this.whereSetEnabled = enabled;
    return this;
  }

  validator(fieldName: string, fn: JoinValidator): this {
    this.validators.push({ fieldName, fn });
    return this;
  }

  // ============ Processing ============

  /**
   * Attach the joined data to each of the output rows, under the join's
   * name. Rows without matches get an empty object or array.
   */
  async data(host: EditorHost, rows: NestedData[]): Promise<void> {
    if (!this.getEnabled) {
      return;
    }

    const config = this.prepare(host);
    const parent = this.parentTable(host);
    const pkeys = host.pkey();

    if (pkeys.length > 1) {
      throw new CompoundKeyError(
        'MJoin is not currently supported with a compound primary key for the main table',
      );
    }

    const first = rows[0];
    if (first === undefined) {
      return;
    }

    const pkey = pkeys[0] ?? 'id';
    const joinField = config.kind === 'link' ? config.parent[0] : config.parent;
    const pkeyIsJoin = pkey === joinField || pkey === `${parent.local}.${joinField}`;

    const query = host.db
      .query('select')
      .distinct(true)
      .get(`${parent.local}.${joinField} as ${EDITOR_DEFAULTS.JOIN_KEY_ALIAS}`)
      .get(this.selectFields())
      .table(parent.local === parent.name ? parent.name : `${parent.name} as ${parent.local}`);

    if (this.customOrder !== null) {
      query.order(this.customOrder);
    }

    query.leftJoin(this.leftJoins);
    this.applyWhere(query);

    if (config.kind === 'link') {
      query
        .join(config.table, `${parent.local}.${config.parent[0]} = ${config.table}.${config.parent[1]}`)
        .join(this.tableName, `${this.tableName}.${config.child[0]} = ${config.table}.${config.child[1]}`);
    } else {
      query.join(this.tableName, `${this.tableName}.${config.child} = ${parent.local}.${config.parent}`);
    }

    let readField = joinField;
    if (propExists(first, `${parent.name}.${joinField}`)) {
      readField = `${parent.name}.${joinField}`;
    } else if (!propExists(first, joinField) && !pkeyIsJoin) {
      throw new ValidationError(
        `Join was performed on the field '${joinField}' which was not included in the Editor ` +
          'field list. The join field must be included as a regular field in the Editor instance.',
        joinField,
      );
    }

    const idPrefix = host.idPrefix();
    const keyOf = (row: NestedData): string =>
      pkeyIsJoin
        ? stripPrefix(scalarToString(row[EDITOR_DEFAULTS.ROW_ID]), idPrefix)
        : scalarToString(readProp(row, readField));

    if (rows.length < EDITOR_DEFAULTS.JOIN_BATCH_LIMIT) {
      query.whereIn(`${parent.local}.${joinField}`, rows.map(keyOf));
    }

    const grouped = new Map<string, NestedData | NestedData[]>();
    for (const row of (await query.exec()).fetchAll()) {
      const inner: NestedData = {};
      for (const field of this.fieldList) {
        if (field.apply('get')) {
          field.write(inner, row);
        }
      }

      const key = scalarToString(row[EDITOR_DEFAULTS.JOIN_KEY_ALIAS]);
      if (this.joinType === 'object') {
        grouped.set(key, inner);
      } else {
        const list = grouped.get(key);
        if (Array.isArray(list)) {
          list.push(inner);
        } else {
          grouped.set(key, [inner]);
        }
      }
    }

    for (const row of rows) {
      row[this.joinName] = grouped.get(keyOf(row)) ?? (this.joinType === 'object' ? {} : []);
    }
  }

  /**
   * Write the submitted join data of a newly created parent row. Nothing is
   * written unless the client sent the join value and its `-many-count`.
   */
  async create(host: EditorHost, parentId: Scalar, data: NestedData): Promise<void> {
    const value = data[this.joinName];
    if (!this.setEnabled || value === undefined || data[`${this.joinName}-many-count`] === undefined) {
      return;
    }

    const config = this.prepare(host);

    for (const item of this.submittedItems(value)) {
      await this.insert(host.db, config, parentId, item);
    }
  }

  /**
   * Object joins are updated in place (or inserted). Array joins are
   * replaced: the existing child rows are removed and the submitted ones
   * created.
   */
  async update(host: EditorHost, parentId: Scalar, data: NestedData): Promise<void> {
    if (!this.setEnabled || data[`${this.joinName}-many-count`] === undefined) {
      return;
    }

    const config = this.prepare(host);

    if (this.joinType === 'object') {
      const value = data[this.joinName];
      await this.updateRow(host.db, config, parentId, isNestedData(value) ? value : {});
    } else {
      await this.remove(host, [parentId]);
      await this.create(host, parentId, data);
    }
  }

  /**
   * Remove the child rows (or link rows) of the given parent keys. No
   * parent keys removes nothing.
   */
  async remove(host: EditorHost, ids: readonly Scalar[]): Promise<void> {
    if (!this.setEnabled || ids.length === 0) {
      return;
    }

    const config = this.prepare(host);

    if (config.kind === 'link') {
      await host.db.query('delete').table(config.table).orWhere(config.parent[1], ids).exec();
      return;
    }

    const query = host.db
      .query('delete')
      .table(this.tableName)
      .whereGroup((q) => {
        q.orWhere(config.child, ids);
      });
    this.applyWhere(query);
    await query.exec();
  }

  async validate(
    errors: FieldError[],
    host: EditorHost,
    data: NestedData,
    action: 'create' | 'edit',
  ): Promise<void> {
    if (!this.setEnabled && data[`${this.joinName}-many-count`] === undefined) {
      return;
    }

    this.prepare(host);
    const joinData = data[this.joinName] ?? [];

    for (const validator of this.validators) {
      const result = await validator.fn(host, action, joinData);
      if (typeof result === 'string') {
        errors.push({ name: validator.fieldName, status: result });
      }
    }

    const prefix = this.joinType === 'object' ? `${this.joinName}.` : `${this.joinName}[].`;
    for (const item of this.submittedItems(joinData)) {
      for (const field of this.fieldList) {
        const status = await field.validate(item, { action, id: null, db: host.db });
        if (status !== true) {
          errors.push({ name: prefix + field.name(), status });
        }
      }
    }
  }

  /**
   * Option lists of the join's fields, keyed `name.field` for object joins
   * and `name[].field` for array joins
   */
  async options(out: Record<string, OptionItem[]>, db: Database, refresh: boolean): Promise<void> {
    for (const field of this.fieldList) {
      const options = field.getOptions();
      if (!options) {
        continue;
      }

      const items = await options.exec(db, refresh);
      if (items !== null) {
        const separator = this.joinType === 'object' ? '.' : '[].';
        out[this.joinName + separator + field.name()] = items;
      }
    }
  }

  // ============ Internals ============

  /**
   * Resolve the join columns, from `link()` calls when `join()` wasn't used
   */
  private prepare(host: EditorHost): JoinConfig {
    if (this.config) {
      return this.config;
    }

    const [l1, l2, l3, l4] = this.links.map(splitColumn);
    if (!l1 || !l2) {
      throw new ValidationError(`Join \`${this.joinName}\` has no join columns: use link() or join()`, 'join');
    }

    const editorTable = this.parentTable(host).local;

    if (!l3 || !l4) {
      this.config =
        l1.table === editorTable
          ? { kind: 'direct', parent: l1.column, child: l2.column }
          : { kind: 'direct', parent: l2.column, child: l1.column };
      return this.config;
    }

    const isLinkTable = (table: string): boolean => table !== editorTable && table !== this.tableName;
    const linkTable = [l1, l2, l3].find((link) => isLinkTable(link.table)) ?? l4;

    this.config = {
      kind: 'link',
      table: linkTable.table,
      parent: [l1.column, l2.column],
      child: [l3.column, l4.column],
    };
    return this.config;
  }

  private parentTable(host: EditorHost): ParentTable {
    const { name, alias } = splitTableAlias(host.table()[0] ?? '');
    return { name, local: alias ?? name };
  }

  /**
   * Child columns to read, qualified with the child table
   */
  private selectFields(): string[] {
    return this.fieldList
      .filter((field) => field.apply('get'))
      .map((field) => {
        const dbField = field.dbField();
        return dbField.includes('.') ? dbField : `${this.tableName}.${dbField} as ${dbField}`;
      });
  }

  private applyWhere(query: Query): void {
    for (const entry of this.whereEntries) {
      if (typeof entry === 'function') {
        entry(query);
      } else {
        query.where(entry.key, entry.value, entry.operator);
      }
    }
  }

  private submittedItems(value: unknown): NestedData[] {
    if (this.joinType === 'object') {
      return isNestedData(value) ? [value] : [];
    }
    return Array.isArray(value) ? value.filter(isNestedData) : [];
  }

  private async insert(db: Database, config: JoinConfig, parentId: Scalar, data: NestedData): Promise<void> {
    if (config.kind === 'link') {
      await db
        .query('insert')
        .table(config.table)
        .set(config.parent[1], parentId)
        .set(config.child[1], toScalar(data[config.child[0]]))
        .exec();
      return;
    }

    const query = db.query('insert').table(this.tableName).set(config.child, parentId);

    for (const field of this.fieldList) {
      if (field.apply('set', data)) {
        query.set(field.dbField(), toScalar(field.val('set', data)));
      }
    }

    if (this.whereSetEnabled) {
      for (const entry of this.whereEntries) {
        if (typeof entry !== 'function') {
          query.set(entry.key, entry.value);
        }
      }
    }

    await query.exec();
  }

  private async updateRow(db: Database, config: JoinConfig, parentId: Scalar, data: NestedData): Promise<void> {
    if (config.kind === 'link') {
      await db.push(
        config.table,
        { [config.parent[1]]: parentId, [config.child[1]]: toScalar(data[config.child[0]]) },
        { [config.parent[1]]: parentId },
      );
      return;
    }

    const set: Record<string, Scalar> = { [config.child]: parentId };
    for (const field of this.fieldList) {
      if (field.apply('set', data)) {
        set[field.dbField()] = toScalar(field.val('set', data));
      }
    }

    const where: Record<string, Scalar> = { [config.child]: parentId };
    for (const entry of this.whereEntries) {
      if (typeof entry === 'function') {
        continue;
      }
      where[entry.key] = entry.value;
      if (this.whereSetEnabled) {
        set[entry.key] = entry.value;
      }
    }

    await db.push(this.tableName, set, where);
  }
}

function splitColumn(reference: string): { table: string; column: string } {
  const dot = reference.indexOf('.');
  return { table: reference.slice(0, dot), column: reference.slice(dot + 1) };
}

function stripPrefix(id: string, prefix: string): string {
  return prefix ? id.split(prefix).join('') : id;
}
