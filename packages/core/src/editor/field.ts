/**
 * Field
 *
 * Maps one database column to a property of the rows sent to and received
 * from the client. The database side is `dbField` (may be `table.column` or
 * an SQL function), the client side is `name` (may be a dotted path).
 *
 * @example
 * ```typescript
 * const field = new Field('users.first_name as name.first')
 *   .getFormatter((value) => String(value).toUpperCase())
 *   .validator((value) => (value ? true : 'A first name is required'));
 * ```
 */

import { ValidationError } from '../errors';
import { propExists, readProp, writeProp } from './nested-data';

import type { Database } from '../database';
import type { Scalar } from '../types';
import type { NestedData } from './nested-data';
import type { Options } from './options';
import type { SearchBuilderOptions } from './search-builder-options';
import type { SearchPaneOptions } from './search-pane-options';

export type FieldSet = 'none' | 'both' | 'create' | 'edit';
export type FieldAction = 'get' | 'set' | 'create' | 'edit';

export type Formatter = (value: unknown, data: NestedData) => unknown;

export type FieldValue = Scalar | readonly FieldValue[] | { [key: string]: FieldValue };

/**
 * A fixed value, or a function called each time the value is needed
 */
export type ValueSource = FieldValue | (() => FieldValue);

/**
 * A validation failure, reported against the client-side field name
 */
export interface FieldError {
  name: string;
  status: string;
}

export interface ValidationContext {
  action: 'create' | 'edit';
  id: string | null;
  db: Database;
}

/**
 * Returns `true` when the value is valid, otherwise the error message
 */
export type FieldValidator = (
  value: unknown,
  data: NestedData,
  field: Field,
  context: ValidationContext,
) => true | string | Promise<true | string>;

const ALIAS_SPLIT = / as (?![^(]*\))/i;

export class Field {
  private readonly dbFieldName: string;
  private readonly fieldName: string;
  private getEnabled = true;
  private setMode: FieldSet = 'both';
  private getFormatterFn: Formatter | null = null;
  private setFormatterFn: Formatter | null = null;
  private getValueSource: ValueSource | undefined = undefined;
  private setValueSource: ValueSource | undefined = undefined;
  private readonly validators: FieldValidator[] = [];
  private optionsInstance: Options | null = null;
  private searchPaneOptionsInstance: SearchPaneOptions | null = null;
  private searchBuilderOptionsInstance: SearchBuilderOptions | null = null;

  constructor(dbField: string, name?: string) {
    const split = name === undefined ? dbField.split(ALIAS_SPLIT) : [dbField];

    if (split.length > 1) {
      this.dbFieldName = (split[0] ?? dbField).trim();
      this.fieldName = (split[1] ?? dbField).trim();
    } else {
      this.dbFieldName = dbField;
      this.fieldName = name ?? dbField;
    }
  }

  dbField(): string {
    return this.dbFieldName;
  }

  name(): string {
    return this.fieldName;
  }

  // ============ Configuration ============

  /**
   * Whether the field is read from the database
   */
  get(enabled: boolean): this {
    this.getEnabled = enabled;
    return this;
  }

  getGet(): boolean {
    return this.getEnabled;
  }

  /**
   * Which write actions the field takes part in. `true` is `'both'`,
   * `false` is `'none'`.
   */
  set(mode: FieldSet | boolean): this {
    this.setMode = mode === true ? 'both' : mode === false ? 'none' : mode;
    return this;
  }

  getSet(): FieldSet {
    return this.setMode;
  }

  getFormatter(formatter: Formatter | null): this {
    this.getFormatterFn = formatter;
    return this;
  }

  setFormatter(formatter: Formatter | null): this {
    this.setFormatterFn = formatter;
    return this;
  }

  /**
   * Value used on read instead of the database value
   */
  getValue(value: ValueSource): this {
    this.getValueSource = value;
    return this;
  }

  hasGetValue(): boolean {
    return this.getValueSource !== undefined;
  }

  /**
   * Value written instead of the submitted one
   */
  setValue(value: ValueSource): this {
    this.setValueSource = value;
    return this;
  }

  hasSetValue(): boolean {
    return this.setValueSource !== undefined;
  }

  validator(validator: FieldValidator): this {
    this.validators.push(validator);
    return this;
  }

  options(options: Options | null): this {
    this.optionsInstance = options;
    return this;
  }

  getOptions(): Options | null {
    return this.optionsInstance;
  }

  searchPaneOptions(options: SearchPaneOptions | null): this {
    this.searchPaneOptionsInstance = options;
    return this;
  }

  getSearchPaneOptions(): SearchPaneOptions | null {
    return this.searchPaneOptionsInstance;
  }

  searchBuilderOptions(options: SearchBuilderOptions | null): this {
    this.searchBuilderOptionsInstance = options;
    return this;
  }

  getSearchBuilderOptions(): SearchBuilderOptions | null {
    return this.searchBuilderOptionsInstance;
  }

  // ============ Processing ============

  /**
   * Whether the field takes part in an action. Write actions also need the
   * field to be in the submitted data, unless a set value is configured.
   */
  apply(action: FieldAction, data?: NestedData | null): boolean {
    if (action === 'get') {
      return this.getEnabled;
    }

    if (this.setMode === 'none') {
      return false;
    }
    if (action === 'create' && this.setMode === 'edit') {
      return false;
    }
    if (action === 'edit' && this.setMode === 'create') {
      return false;
    }

    if (!this.hasSetValue() && (!data || !propExists(data, this.fieldName))) {
      return false;
    }
    return true;
  }

  /**
   * The value for a direction: for `get` it is read from a database row by
   * `dbField`, for `set` from submitted data by `name`. Formatters apply.
   */
  val(direction: 'get' | 'set', data: NestedData): unknown {
    if (direction === 'get') {
      const value = this.hasGetValue() ? resolve(this.getValueSource) : (data[this.dbFieldName] ?? null);
      return this.getFormatterFn ? this.getFormatterFn(value, data) : value;
    }

    if (this.dbFieldName.includes('(')) {
      throw new ValidationError(
        `Cannot set the value for an SQL function field. These fields are read only: ${this.fieldName}`,
        this.fieldName,
      );
    }

    const value = this.submittedValue(data);
    return this.setFormatterFn ? this.setFormatterFn(value, data) : value;
  }

  /**
   * Run the validators in order. The first message returned wins.
   */
  async validate(data: NestedData, context: ValidationContext): Promise<true | string> {
    if (this.validators.length === 0) {
      return true;
    }

    const value = this.submittedValue(data);

    for (const validator of this.validators) {
      const result = await validator(value, data, this, context);
      if (result !== true) {
        return result;
      }
    }
    return true;
  }

  /**
   * Write the read value of a database row into the output row
   */
  write(out: NestedData, row: NestedData): void {
    writeProp(out, this.fieldName, this.val('get', row));
  }

  private submittedValue(data: NestedData): unknown {
    return this.hasSetValue() ? resolve(this.setValueSource) : readProp(data, this.fieldName);
  }
}

function resolve(source: ValueSource | undefined): FieldValue | undefined {
  return typeof source === 'function' ? source() : source;
}
