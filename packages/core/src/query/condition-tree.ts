/**
 * Condition Tree
 *
 * Ordered list of conditions and group markers making up a WHERE clause.
 * Groups nest through open/close markers; an empty group renders `1=1`.
 */

import { ValidationError } from '../errors';

import type { Scalar } from '../types';
import type { BindingList } from './binding-sanitizer';

export type Conjunction = 'AND' | 'OR';

export interface ConditionEntry {
  kind: 'condition';
  joinOperator: Conjunction;
  /** Quoted column, null for column-to-column comparisons */
  field: string | null;
  fragment: string;
}

export interface GroupEntry {
  kind: 'group';
  joinOperator: Conjunction;
  groupChar: '(' | ')';
}

export type TreeEntry = ConditionEntry | GroupEntry;

/**
 * The dialect hooks the tree needs to render conditions
 */
export interface ConditionDialect {
  escapeIdentifier(identifier: string): string;
  textSearchFragment(column: string, placeholder: string): string;
}

export class ConditionTree {
  private readonly entries: TreeEntry[] = [];
  private inCounter = 1;

  constructor(
    private readonly dialect: ConditionDialect,
    private readonly bindings: BindingList,
  ) {}

  get length(): number {
    return this.entries.length;
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  addCondition(
    column: string,
    value: Scalar | undefined,
    operator: string,
    joinOperator: Conjunction,
    bindable: boolean,
  ): this {
    const field = this.dialect.escapeIdentifier(column);

    if (value === null || value === undefined) {
      this.push(joinOperator, field, `${field} ${operator === '=' ? 'IS NULL' : 'IS NOT NULL'}`);
    } else if (bindable) {
      const binding = this.bindings.add(`:where_${this.entries.length}`, value);
      const fragment = operator.toLowerCase() === 'like'
        ? this.dialect.textSearchFragment(field, binding.name)
        : `${field} ${operator} ${binding.name}`;
      this.push(joinOperator, field, fragment);
    } else {
      this.entries.push({
        kind: 'condition',
        joinOperator,
        field: null,
        fragment: `${field} ${operator} ${this.dialect.escapeIdentifier(String(value))}`,
      });
    }

    return this;
  }

  addRawGroup(open: boolean, joinOperator: Conjunction): this {
    this.entries.push({ kind: 'group', joinOperator, groupChar: open ? '(' : ')' });
    return this;
  }

  addInCondition(column: string, values: readonly Scalar[], joinOperator: Conjunction): this {
    if (values.length === 0) {
      return this;
    }

    const placeholders = values.map((value) => {
      const binding = this.bindings.add(`:wherein${this.inCounter}`, value);
      this.inCounter++;
      return binding.name;
    });

    const field = this.dialect.escapeIdentifier(column);
    this.push(joinOperator, field, `${field} IN (${placeholders.join(', ')})`);
    return this;
  }

  /**
   * Render to `WHERE ...`, or an empty string when there are no entries
   */
  render(): string {
    if (this.isEmpty) {
      return '';
    }

    this.assertBalanced();

    const tokens: string[] = [];
    this.entries.forEach((entry, i) => {
      const previous = i > 0 ? this.entries[i - 1] : undefined;
      const afterOpen = previous?.kind === 'group' && previous.groupChar === '(';

      if (entry.kind === 'group' && entry.groupChar === ')') {
        if (afterOpen) {
          tokens.push('1=1');
        }
        tokens.push(')');
        return;
      }

      if (i > 0 && !afterOpen) {
        tokens.push(entry.joinOperator);
      }
      tokens.push(entry.kind === 'group' ? '(' : entry.fragment);
    });

    let text = '';
    for (const token of tokens) {
      text += text === '' || text.endsWith('(') || token === ')' ? token : ` ${token}`;
    }

    return `WHERE ${text}`;
  }

  private push(joinOperator: Conjunction, field: string, fragment: string): void {
    this.entries.push({ kind: 'condition', joinOperator, field, fragment });
  }

  private assertBalanced(): void {
    let depth = 0;
    for (const entry of this.entries) {
      if (entry.kind !== 'group') {
        continue;
      }
      depth += entry.groupChar === '(' ? 1 : -1;
      if (depth < 0) {
        throw new ValidationError('Where group closed before it was opened');
      }
    }
    if (depth !== 0) {
      throw new ValidationError('Where group opened but never closed');
    }
  }
}
