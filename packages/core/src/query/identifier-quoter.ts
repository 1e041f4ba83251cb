/**
 * Identifier Quoter
 *
 * Wraps table and column references in a dialect's quote characters.
 * Function calls and wildcards pass through untouched, and an alias
 * (`users as u` or `users u`) is kept unquoted after the identifier.
 *
 * @example
 * ```typescript
 * const quoter = new IdentifierQuoter({ left: '`', right: '`' });
 * quoter.quote('crm.users');    // `crm`.`users`
 * quoter.quote('users as u');   // `users` u
 * quoter.quote('COUNT(id)');    // COUNT(id)
 * ```
 */

export interface QuotePair {
  left: string;
  right: string;
}

export class IdentifierQuoter {
  constructor(private readonly pair: QuotePair | null) {}

  get left(): string {
    return this.pair?.left ?? '';
  }

  get right(): string {
    return this.pair?.right ?? '';
  }

  quote(identifier: string): string {
    if (!this.pair) {
      return identifier;
    }

    if (identifier.includes('(') || identifier.includes('*')) {
      return identifier;
    }

    const normalized = identifier
      .trim()
      .replace(/[\t ]+/g, ' ')
      .replace(/ as /gi, ' ');

    // More than one space is an expression we can't reason about
    if (normalized.split(' ').length > 2) {
      return normalized;
    }

    const space = normalized.indexOf(' ');
    const name = space === -1 ? normalized : normalized.slice(0, space);
    const alias = space === -1 ? '' : normalized.slice(space);
    const { left, right } = this.pair;

    return left + name.split('.').join(`${right}.${left}`) + right + alias;
  }

  /**
   * Remove the quote characters again, the inverse of `quote` for plain
   * `table.column` references
   */
  unquote(identifier: string): string {
    if (!this.pair) {
      return identifier;
    }
    const { left, right } = this.pair;
    const inner = identifier.split(`${right}.${left}`).join('.');
    return inner.slice(left.length, inner.length - right.length);
  }
}
