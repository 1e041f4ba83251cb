/**
 * Limit Strategies
 *
 * Most engines take a fragment appended to the statement. Oracle has no
 * such fragment, so its strategy rewraps the finished SELECT instead.
 * Only values greater than zero are rendered.
 */

export interface LimitWindow {
  limit: number | null;
  offset: number | null;
}

export interface LimitStrategy {
  readonly mode: 'append' | 'wrap';
  /** Fragment appended to SELECT and COUNT statements */
  fragment(window: LimitWindow): string;
  /** Final rewrite of a complete SELECT statement */
  finalize(sql: string, window: LimitWindow): string;
}

const positive = (value: number | null): value is number => value !== null && value > 0;

/**
 * `LIMIT n OFFSET m`
 */
export class LimitOffsetStrategy implements LimitStrategy {
  readonly mode = 'append';

  /**
   * @param offsetOnlyLimit - row count to emit when only an offset is given,
   * for engines that refuse OFFSET without LIMIT
   */
  constructor(private readonly offsetOnlyLimit: string | null = null) {}

  fragment({ limit, offset }: LimitWindow): string {
    const parts: string[] = [];

    if (positive(limit)) {
      parts.push(`LIMIT ${limit}`);
    } else if (positive(offset) && this.offsetOnlyLimit !== null) {
      parts.push(`LIMIT ${this.offsetOnlyLimit}`);
    }

    if (positive(offset)) {
      parts.push(`OFFSET ${offset}`);
    }

    return parts.join(' ');
  }

  finalize(sql: string): string {
    return sql;
  }
}

/**
 * `OFFSET m ROWS FETCH NEXT n ROWS ONLY`
 */
export class OffsetFetchStrategy implements LimitStrategy {
  readonly mode = 'append';

  fragment({ limit, offset }: LimitWindow): string {
    const parts: string[] = [];

    if (positive(offset)) {
      parts.push(`OFFSET ${offset} ROWS`);
    }

    if (positive(limit)) {
      if (!positive(offset)) {
        parts.push('OFFSET 0 ROWS');
      }
      parts.push(`FETCH NEXT ${limit} ROWS ONLY`);
    }

    return parts.join(' ');
  }

  finalize(sql: string): string {
    return sql;
  }
}

/**
 * Wrap the statement in a derived table bounded by ROWNUM
 */
export class RownumWrapStrategy implements LimitStrategy {
  readonly mode = 'wrap';

  fragment(): string {
    return '';
  }

  finalize(sql: string, { limit, offset }: LimitWindow): string {
    if (!positive(limit) && !positive(offset)) {
      return sql;
    }

    const skip = positive(offset) ? offset : 0;
    const numbered = `select rownum rnum, a.* from (${sql}) a`;
    const inner = positive(limit) ? `${numbered} where rownum <= ${skip + limit}` : numbered;

    return `select * from (${inner}) where rnum > ${skip}`;
  }
}
