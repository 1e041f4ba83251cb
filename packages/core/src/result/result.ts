/**
 * Result
 *
 * Cursor over the rows a statement returned. Rows are handed out once:
 * `fetch` advances, `fetchAll` drains what is left.
 */

import type { StatementOutcome } from '../driver/driver-connection';
import type { Row, Scalar } from '../types';

export class Result {
  private position = 0;

  constructor(
    private readonly outcome: StatementOutcome,
    private readonly readInsertId: () => Scalar = () => null,
  ) {}

  /**
   * Next row, or null once the rows are exhausted
   */
  fetch(): Row | null {
    if (this.position >= this.outcome.rows.length) {
      return null;
    }
    const row = this.outcome.rows[this.position];
    this.position++;
    return row ?? null;
  }

  /**
   * All rows not yet fetched
   */
  fetchAll(): Row[] {
    const rows = this.outcome.rows.slice(this.position);
    this.position = this.outcome.rows.length;
    return rows;
  }

  /**
   * Affected row count as reported by the driver, otherwise the number of
   * rows returned
   */
  count(): number {
    return this.outcome.rowCount ?? this.outcome.rows.length;
  }

  /**
   * Key generated by the insert that produced this result
   */
  insertId(): Scalar {
    return this.readInsertId();
  }
}
