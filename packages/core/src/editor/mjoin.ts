import { Join } from './join';

/**
 * One-to-many join: each parent row gets an array of child rows
 */
export class Mjoin extends Join {
  constructor(table?: string) {
    super(table, 'array');
  }
}
