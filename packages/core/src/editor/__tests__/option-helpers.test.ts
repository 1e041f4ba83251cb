import { describe, it, expect } from 'vitest';

import { compareLabels, mergeLeftJoins, orderColumns, requestFlag } from '../option-helpers';

describe('option helpers', () => {
  it('should compare numeric labels as numbers', () => {
    const labels = ['10', '9', '100'];
    labels.sort(compareLabels);

    expect(labels).toEqual(['9', '10', '100']);
  });

  it('should compare other labels as strings', () => {
    expect(compareLabels('Bath', 'Leeds')).toBeLessThan(0);
    expect(compareLabels('Leeds', 'Bath')).toBeGreaterThan(0);
    expect(compareLabels(null, '')).toBe(0);
    expect(compareLabels('9', 'Bath')).toBeLessThan(0);
  });

  it('should list the columns of an order clause', () => {
    expect(orderColumns('Name ASC, city desc,')).toEqual(['name', 'city']);
  });

  it('should merge joins on tables not yet joined', () => {
    const own = [{ table: 'sites', field1: 'sites.id', operator: '=', field2: 'users.site' }];

    expect(
      mergeLeftJoins(own, [
        { table: 'sites', field1: 'other' },
        { table: 'teams', field1: 'teams.id = users.team' },
      ]),
    ).toEqual([...own, { table: 'teams', field1: 'teams.id = users.team' }]);
  });

  it('should read loose request flags', () => {
    expect(requestFlag('true')).toBe(true);
    expect(requestFlag(' Yes ')).toBe(true);
    expect(requestFlag(1)).toBe(true);
    expect(requestFlag('false')).toBe(false);
    expect(requestFlag(undefined)).toBe(false);
  });
});
