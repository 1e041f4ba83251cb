import type { LeftJoinDescriptor } from '../query/query';

/**
 * Label comparison used to sort option lists: numeric when both labels are
 * numbers, plain string order otherwise
 */
export function compareLabels(a: string | null, b: string | null): number {
  const left = a ?? '';
  const right = b ?? '';

  if (isNumeric(left) && isNumeric(right)) {
    return Number(left) - Number(right);
  }
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

function isNumeric(value: string): boolean {
  return value.trim() !== '' && Number.isFinite(Number(value));
}

/**
 * Columns named by an order clause, without their direction. A DISTINCT
 * select has to include them.
 */
export function orderColumns(order: string): string[] {
  return order
    .split(',')
    .map((entry) =>
      entry.toLowerCase().replace(/ asc/g, '').replace(/ desc/g, '').trim(),
    )
    .filter((column) => column !== '');
}

/**
 * Add the joins of `incoming` whose table isn't already joined
 */
export function mergeLeftJoins(
  own: readonly LeftJoinDescriptor[],
  incoming: readonly LeftJoinDescriptor[],
): LeftJoinDescriptor[] {
  const merged = [...own];
  for (const join of incoming) {
    if (!merged.some((existing) => existing.table === join.table)) {
      merged.push(join);
    }
  }
  return merged;
}

/**
 * Loose truthiness of a request flag (`true`, `'true'`, `'1'`, `'on'`, `'yes'`)
 */
export function requestFlag(value: unknown): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return value === 1;
  }
  if (typeof value === 'string') {
    return ['1', 'true', 'on', 'yes'].includes(value.trim().toLowerCase());
  }
  return false;
}
