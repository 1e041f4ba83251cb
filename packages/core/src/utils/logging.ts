/**
 * Logging helpers shared by the database facade and the drivers.
 */

import { LOGGING_DEFAULTS } from '../constants';

import type { Binding, Logger } from '../types';

/* eslint-disable no-console */
export const consoleLogger: Logger = {
  debug: (msg, ...args) => console.debug(`${LOGGING_DEFAULTS.PREFIX} ${msg}`, ...args),
  info: (msg, ...args) => console.info(`${LOGGING_DEFAULTS.PREFIX} ${msg}`, ...args),
  warn: (msg, ...args) => console.warn(`${LOGGING_DEFAULTS.PREFIX} ${msg}`, ...args),
  error: (msg, ...args) => console.error(`${LOGGING_DEFAULTS.PREFIX} ${msg}`, ...args),
};
/* eslint-enable no-console */

/**
 * Truncate long SQL for logging
 */
export function truncateSql(sql: string, maxLength: number = LOGGING_DEFAULTS.MAX_SQL_LENGTH): string {
  if (sql.length <= maxLength) {
    return sql;
  }
  return `${sql.slice(0, maxLength)}...`;
}

/**
 * Render bindings as `name=value` pairs, shortened for log lines
 */
export function formatBindings(
  bindings: Binding[],
  maxLength: number = LOGGING_DEFAULTS.MAX_BINDINGS_LENGTH,
): string {
  const str = bindings
    .map((binding) => `${binding.name}=${JSON.stringify(serializable(binding.value))}`)
    .join(', ');
  if (str.length <= maxLength) {
    return str;
  }
  return `${str.slice(0, maxLength)}...`;
}

function serializable(value: Binding['value']): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (Buffer.isBuffer(value)) {
    return `<Buffer ${value.length} bytes>`;
  }
  return value;
}
