import { ConnectionError } from '../errors';

import type { Credentials, DialectName } from '../types';
import type { SQLDialect } from '../dialect/sql-dialect';
import type { DriverConnection } from './driver-connection';

/**
 * Opens a connection for a dialect. Connector packages register one each.
 */
export type Connector = (credentials: Credentials, dialect: SQLDialect) => Promise<DriverConnection>;

const connectors = new Map<DialectName, Connector>();

/**
 * Register a connector for a dialect
 */
export function registerConnector(dialect: DialectName, connector: Connector): void {
  connectors.set(dialect, connector);
}

/**
 * Look up the connector for a dialect
 */
export function getConnector(dialect: DialectName): Connector {
  const connector = connectors.get(dialect);

  if (!connector) {
    throw new ConnectionError(
      `No connector registered for dialect: ${dialect}. ` +
        `Make sure you've imported the connector package or called registerConnector().`,
    );
  }

  return connector;
}

export function unregisterConnector(dialect: DialectName): void {
  connectors.delete(dialect);
}
