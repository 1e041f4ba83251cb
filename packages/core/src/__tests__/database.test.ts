import { describe, it, expect, vi, afterEach } from 'vitest';

import { Database } from '../database';
import { registerConnector, unregisterConnector } from '../driver/connector-registry';
import { ConnectionError, TransactionError } from '../errors';
import { createTestDatabase, FakeConnection, rows } from './helpers/fake-connection';

describe('Database', () => {
  describe('shortcuts', () => {
    it('should select with fields, conditions and ordering', async () => {
      const { db, connection } = createTestDatabase('Mysql');

      await db.selectDistinct('users', 'site', { active: 1 }, 'site');

      expect(connection.statements).toEqual([
        "SELECT DISTINCT `site` as 'site' FROM `users` WHERE `active` = :where_0 ORDER BY `site`",
      ]);
    });

    it('should count rows under the cnt alias', async () => {
      const { db, connection } = createTestDatabase('Mysql');
      connection.respond(rows({ cnt: '3' }));

      const count = await db.count('users', 'id', { site: 2 });

      expect(count).toBe(3);
      expect(connection.statements).toEqual(['SELECT COUNT(`id`) as `cnt` FROM `users` WHERE `site` = :where_0']);
    });

    it('should check for any matching row', async () => {
      const { db, connection } = createTestDatabase('Mysql');
      connection.respond(rows({ id: 1 }));

      await expect(db.any('users', { site: 2 })).resolves.toBe(true);
      await expect(db.any('users', { site: 3 })).resolves.toBe(false);
      expect(connection.statements[0]).toBe('SELECT * FROM `users` WHERE `site` = :where_0 LIMIT 1');
    });

    it('should delete by condition', async () => {
      const { db, connection } = createTestDatabase('Postgres');
      connection.respond({ rows: [], rowCount: 2 });

      const result = await db.delete('users', { site: 2 });

      expect(result.count()).toBe(2);
      expect(connection.statements).toEqual(['DELETE FROM "users" WHERE "site" = :where_0']);
    });

    it('should quote literals through the connection', () => {
      const { db } = createTestDatabase('Mysql');

      expect(db.quote("O'Brien")).toBe("'O''Brien'");
    });
  });

  describe('push', () => {
    it('should update a row that exists', async () => {
      const { db, connection } = createTestDatabase('Mysql');
      connection.respond(rows({ id: 1 }));

      await db.push('users', { name: 'Ada' }, { id: 1 });

      expect(connection.statements).toEqual([
        'SELECT * FROM `users` WHERE `id` = :where_0',
        'UPDATE `users` SET `name` = :name WHERE `id` = :where_0',
      ]);
    });

    it('should insert with the condition values when no row matches', async () => {
      const { db, connection } = createTestDatabase('Mysql');
      connection.insertId = 5;

      const result = await db.push('users', { name: 'Ada' }, { id: 1, name: 'ignored' }, 'id');

      expect(connection.statements).toEqual([
        "SELECT `id` as 'id' FROM `users` WHERE `id` = :where_0 AND `name` = :where_1",
        'INSERT INTO `users` (`name`, `id`) VALUES (:name, :id)',
      ]);
      expect(connection.prepared[1]?.values.get(':name')).toBe('Ada');
      expect(result.insertId()).toBe(5);
    });
  });

  describe('transactions', () => {
    it('should begin and commit', async () => {
      const { db, connection } = createTestDatabase('Mysql');
      const onTransaction = vi.fn();
      db.on('transaction', onTransaction);

      await db.transaction();
      expect(db.isTransactionActive).toBe(true);
      await db.commit();

      expect(db.isTransactionActive).toBe(false);
      expect(connection.transactions).toEqual(['begin', 'commit']);
      expect(onTransaction.mock.calls).toEqual([['begin'], ['commit']]);
    });

    it('should refuse nested transactions', async () => {
      const { db } = createTestDatabase('Mysql');
      await db.transaction();

      await expect(db.transaction()).rejects.toThrow(TransactionError);
    });

    it('should refuse commit and rollback outside a transaction', async () => {
      const { db } = createTestDatabase('Mysql');

      await expect(db.commit()).rejects.toThrow('Cannot commit: no transaction is active');
      await expect(db.rollback()).rejects.toThrow('Cannot rollback: no transaction is active');
    });

    it('should commit the work of transactional', async () => {
      const { db, connection } = createTestDatabase('Mysql');

      const value = await db.transactional(async (tx) => {
        await tx.sql('SELECT 1');
        return 'done';
      });

      expect(value).toBe('done');
      expect(connection.transactions).toEqual(['begin', 'commit']);
    });

    it('should roll back and rethrow when the work fails', async () => {
      const { db, connection } = createTestDatabase('Mysql');
      connection.respond(new Error('constraint failed'));

      await expect(db.transactional((tx) => tx.sql('INSERT INTO t VALUES (1)'))).rejects.toThrow(
        'An SQL error occurred: constraint failed',
      );
      expect(connection.transactions).toEqual(['begin', 'rollback']);
      expect(db.isTransactionActive).toBe(false);
    });
  });

  describe('debug', () => {
    it('should send executed statements to the sink', async () => {
      const { db } = createTestDatabase('Mysql');
      const sink = vi.fn();

      expect(db.debug()).toBe(false);
      db.debug(sink);
      expect(db.debug()).toBe(true);

      await db.query('select', 'users').where('id', 4).exec();

      expect(sink).toHaveBeenCalledWith({
        query: 'SELECT * FROM `users` WHERE `id` = :where_0',
        bindings: [{ name: ':where_0', value: 4 }],
      });

      db.debug(false);
      expect(db.debug()).toBe(false);
    });
  });

  describe('logging', () => {
    it('should log to the console with the library prefix when asked', async () => {
      const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
      const { db } = createTestDatabase('Mysql', { logger: true });

      await db.query('select', 'users').where('id', 4).exec();

      expect(debug).toHaveBeenCalledWith('[sqlgrid] Executing: SELECT * FROM `users` WHERE `id` = :where_0', ':where_0=4');
      debug.mockRestore();
    });

    it('should stay quiet when logging is off', async () => {
      const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
      const { db } = createTestDatabase('Mysql', { logger: false });

      await db.query('select', 'users').exec();

      expect(debug).not.toHaveBeenCalled();
      debug.mockRestore();
    });
  });

  it('should close the connection', async () => {
    const { db, connection } = createTestDatabase('Mysql');
    const onClose = vi.fn();
    db.on('close', onClose);

    await db.close();

    expect(connection.closed).toBe(true);
    expect(onClose).toHaveBeenCalledTimes(1);
  });

  describe('connect', () => {
    afterEach(() => {
      unregisterConnector('Mysql');
      unregisterConnector('Oracle');
      vi.restoreAllMocks();
    });

    it('should open a connection through the registered connector', async () => {
      const connection = new FakeConnection();
      registerConnector('Mysql', async () => connection);

      const db = await Database.connect({ credentials: { type: 'mariadb', database: 'crm' } });

      expect(db.type).toBe('Mysql');
      expect(db.connection).toBe(connection);
    });

    it('should throw a ConnectionError when aborting is off', async () => {
      registerConnector('Mysql', async () => {
        throw new Error('access denied');
      });

      const attempt = Database.connect({
        credentials: { type: 'Mysql', database: 'crm', pass: 'test-secret' },
        abortOnConnectionFailure: false,
      });

      await expect(attempt).rejects.toThrow(ConnectionError);
      await expect(attempt).rejects.toThrow(
        "An error occurred while connecting to the database 'crm'. The error reported by the server was: access denied",
      );
    });

    it('should report a missing connector', async () => {
      await expect(
        Database.connect({ credentials: { type: 'Mysql' }, abortOnConnectionFailure: false }),
      ).rejects.toThrow('No connector registered for dialect: Mysql');
    });

    it('should close the connection when session setup fails', async () => {
      const connection = new FakeConnection().respond(new Error('bad format'));
      registerConnector('Oracle', async () => connection);

      await expect(
        Database.connect({ credentials: { type: 'Oracle', database: 'XE' }, abortOnConnectionFailure: false }),
      ).rejects.toThrow(ConnectionError);
      expect(connection.closed).toBe(true);
    });

    it('should write the error payload and exit by default', async () => {
      const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
      vi.spyOn(process, 'exit').mockImplementation(() => {
        throw new Error('exit called');
      });

      await expect(Database.connect({ credentials: { type: 'Mysql', database: 'crm' } })).rejects.toThrow(
        'exit called',
      );
      expect(write).toHaveBeenCalledWith(
        JSON.stringify({
          error:
            "An error occurred while connecting to the database 'crm'. The error reported by the server was: " +
            'No connector registered for dialect: Mysql. ' +
            "Make sure you've imported the connector package or called registerConnector().",
        }),
      );
    });
  });
});
