import { describe, it, expect, afterEach } from 'vitest';

import { createTestDatabase, FakeConnection, rows } from '../../__tests__/helpers/fake-connection';
import { QueryError, ValidationError } from '../../errors';
import { DialectFactory } from '../dialect-factory';
import { MySQLDialect } from '../mysql-dialect';
import { ORACLE_SESSION_SETTINGS, OracleDialect } from '../oracle-dialect';
import { lookupPostgresPrimaryKey, PostgreSQLDialect } from '../postgresql-dialect';

import type { Credentials } from '../../types';

describe('DialectFactory', () => {
  afterEach(() => {
    DialectFactory.clearCache();
  });

  it('should resolve aliases case-insensitively', () => {
    expect(DialectFactory.normalizeType('MSSQL')).toBe('Sqlserver');
    expect(DialectFactory.normalizeType(' pgsql ')).toBe('Postgres');
    expect(DialectFactory.normalizeType('mariadb')).toBe('Mysql');
    expect(DialectFactory.normalizeType('sqlite3')).toBe('Sqlite');
  });

  it('should cache dialects but create fresh ones on request', () => {
    const cached = DialectFactory.getDialect('postgresql');

    expect(DialectFactory.getDialect('PG')).toBe(cached);
    expect(DialectFactory.createDialect('postgres')).not.toBe(cached);
    expect(cached).toBeInstanceOf(PostgreSQLDialect);
  });

  it('should reject unknown types', () => {
    expect(DialectFactory.isSupported('mongo')).toBe(false);
    expect(DialectFactory.isSupported('Firebird')).toBe(true);
    expect(() => DialectFactory.getDialect('mongo')).toThrow(ValidationError);
    expect(() => DialectFactory.getDialect('mongo')).toThrow('Unknown database type: mongo');
  });
});

describe('connection strings', () => {
  const dsn = (type: string, extra: Omit<Credentials, 'type'> = {}): string =>
    DialectFactory.createDialect(type).connectionString({ type, ...extra });

  it('should build MySQL and Postgres strings with default ports', () => {
    expect(dsn('Mysql', { host: 'localhost', database: 'crm' })).toBe('mysql:host=localhost;port=3306;dbname=crm');
    expect(dsn('Postgres', { host: 'db', port: '6432', database: 'crm' })).toBe(
      'pgsql:host=db;port=6432;dbname=crm',
    );
  });

  it('should append extra options after a semicolon', () => {
    expect(dsn('Mysql', { host: 'localhost', database: 'crm', extraDsnOptions: 'charset=utf8mb4' })).toBe(
      'mysql:host=localhost;port=3306;dbname=crm;charset=utf8mb4',
    );
    expect(dsn('Sqlite', { database: '/tmp/app.db', extraDsnOptions: ';mode=ro' })).toBe('sqlite:/tmp/app.db;mode=ro');
  });

  it('should build the SQL Server, Oracle and Firebird forms', () => {
    expect(dsn('Sqlserver', { host: 'sql', database: 'crm' })).toBe('sqlsrv:Server=sql,1433;Database=crm');
    expect(dsn('Oracle', { host: 'ora', database: 'XE' })).toBe('ora:1521/XE');
    expect(dsn('Firebird', { host: 'fb', database: '/data/crm.fdb' })).toBe('firebird:fb/3050;dbname=/data/crm.fdb');
    expect(dsn('Firebird', { database: '/data/crm.fdb' })).toBe('firebird:dbname=/data/crm.fdb');
  });

  it('should carry the credentials in a DB2 string', () => {
    expect(dsn('Db2', { host: 'db2', database: 'SAMPLE', user: 'app', pass: 'test-secret' })).toBe(
      'DATABASE=SAMPLE;HOSTNAME=db2;PORT=50000;PROTOCOL=TCPIP;UID=app;PWD=test-secret',
    );
  });
});

describe('SQLDialect', () => {
  it('should escape the field quote inside display aliases', () => {
    expect(new MySQLDialect().escapeField("it's")).toBe("it\\'s");
  });

  it('should pick the alias keyword from the config', () => {
    expect(new MySQLDialect().aliasKeyword).toBe(' as ');
    expect(new OracleDialect().aliasKeyword).toBe(' ');
  });

  it('should run transaction verbs on the connection', async () => {
    const connection = new FakeConnection();
    const dialect = new MySQLDialect();

    await dialect.beginTransaction(connection);
    await dialect.commit(connection);
    await dialect.rollback(connection);

    expect(connection.transactions).toEqual(['begin', 'commit', 'rollback']);
  });
});

describe('OracleDialect', () => {
  it('should set the session date formats after connecting', async () => {
    const connection = new FakeConnection();

    await new OracleDialect().bootstrap(connection);

    expect(connection.statements).toEqual([...ORACLE_SESSION_SETTINGS]);
  });

  it('should leave beginning a transaction to the driver', async () => {
    const connection = new FakeConnection();
    const dialect = new OracleDialect();

    await dialect.beginTransaction();
    await dialect.commit(connection);

    expect(connection.transactions).toEqual(['commit']);
  });
});

describe('insert key return', () => {
  it('should ask the connection for the last insert id', async () => {
    const { db, connection } = createTestDatabase('Mysql');
    connection.insertId = 7;

    const result = await db.insert('users', { name: 'Ada' }, 'id');

    expect(connection.statements).toEqual(['INSERT INTO `users` (`name`) VALUES (:name)']);
    expect(result.insertId()).toBe(7);
  });

  it('should append RETURNING with an alias on Postgres', async () => {
    const { db, connection } = createTestDatabase('Postgres');
    connection.respond(rows({ dt_pkey: 12 }));

    const result = await db.insert('users', { name: 'Ada' }, 'id');

    expect(connection.statements).toEqual(['INSERT INTO "users" ("name") VALUES (:name) RETURNING "id" as dt_pkey']);
    expect(result.insertId()).toBe(12);
  });

  it('should look up the Postgres primary key when none is given', async () => {
    const { db, connection } = createTestDatabase('Postgres');
    connection.when(/pg_index/, rows({ attname: 'user_id' }));
    connection.respond(rows({ dt_pkey: 4 }));

    const result = await db.insert('users', { name: 'Ada' });

    expect(connection.statements[1]).toBe(
      'INSERT INTO "users" ("name") VALUES (:name) RETURNING "user_id" as dt_pkey',
    );
    expect(connection.prepared[0]?.values.get(':tableName')).toBe('"users"');
    expect(result.insertId()).toBe(4);
  });

  it('should return null from the lookup for a table without a primary key', async () => {
    await expect(lookupPostgresPrimaryKey('"log"', async () => ({ rows: [] }))).resolves.toBeNull();
  });

  it('should trace the primary key lookup and wrap its failures', async () => {
    const traced: string[] = [];
    const { db, connection } = createTestDatabase('Postgres', { debug: (info) => traced.push(info.query) });
    const failures: string[] = [];
    db.on('queryError', (event) => failures.push(event.error.message));
    connection.when(/pg_index/, new Error('relation "nope" does not exist'));

    const insert = db.insert('nope', { name: 'Ada' });

    await expect(insert).rejects.toThrow(QueryError);
    await expect(insert).rejects.toThrow('An SQL error occurred: relation "nope" does not exist');
    expect(connection.statements).toHaveLength(1);
    expect(traced).toEqual([connection.statements[0]]);
    expect(traced[0]).toContain('FROM pg_index i');
    expect(failures).toEqual(['relation "nope" does not exist']);
  });

  it('should receive the key through an output bind on Oracle', async () => {
    const { db, connection } = createTestDatabase('Oracle');
    connection.respond({ rows: [], outBinds: { ':editor_pkey_value': '42' } });

    const result = await db.insert('users', { name: 'Ada' }, 'id');

    expect(connection.statements).toEqual([
      'INSERT INTO "users" ("name") VALUES (:name) RETURNING "id" INTO :editor_pkey_value',
    ]);
    expect(connection.prepared[0]?.outputs.get(':editor_pkey_value')).toBe(36);
    expect(result.insertId()).toBe('42');
  });

  it('should select the row back by the key RETURNING reported', async () => {
    const { db, connection } = createTestDatabase('Postgres');
    connection.respond(rows({ dt_pkey: 12 }), rows({ id: 12, name: 'Ada' }));

    const key = (await db.insert('users', { name: 'Ada' }, 'id')).insertId();
    const row = (await db.select('users', ['id', 'name'], { id: key })).fetch();

    expect(connection.statements[1]).toBe(
      'SELECT "id" as "id", "name" as "name" FROM "users" WHERE "id" = :where_0',
    );
    expect(connection.prepared[1]?.values.get(':where_0')).toBe(12);
    expect(row).toEqual({ id: 12, name: 'Ada' });
    expect(row?.['name']).toBe(connection.prepared[0]?.values.get(':name'));
  });

  it('should select the row back by the key an output bind reported', async () => {
    const { db, connection } = createTestDatabase('Oracle');
    connection.respond({ rows: [], outBinds: { ':editor_pkey_value': '42' } }, rows({ id: '42', name: 'Ada' }));

    const key = (await db.insert('users', { name: 'Ada' }, 'id')).insertId();
    const row = (await db.select('users', ['id', 'name'], { id: key })).fetch();

    expect(connection.statements[1]).toBe('SELECT "id" "id", "name" "name" FROM "users" WHERE "id" = :where_0');
    expect(connection.prepared[1]?.values.get(':where_0')).toBe('42');
    expect(row).toEqual({ id: '42', name: 'Ada' });
    expect(row?.['name']).toBe(connection.prepared[0]?.values.get(':name'));
  });

  it('should read an unaliased RETURNING column on Firebird', async () => {
    const { db, connection } = createTestDatabase('Firebird');
    connection.respond(rows({ ID: 9 }));

    const result = await db.insert('users', { name: 'Ada' }, 'id');

    expect(connection.statements).toEqual(['INSERT INTO "users" ("name") VALUES (:name) RETURNING "id"']);
    expect(result.insertId()).toBe(9);
  });

  it('should leave the insert alone without a key on Oracle', async () => {
    const { db, connection } = createTestDatabase('Oracle');

    const result = await db.insert('audit', { note: 'x' });

    expect(connection.statements).toEqual(['INSERT INTO "audit" ("note") VALUES (:note)']);
    expect(connection.prepared[0]?.outputs.size).toBe(0);
    expect(result.insertId()).toBeNull();
  });
});
