import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Database, DialectFactory, getConnector } from '@sqlgrid/core';

import { MySQLConnection, mysqlConnector } from '../index';

const driver = vi.hoisted(() => {
  const calls: Array<{ sql: string; values: unknown[] }> = [];
  const results: unknown[] = [];
  const connection = {
    query: vi.fn(async (sql: string, values: unknown[]) => {
      calls.push({ sql, values });
      return [results.shift() ?? [], []];
    }),
    escape: vi.fn((value: string) => `'${value.replace(/'/g, "\\'")}'`),
    beginTransaction: vi.fn(async () => undefined),
    commit: vi.fn(async () => undefined),
    rollback: vi.fn(async () => undefined),
    end: vi.fn(async () => undefined),
  };

  return { calls, results, connection, createConnection: vi.fn(async () => connection) };
});

vi.mock('mysql2/promise', () => ({ createConnection: driver.createConnection }));

async function open(): Promise<Database> {
  const dialect = DialectFactory.createDialect('Mysql');
  const connection = await mysqlConnector({ type: 'Mysql', database: 'shop' }, dialect);
  return new Database(connection, dialect);
}

describe('MySQL connector', () => {
  beforeEach(() => {
    driver.calls.length = 0;
    driver.results.length = 0;
    vi.clearAllMocks();
  });

  it('should register itself for the Mysql dialect', () => {
    expect(getConnector('Mysql')).toBe(mysqlConnector);
  });

  it('should open a connection from the credentials', async () => {
    const connection = await mysqlConnector(
      {
        type: 'Mysql',
        host: 'db.local',
        port: '3307',
        user: 'app',
        pass: 'test-secret',
        database: 'shop',
        driverAttributes: { connectTimeout: 500 },
      },
      DialectFactory.createDialect('Mysql'),
    );

    expect(connection).toBeInstanceOf(MySQLConnection);
    expect(driver.createConnection).toHaveBeenCalledWith({
      host: 'db.local',
      port: 3307,
      user: 'app',
      password: 'test-secret',
      database: 'shop',
      charset: 'utf8mb4',
      connectTimeout: 500,
    });
  });

  it('should default the host and port', async () => {
    await open();

    expect(driver.createConnection).toHaveBeenCalledWith(
      expect.objectContaining({ host: 'localhost', port: 3306, database: 'shop' }),
    );
  });
});

describe('MySQLConnection', () => {
  beforeEach(() => {
    driver.calls.length = 0;
    driver.results.length = 0;
    vi.clearAllMocks();
  });

  it('should send named bindings as positional parameters', async () => {
    const db = await open();
    driver.results.push([{ id: 1, name: 'Ada' }]);

    const result = await db.select('users', ['id', 'name'], { site: 2 });

    expect(driver.calls).toEqual([
      { sql: "SELECT `id` as 'id', `name` as 'name' FROM `users` WHERE `site` = ?", values: [2] },
    ]);
    expect(result.fetchAll()).toEqual([{ id: 1, name: 'Ada' }]);
  });

  it('should report the generated key of an insert', async () => {
    const db = await open();
    driver.results.push({ insertId: 7, affectedRows: 1 });

    const result = await db.insert('users', { name: 'Ada' }, 'id');

    expect(driver.calls).toEqual([{ sql: 'INSERT INTO `users` (`name`) VALUES (?)', values: ['Ada'] }]);
    expect(result.insertId()).toBe(7);
    expect(result.count()).toBe(1);
  });

  it('should treat a zero insert id as no key', async () => {
    const db = await open();
    driver.results.push({ insertId: 0, affectedRows: 2 });

    const result = await db.update('users', { name: 'Ada' }, { site: 2 });

    expect(result.count()).toBe(2);
    expect(db.connection.lastInsertId()).toBeNull();
  });

  it('should quote strings with the driver escape', async () => {
    const db = await open();

    expect(db.quote("O'Brien")).toBe("'O\\'Brien'");
    expect(db.quote(5)).toBe('5');
    expect(db.quote(null)).toBe('NULL');
  });

  it('should map transactions and close to the driver', async () => {
    const db = await open();

    await db.transaction();
    await db.commit();
    await db.transaction();
    await db.rollback();
    await db.close();

    expect(driver.connection.beginTransaction).toHaveBeenCalledTimes(2);
    expect(driver.connection.commit).toHaveBeenCalledTimes(1);
    expect(driver.connection.rollback).toHaveBeenCalledTimes(1);
    expect(driver.connection.end).toHaveBeenCalledTimes(1);
  });
});
