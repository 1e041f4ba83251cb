import { describe, it, expect } from 'vitest';

import { createTestDatabase, rows } from '../../__tests__/helpers/fake-connection';
import { QueryError, ValidationError } from '../../errors';
import { Field } from '../field';
import { Mjoin } from '../mjoin';
import { Options } from '../options';
import { pkeySeparator } from '../primary-key';
import { RowEditor } from '../row-writer';
import { SearchPaneOptions } from '../search-pane-options';

const USER_SELECT = "SELECT `id` as 'id', `first_name` as 'first_name', `site` as 'site' FROM `users`";

function setup() {
  const { db, connection } = createTestDatabase('Mysql');
  const editor = new RowEditor(db, { table: 'users' }).field(new Field('first_name'), new Field('site'));
  return { db, connection, editor };
}

describe('RowEditor', () => {
  it('should need a table', () => {
    const { db } = createTestDatabase('Mysql');

    expect(() => new RowEditor(db, { table: [] })).toThrow(ValidationError);
  });

  describe('read', () => {
    it('should read rows with their joined children in two queries', async () => {
      const { connection, editor } = setup();
      editor.join(
        new Mjoin('dept')
          .link('users.id', 'user_dept.user_id')
          .link('dept.id', 'user_dept.dept_id')
          .fields(new Field('name')),
      );
      connection.when(
        /JOIN `user_dept`/,
        rows(
          { dteditor_pkey: 1, name: 'Sales' },
          { dteditor_pkey: 1, name: 'Ops' },
          { dteditor_pkey: 2, name: 'Sales' },
          { dteditor_pkey: 2, name: 'IT' },
          { dteditor_pkey: 3, name: 'Ops' },
        ),
      );
      connection.respond(
        rows(
          { id: 1, first_name: 'Ada', site: 2 },
          { id: 2, first_name: 'Grace', site: 2 },
          { id: 3, first_name: 'Linus', site: 3 },
        ),
      );

      const response = await editor.read();

      expect(connection.statements).toHaveLength(2);
      expect(connection.statements[0]).toBe(USER_SELECT);
      expect(response).toEqual({
        data: [
          { DT_RowId: 'row_1', first_name: 'Ada', site: 2, dept: [{ name: 'Sales' }, { name: 'Ops' }] },
          { DT_RowId: 'row_2', first_name: 'Grace', site: 2, dept: [{ name: 'Sales' }, { name: 'IT' }] },
          { DT_RowId: 'row_3', first_name: 'Linus', site: 3, dept: [{ name: 'Ops' }] },
        ],
        options: {},
      });
    });

    it('should page, filter and count a server-side request', async () => {
      const { connection, editor } = setup();
      connection.respond(rows({ id: 1, first_name: 'Ada', site: 2 }), rows({ cnt: 1 }), rows({ cnt: '3' }));

      const response = await editor.read({
        draw: '3',
        start: '0',
        length: '10',
        search: { value: 'ad' },
        order: [{ column: '0', dir: 'desc' }],
        columns: [
          { data: 'first_name', searchable: 'true' },
          { data: 'site', searchable: 'false' },
        ],
      });

      expect(connection.statements).toEqual([
        `${USER_SELECT} WHERE (\`first_name\` like :where_1) ORDER BY \`first_name\` desc LIMIT 10`,
        'SELECT COUNT(`id`) as `cnt` FROM `users` WHERE (`first_name` like :where_1)',
        'SELECT COUNT(`id`) as `cnt` FROM `users`',
      ]);
      expect(response).toEqual({
        data: [{ DT_RowId: 'row_1', first_name: 'Ada', site: 2 }],
        options: {},
        draw: 3,
        recordsTotal: 3,
        recordsFiltered: 1,
      });
    });

    it('should apply its conditions and joins to reads', async () => {
      const { connection, editor } = setup();
      editor.leftJoin('sites', 'sites.id', '=', 'users.site').where('users.active', 1);

      await editor.read();

      expect(connection.statements).toEqual([
        `${USER_SELECT} LEFT JOIN \`sites\` ON \`sites\`.\`id\` = \`users\`.\`site\` WHERE \`users\`.\`active\` = :where_0`,
      ]);
    });

    it('should add option lists and search panes', async () => {
      const { db, connection } = createTestDatabase('Mysql');
      const editor = new RowEditor(db, { table: 'users' }).field(
        new Field('site').options(new Options().table('sites').label('name')),
        new Field('role').searchPaneOptions(new SearchPaneOptions()),
      );
      connection.when(/FROM `sites`/, rows({ id: 2, name: 'Leeds' }));
      connection.when(/as 'label'/, rows({ label: 'admin', value: 'admin' }));
      connection.when(/as count/, rows({ value: 'admin', count: 4 }));

      const response = await editor.read();

      expect(response.options).toEqual({ site: [{ label: 'Leeds', value: 2 }] });
      expect(response.searchPanes).toEqual({
        options: { role: [{ label: 'admin', total: 4, value: 'admin', count: 4 }] },
      });
      expect(response.searchBuilder).toBeUndefined();
    });
  });

  describe('create', () => {
    it('should insert the row, then its children, and read it back', async () => {
      const { connection, editor } = setup();
      editor.join(new Mjoin('phones').link('users.id', 'phones.user_id').fields(new Field('number')));
      connection.insertId = 9;
      connection.when(/^SELECT `id`/, rows({ id: 9, first_name: 'Ada', site: 2 }));
      connection.when(/JOIN `phones`/, rows({ dteditor_pkey: 9, number: '111' }));

      const response = await editor.create({
        first_name: 'Ada',
        site: 2,
        phones: [{ number: '111' }],
        'phones-many-count': 1,
      });

      expect(connection.statements).toEqual([
        'INSERT INTO `users` (`first_name`, `site`) VALUES (:first_name, :site)',
        'INSERT INTO `phones` (`user_id`, `number`) VALUES (:user_id, :number)',
        `${USER_SELECT} WHERE ((\`id\` = :where_2))`,
        "SELECT DISTINCT `users`.`id` as 'dteditor_pkey', `phones`.`number` as 'number' FROM `users` " +
          'JOIN `phones` ON `phones`.`user_id` = `users`.`id` WHERE `users`.`id` IN (:wherein1)',
      ]);
      expect(connection.prepared[1]?.values.get(':user_id')).toBe('9');
      expect(connection.transactions).toEqual(['begin', 'commit']);
      expect(response).toEqual({
        data: [{ DT_RowId: 'row_9', first_name: 'Ada', site: 2, phones: [{ number: '111' }] }],
        fieldErrors: [],
      });
    });

    it('should return field errors without writing', async () => {
      const { db, connection } = createTestDatabase('Mysql');
      const editor = new RowEditor(db, { table: 'users' }).field(
        new Field('first_name').validator((value) => (value ? true : 'Required')),
      );

      const response = await editor.create({ first_name: '' });

      expect(response).toEqual({ data: [], fieldErrors: [{ name: 'first_name', status: 'Required' }] });
      expect(connection.statements).toEqual([]);
    });

    it('should roll back when a write fails', async () => {
      const { connection, editor } = setup();
      connection.when(/^INSERT/, new Error('duplicate key'));

      await expect(editor.create({ first_name: 'Ada' })).rejects.toThrow(QueryError);
      expect(connection.transactions).toEqual(['begin', 'rollback']);
    });

    it('should build a compound row id from the submitted key', async () => {
      const { db, connection } = createTestDatabase('Mysql');
      const editor = new RowEditor(db, { table: 'stock', pkey: ['site', 'code'], transaction: false }).field(
        new Field('site'),
        new Field('code'),
      );
      connection.when(/^SELECT/, rows({ site: 2, code: 'A' }));

      const response = await editor.create({ site: 2, code: 'A' });

      expect(connection.transactions).toEqual([]);
      expect(response.data).toEqual([{ DT_RowId: `row_2${pkeySeparator(['site', 'code'])}A`, site: 2, code: 'A' }]);
    });
  });

  describe('edit', () => {
    it('should update the submitted fields of the row', async () => {
      const { connection, editor } = setup();
      connection.when(/^SELECT/, rows({ id: 9, first_name: 'Grace', site: 2 }));

      const response = await editor.edit('row_9', { first_name: 'Grace' });

      expect(connection.statements).toEqual([
        'UPDATE `users` SET `first_name` = :first_name WHERE `id` = :where_0',
        `${USER_SELECT} WHERE ((\`id\` = :where_2))`,
      ]);
      expect(connection.prepared[0]?.values.get(':where_0')).toBe('9');
      expect(response.data).toEqual([{ DT_RowId: 'row_9', first_name: 'Grace', site: 2 }]);
    });

    it('should follow an edited primary key', async () => {
      const { db, connection } = createTestDatabase('Mysql');
      const editor = new RowEditor(db, { table: 'users' }).field(new Field('id'), new Field('first_name'));

      await editor.edit('row_9', { id: 10 });

      expect(connection.statements[1]).toBe(
        "SELECT `id` as 'id', `first_name` as 'first_name' FROM `users` WHERE ((`id` = :where_2))",
      );
      expect(connection.prepared[1]?.values.get(':where_2')).toBe('10');
    });

    it('should skip fields of other tables', async () => {
      const { db, connection } = createTestDatabase('Mysql');
      const editor = new RowEditor(db, { table: 'users' }).field(
        new Field('users.first_name'),
        new Field('sites.name'),
      );

      await editor.edit('row_9', { users: { first_name: 'Ada' }, sites: { name: 'Leeds' } });

      expect(connection.statements[0]).toBe('UPDATE `users` SET `first_name` = :first_name WHERE `id` = :where_0');
    });
  });

  describe('remove', () => {
    it('should remove children before the rows', async () => {
      const { connection, editor } = setup();
      editor.join(new Mjoin('phones').link('users.id', 'phones.user_id').fields(new Field('number')));

      const response = await editor.remove(['row_1', 'row_2']);

      expect(connection.statements).toEqual([
        'DELETE FROM `phones` WHERE (`user_id` = :where_1 OR `user_id` = :where_2)',
        'DELETE FROM `users` WHERE ((`id` = :where_2) OR (`id` = :where_5))',
      ]);
      expect(connection.transactions).toEqual(['begin', 'commit']);
      expect(response).toEqual({ data: [], fieldErrors: [] });
    });

    it('should do nothing without ids', async () => {
      const { connection, editor } = setup();

      await editor.remove([]);

      expect(connection.statements).toEqual([]);
      expect(connection.transactions).toEqual([]);
    });
  });
});
