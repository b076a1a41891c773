import { DataSource } from 'typeorm';

import { DatabaseService } from '../../src/common/database/database.service';
import { CrudService } from '../../src/common/crud/crud.service';
import { createSqliteDataSource } from '../fixtures/sqlite';
import { Member, NewMember } from '../fixtures/entities';

describe('Database Sessions (Integration)', () => {
  let dataSource: DataSource;
  let database: DatabaseService;

  const members = new CrudService<Member, NewMember>(Member);

  beforeEach(async () => {
    dataSource = await createSqliteDataSource();
    database = new DatabaseService(dataSource);
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  it('should keep what a session committed', async () => {
    const created = await database.withSession((session) =>
      members.create(session, { name: 'Alice', email: 'alice@example.com' }),
    );

    const found = await database.withSession((session) =>
      members.get(session, created.id),
    );
    expect(found.name).toBe('Alice');
  });

  it('should roll back work left inside an open transaction', async () => {
    await database.withSession(async (session) => {
      await session.startTransaction();
      await members.create(session, {
        name: 'Alice',
        email: 'alice@example.com',
      });
    });

    await expect(
      database.withSession((session) => members.count(session)),
    ).resolves.toBe(0);
  });

  it('should propagate errors and leave the connection usable', async () => {
    await expect(
      database.withSession(async (session) => {
        await session.startTransaction();
        await members.create(session, {
          name: 'Alice',
          email: 'alice@example.com',
        });
        throw new Error('caller gave up');
      }),
    ).rejects.toThrow('caller gave up');

    await expect(
      database.withSession(async (session) => {
        expect(session.isTransactionActive).toBe(false);
        return members.count(session);
      }),
    ).resolves.toBe(0);
  });

  it('should serialize concurrent units of work on one sqlite connection', async () => {
    const events: string[] = [];

    await Promise.all(
      ['first', 'second'].map((name, index) =>
        database.withSession(async (session) => {
          events.push(`${name}:start`);
          await members.create(session, {
            name,
            email: `${name}@example.com`,
          });
          events.push(`${name}:end`);
          return index;
        }),
      ),
    );

    expect(events).toEqual([
      'first:start',
      'first:end',
      'second:start',
      'second:end',
    ]);
    await expect(
      database.withSession((session) => members.count(session)),
    ).resolves.toBe(2);
  });
});
