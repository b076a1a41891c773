import { DataSource } from 'typeorm';

import { User } from '../../src/modules/users/entities/user.entity';
import { FIXTURE_ENTITIES } from './entities';

// Fresh in-memory database with the schema synchronized from the entities
export const createSqliteDataSource = async (): Promise<DataSource> => {
  const dataSource = new DataSource({
    type: 'better-sqlite3',
    database: ':memory:',
    entities: [...FIXTURE_ENTITIES, User],
    synchronize: true,
    logging: false,
  });
  return dataSource.initialize();
};
