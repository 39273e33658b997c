import 'reflect-metadata';
import { DataSource } from 'typeorm';
import { entities } from '../../src/entities';

/** In-memory sqlite stand-in for PostgreSQL; the schema comes from the entity metadata. */
export async function createTestDataSource(): Promise<DataSource> {
  const dataSource = new DataSource({
    type: 'better-sqlite3',
    database: ':memory:',
    entities,
    synchronize: true,
    dropSchema: true,
    logging: false,
  });
  return dataSource.initialize();
}
