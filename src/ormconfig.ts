import 'reflect-metadata';
import { DataSource, DataSourceOptions } from 'typeorm';
import { config } from './config';
import { entities } from './entities';
import { CreateInitialTables1680000000000 } from './migrations/1680000000000-CreateInitialTables';

export function postgresOptions(): DataSourceOptions {
  const db = config.database;
  const connection = db.url
    ? { url: db.url }
    : { host: db.host, port: db.port, username: db.username, password: db.password, database: db.name };
  return {
    type: 'postgres',
    ...connection,
    ssl: db.ssl ? { rejectUnauthorized: false } : false,
    entities,
    migrations: [CreateInitialTables1680000000000],
    synchronize: false,
    logging: config.logLevel === 'debug',
  };
}

const AppDataSource = new DataSource(postgresOptions());

export default AppDataSource;
