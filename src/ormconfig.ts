import 'reflect-metadata';
import { DataSource, DataSourceOptions } from 'typeorm';
import { env } from './config/env';
import { entities } from './entities';
import { migrations } from './migrations';

export function buildDataSourceOptions(): DataSourceOptions {
  if (env.DB_TYPE === 'better-sqlite3') {
    return { type: 'better-sqlite3', database: env.SQLITE_PATH, entities, migrations, synchronize: false };
  }
  return { type: 'postgres', url: env.DATABASE_URL, entities, migrations, synchronize: false };
}

const AppDataSource = new DataSource(buildDataSourceOptions());

export default AppDataSource;
