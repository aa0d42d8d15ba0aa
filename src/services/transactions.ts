import { Mutex } from 'async-mutex';
import { DataSource, EntityManager } from 'typeorm';

// better-sqlite3 shares a single query runner across the data source, so
// overlapping transactions on it must run one at a time.
const sqliteLocks = new WeakMap<DataSource, Mutex>();

function lockFor(dataSource: DataSource) {
  let lock = sqliteLocks.get(dataSource);
  if (!lock) {
    lock = new Mutex();
    sqliteLocks.set(dataSource, lock);
  }
  return lock;
}

export function runInTransaction<T>(dataSource: DataSource, work: (manager: EntityManager) => Promise<T>): Promise<T> {
  if (dataSource.options.type !== 'better-sqlite3') return dataSource.transaction(work);
  return lockFor(dataSource).runExclusive(() => dataSource.transaction(work));
}
