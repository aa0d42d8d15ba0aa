import 'reflect-metadata';
import { DataSource } from 'typeorm';
import { entities } from '../src/entities';
import { migrations } from '../src/migrations';
import { Clock } from '../src/services/clock';
import { PhotoKind, PhotoStore } from '../src/services/photoStore';

export class FixedClock implements Clock {
  private current: Date;

  constructor(start: string | Date) {
    this.current = new Date(start);
  }

  now() {
    return new Date(this.current.getTime());
  }

  set(at: string | Date) {
    this.current = new Date(at);
  }

  advanceMinutes(minutes: number) {
    this.current = new Date(this.current.getTime() + minutes * 60 * 1000);
  }
}

export class MemoryPhotoStore implements PhotoStore {
  readonly items = new Map<string, Buffer>();

  async put(kind: PhotoKind, ownerId: string, bytes: Buffer) {
    const key = `${kind}-${ownerId}-${this.items.size + 1}`;
    this.items.set(key, bytes);
    return key;
  }

  async get(key: string) {
    return this.items.get(key) ?? null;
  }
}

export async function createTestDataSource() {
  const ds = new DataSource({
    type: 'better-sqlite3',
    database: ':memory:',
    entities,
    migrations,
    migrationsRun: true,
    synchronize: false
  });
  await ds.initialize();
  return ds;
}

export const TEST_BCRYPT_ROUNDS = 4;

/** Tiny base64 payload standing in for an uploaded image. */
export const FAKE_IMAGE = Buffer.from('fake-image-bytes').toString('base64');
