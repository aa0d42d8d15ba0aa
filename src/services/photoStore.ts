import { promises as fs } from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';

export type PhotoKind = 'photo' | 'aadhar' | 'signature' | 'selfie';

/** Keeps photo bytes outside the ledger tables; rows only reference the returned key. */
export interface PhotoStore {
  put(kind: PhotoKind, ownerId: string, bytes: Buffer): Promise<string>;
  get(key: string): Promise<Buffer | null>;
}

export class DiskPhotoStore implements PhotoStore {
  constructor(private readonly dir: string) {}

  async put(kind: PhotoKind, ownerId: string, bytes: Buffer): Promise<string> {
    await fs.mkdir(this.dir, { recursive: true });
    const key = `${kind}-${ownerId.replace(/[^A-Za-z0-9_-]/g, '_')}-${uuidv4()}`;
    await fs.writeFile(path.join(this.dir, key), bytes);
    return key;
  }

  async get(key: string): Promise<Buffer | null> {
    if (key !== path.basename(key)) return null;
    try {
      return await fs.readFile(path.join(this.dir, key));
    } catch (err) {
      if (typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT') return null;
      throw err;
    }
  }
}
