import { promises as fs } from 'node:fs';
import * as path from 'node:path';

/** Last-write-wins string store keyed by logical name */
export interface KeyValueStore {
  getItem(key: string): Promise<string | null>;
  setItem(key: string, value: string): Promise<void>;
  removeItem(key: string): Promise<void>;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * One file per key under a data directory. Writes go to a temp file
 * first and are renamed into place, so readers never see partial data.
 */
export class FileKeyValueStore implements KeyValueStore {
  constructor(private readonly dir: string) {}

  async getItem(key: string): Promise<string | null> {
    try {
      return await fs.readFile(this.pathFor(key), 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return null;
      throw error;
    }
  }

  async setItem(key: string, value: string): Promise<void> {
    const filePath = this.pathFor(key);
    const tempPath = `${filePath}.tmp.${Date.now()}.${Math.random().toString(36).slice(2)}`;

    await fs.mkdir(this.dir, { recursive: true });
    await fs.writeFile(tempPath, value, 'utf-8');
    await fs.rename(tempPath, filePath);
  }

  async removeItem(key: string): Promise<void> {
    try {
      await fs.unlink(this.pathFor(key));
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'ENOENT') throw error;
    }
  }

  private pathFor(key: string): string {
    return path.join(this.dir, `${key.replace(/[^\w-]/g, '_')}.json`);
  }
}

/** In-process store for tests and the memory backend */
export class MemoryKeyValueStore implements KeyValueStore {
  private readonly items = new Map<string, string>();

  async getItem(key: string): Promise<string | null> {
    return this.items.get(key) ?? null;
  }

  async setItem(key: string, value: string): Promise<void> {
    this.items.set(key, value);
  }

  async removeItem(key: string): Promise<void> {
    this.items.delete(key);
  }

  get size(): number {
    return this.items.size;
  }
}
