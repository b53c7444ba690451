import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { CacheStore } from './cache-store';

const ENTRY_SUFFIX = '.json';

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * One JSON file per entry: <dir>/<fingerprint>.json
 *
 * Writes land in a temporary file that is renamed into place, so a reader
 * sees either the previous entry or the new one, never a partial file.
 * Concurrent writers to one fingerprint: last rename wins.
 */
export class FileCacheStore implements CacheStore {
  readonly backend = 'file';

  constructor(private readonly dir: string) {}

  async read(fingerprint: string): Promise<string | null> {
    try {
      return await fs.promises.readFile(this.entryPath(fingerprint), 'utf-8');
    } catch (err) {
      if (isMissing(err)) {
        return null;
      }
      throw err;
    }
  }

  async write(fingerprint: string, content: string): Promise<void> {
    await fs.promises.mkdir(this.dir, { recursive: true });

    const target = this.entryPath(fingerprint);
    const temp = path.join(this.dir, `.${fingerprint}.${uuidv4()}.tmp`);

    try {
      await fs.promises.writeFile(temp, content, 'utf-8');
      await fs.promises.rename(temp, target);
    } catch (err) {
      await fs.promises.rm(temp, { force: true });
      throw err;
    }
  }

  async remove(fingerprint: string): Promise<boolean> {
    try {
      await fs.promises.unlink(this.entryPath(fingerprint));
      return true;
    } catch (err) {
      if (isMissing(err)) {
        return false;
      }
      throw err;
    }
  }

  async list(): Promise<string[]> {
    let names: string[];
    try {
      names = await fs.promises.readdir(this.dir);
    } catch (err) {
      if (isMissing(err)) {
        return [];
      }
      throw err;
    }

    return names
      .filter(name => name.endsWith(ENTRY_SUFFIX) && !name.startsWith('.'))
      .map(name => name.slice(0, -ENTRY_SUFFIX.length))
      .sort();
  }

  describe(): string {
    return `file:${this.dir}`;
  }

  private entryPath(fingerprint: string): string {
    return path.join(this.dir, `${fingerprint}${ENTRY_SUFFIX}`);
  }
}
