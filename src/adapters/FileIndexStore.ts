import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { IndexStore } from '../ports/IndexStore';
import { IndexSnapshot, decodeSnapshot } from '../core/index-snapshot';
import { IndexCorruptError, getErrorMessage } from '../errors';

/** Persists the index as a single JSON file. */
export class FileIndexStore implements IndexStore {
  readonly location: string;

  constructor(filePath: string) {
    this.location = path.resolve(filePath);
  }

  async exists(): Promise<boolean> {
    try {
      const stats = await fs.stat(this.location);
      return stats.isFile();
    } catch {
      return false;
    }
  }

  async load(): Promise<IndexSnapshot> {
    let json: string;
    try {
      json = await fs.readFile(this.location, 'utf8');
    } catch (error) {
      throw new IndexCorruptError(`Cannot read index file ${this.location}: ${getErrorMessage(error)}`, error);
    }
    return decodeSnapshot(json, this.location);
  }

  async save(snapshot: IndexSnapshot): Promise<void> {
    await fs.mkdir(path.dirname(this.location), { recursive: true });
    // write then rename so a crash never leaves a half-written index behind
    const tmpPath = `${this.location}.${process.pid}.tmp`;
    try {
      await fs.writeFile(tmpPath, JSON.stringify(snapshot), 'utf8');
      await fs.rename(tmpPath, this.location);
    } catch (error) {
      await fs.rm(tmpPath, { force: true });
      throw error;
    }
  }

  async delete(): Promise<void> {
    await fs.rm(this.location, { force: true });
  }

  async close(): Promise<void> {}
}
