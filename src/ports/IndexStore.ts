import type { IndexSnapshot } from '../core/index-snapshot';

export interface IndexStore {
  /** Human readable location, used in log lines. */
  readonly location: string;
  exists(): Promise<boolean>;
  /** Rejects with IndexCorruptError when the stored copy cannot be parsed. */
  load(): Promise<IndexSnapshot>;
  save(snapshot: IndexSnapshot): Promise<void>;
  delete(): Promise<void>;
  close(): Promise<void>;
}
