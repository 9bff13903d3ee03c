import type { KeyValueStorePort } from '@/ports/KeyValueStorePort';
import { createLogger, errorMessage, type Logger } from '@/shared/logging/logger';
import { isRecord, readJson, writeJson } from '@/shared/utils/file';

type StoredValue = string | number;

/**
 * Key-value settings kept in memory and mirrored to a JSON file.
 *
 * `load()` must complete before the first read or write; until then every call
 * throws. Writes update memory immediately and are persisted in the background,
 * one file write at a time. A failed write is logged; the next change writes
 * the full state again.
 */
export class JsonKeyValueStore implements KeyValueStorePort {
  private entries = new Map<string, StoredValue>();
  private loaded = false;
  private pendingWrite = false;
  private flushing: Promise<void> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    private readonly log: Logger = createLogger('Storage', 'KeyValue'),
  ) {}

  public async load(): Promise<void> {
    const data = await readJson(this.filePath);
    const entries = new Map<string, StoredValue>();
    if (isRecord(data)) {
      for (const [key, value] of Object.entries(data)) {
        if (typeof value === 'string' || typeof value === 'number') {
          entries.set(key, value);
        }
      }
    } else if (data !== undefined) {
      this.log.warn('ignoring malformed settings file', { filePath: this.filePath });
    }
    this.entries = entries;
    this.loaded = true;
  }

  public getString(key: string): string | null {
    const value = this.read(key);
    return typeof value === 'string' ? value : null;
  }

  public getNumber(key: string): number | null {
    const value = this.read(key);
    return typeof value === 'number' ? value : null;
  }

  public setString(key: string, value: string): void {
    this.write(key, value);
  }

  public setNumber(key: string, value: number): void {
    this.write(key, value);
  }

  public remove(key: string): void {
    this.write(key, null);
  }

  public clear(): void {
    this.requireLoaded();
    this.entries.clear();
    this.schedulePersist();
  }

  /** Resolves once every change made so far has been written (or has failed). */
  public flush(): Promise<void> {
    return this.flushing;
  }

  private read(key: string): StoredValue | null {
    this.requireLoaded();
    return this.entries.get(key) ?? null;
  }

  private write(key: string, value: StoredValue | null): void {
    this.requireLoaded();
    if (value === null) {
      this.entries.delete(key);
    } else {
      this.entries.set(key, value);
    }
    this.schedulePersist();
  }

  private requireLoaded(): void {
    if (!this.loaded) {
      throw new Error(`settings store ${this.filePath} is not loaded`);
    }
  }

  private schedulePersist(): void {
    // A queued write picks up this change as well.
    if (this.pendingWrite) return;
    this.pendingWrite = true;
    this.flushing = this.flushing.then(() => this.persist());
  }

  private async persist(): Promise<void> {
    this.pendingWrite = false;
    const snapshot = Object.fromEntries(this.entries);
    try {
      await writeJson(this.filePath, snapshot);
    } catch (error) {
      this.log.warn('persisting settings failed', {
        filePath: this.filePath,
        message: errorMessage(error),
      });
    }
  }
}
