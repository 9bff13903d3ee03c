/**
 * Durable string/number settings. Reads and writes are synchronous from the
 * caller's point of view; an implementation may persist in the background.
 * Any call may throw when the backing store is unavailable.
 */
export interface KeyValueStorePort {
  getString(key: string): string | null;
  getNumber(key: string): number | null;
  setString(key: string, value: string): void;
  setNumber(key: string, value: number): void;
  /** Forgets one key; reading it afterwards returns null. */
  remove(key: string): void;
  clear(): void;
}
