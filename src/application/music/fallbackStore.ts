import { CACHED_FIELDS, type CachedField, type CachedState } from '@/domain/music/types';
import { normalizeDuration } from '@/domain/music/selection';
import type { KeyValueStorePort } from '@/ports/KeyValueStorePort';
import { createLogger, errorMessage, type Logger } from '@/shared/logging/logger';

const STORE_KEYS: Record<CachedField, string> = {
  title: 'title',
  artist: 'artist',
  album: 'album',
  albumArtRef: 'album_art_uri',
  durationMillis: 'duration',
  lastPlayerPackage: 'last_player',
};

type FieldValue = CachedState[CachedField];

/**
 * Read-through, write-through cache of the last known playback values.
 *
 * A field is read from the backing store the first time it is requested and
 * kept in memory afterwards. Every `set` updates memory first and then writes
 * through; a failing store never prevents the in-memory value from being used,
 * and a failed read is retried on the next `get`.
 */
export class FallbackStore {
  private values: Partial<Record<CachedField, FieldValue>> = {};

  constructor(
    private readonly store: KeyValueStorePort,
    private readonly log: Logger = createLogger('Music', 'FallbackStore'),
  ) {}

  public get<K extends CachedField>(field: K): CachedState[K];
  public get(field: CachedField): FieldValue {
    const cached = this.values[field];
    if (cached !== undefined) {
      return cached;
    }
    try {
      const value = this.readField(field);
      this.values[field] = value;
      return value;
    } catch (error) {
      this.log.warn('fallback store read failed', { field, message: errorMessage(error) });
      return null;
    }
  }

  public set<K extends CachedField>(field: K, value: CachedState[K]): void {
    this.values[field] = value;
    try {
      this.writeField(field, value);
    } catch (error) {
      this.log.warn('fallback store write failed', { field, message: errorMessage(error) });
    }
  }

  public snapshot(): CachedState {
    return {
      title: this.get('title'),
      artist: this.get('artist'),
      album: this.get('album'),
      albumArtRef: this.get('albumArtRef'),
      durationMillis: this.get('durationMillis'),
      lastPlayerPackage: this.get('lastPlayerPackage'),
    };
  }

  /**
   * Forgets every cached value, in memory and in the backing store.
   */
  public clear(): void {
    const cleared: Partial<Record<CachedField, FieldValue>> = {};
    for (const field of CACHED_FIELDS) {
      cleared[field] = null;
    }
    this.values = cleared;
    try {
      this.store.clear();
    } catch (error) {
      this.log.warn('fallback store clear failed', { message: errorMessage(error) });
    }
  }

  private readField(field: CachedField): FieldValue {
    const key = STORE_KEYS[field];
    if (field === 'durationMillis') {
      return normalizeDuration(this.store.getNumber(key));
    }
    return this.store.getString(key);
  }

  private writeField(field: CachedField, value: FieldValue): void {
    const key = STORE_KEYS[field];
    if (value === null) {
      this.store.remove(key);
    } else if (typeof value === 'number') {
      this.store.setNumber(key, value);
    } else {
      this.store.setString(key, value);
    }
  }
}
