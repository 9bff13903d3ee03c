/**
 * A posted host notification as seen by session discovery. Immutable; a newer
 * snapshot replaces the whole set.
 */
export interface NotificationRecord {
  readonly packageIdentifier: string;
  /** Epoch milliseconds. */
  readonly postTime: number;
  readonly sessionTokenPresent: boolean;
  /** Opaque; compared by identity. */
  readonly rawSessionToken: unknown;
}

export interface MediaMetadataSnapshot {
  readonly title?: string | null;
  readonly displayTitle?: string | null;
  readonly artist?: string | null;
  readonly subtitle?: string | null;
  readonly albumTitle?: string | null;
  /** Locator of the artwork (path or URL), never image bytes. */
  readonly artworkRef?: string | null;
}

/**
 * Queue/position structure reported by a player. Only the player understands it;
 * this project forwards it untouched.
 */
export type TimelineSnapshot = object;

/**
 * Something the platform can launch: an originating UI of a live session or a
 * package's launch entry point.
 */
export interface LaunchTarget {
  readonly packageIdentifier: string;
  readonly uri: string;
}

export interface ArtworkImage {
  readonly ref: string;
  readonly mime: string;
  readonly width: number;
  readonly height: number;
  readonly data: Buffer;
}

export type PlaybackState = 'playing' | 'paused' | 'stopped';

export interface SupportedActions {
  readonly play: boolean;
  readonly pause: boolean;
  readonly skipToNext: boolean;
  readonly skipToPrevious: boolean;
  readonly seekTo: boolean;
  readonly customActions: readonly string[];
}

export const DEFAULT_SUPPORTED_ACTIONS: SupportedActions = Object.freeze({
  play: true,
  pause: true,
  skipToNext: true,
  skipToPrevious: true,
  seekTo: false,
  customActions: Object.freeze([]),
});

/**
 * Last known values that survive a restart.
 */
export interface CachedState {
  title: string | null;
  artist: string | null;
  album: string | null;
  albumArtRef: string | null;
  durationMillis: number | null;
  lastPlayerPackage: string | null;
}

export type CachedField = keyof CachedState;

export const CACHED_FIELDS: readonly CachedField[] = [
  'title',
  'artist',
  'album',
  'albumArtRef',
  'durationMillis',
  'lastPlayerPackage',
];

export type MediaKeyCode = 'play' | 'pause' | 'next' | 'previous';

export type MediaKeyAction = 'down' | 'up';
