import type { LaunchTarget, MediaMetadataSnapshot, TimelineSnapshot } from '@/domain/music/types';

export type MetadataListener = (metadata: MediaMetadataSnapshot) => void;
export type TimelineListener = (timeline: TimelineSnapshot) => void;

/**
 * A connected controller for one media session. Not safe for concurrent use:
 * every call must go through the controller-affinity executor.
 */
export interface SessionHandle {
  readonly resolvedPackageIdentifier: string;
  readonly originatingUIIntent?: LaunchTarget | null;
  currentMetadata(): MediaMetadataSnapshot;
  currentTimeline(): TimelineSnapshot;
  currentDuration(): number | null;
  onMetadataChanged(listener: MetadataListener): void;
  offMetadataChanged(listener: MetadataListener): void;
  onTimelineChanged(listener: TimelineListener): void;
  offTimelineChanged(listener: TimelineListener): void;
  play(): void | Promise<void>;
  pause(): void | Promise<void>;
  seekToNext(): void | Promise<void>;
  seekToPrevious(): void | Promise<void>;
  seekTo(positionMs: number): void | Promise<void>;
  release(): void | Promise<void>;
}

export interface SessionResolverPort {
  /**
   * Connects to the session behind a raw token. May reject (malformed token,
   * missing permission) or never settle; callers bound it with a timeout.
   */
  resolve(rawSessionToken: unknown): Promise<SessionHandle>;
}
