import type { FallbackStore } from '@/application/music/fallbackStore';
import {
  derived,
  lookedUp,
  PropertyProjection,
  type Derivation,
} from '@/application/music/propertyProjection';
import type { DurationSample } from '@/application/music/sessionBridge';
import type { MediaMetadataSnapshot } from '@/domain/music/types';
import { formatDefaultTitle, normalizeDuration } from '@/domain/music/selection';
import type { ReadableValue } from '@/shared/reactive/replayValue';

type PropertyDeps = {
  metadata: ReadableValue<MediaMetadataSnapshot | null>;
  duration: ReadableValue<DurationSample | null>;
  fallback: FallbackStore;
  /** Label of the player behind the current session, or null. */
  playerLabel: () => Promise<string | null>;
  defaultTitleTemplate: string;
};

export type PlaybackProperties = {
  title: PropertyProjection<MediaMetadataSnapshot, string | null>;
  artist: PropertyProjection<MediaMetadataSnapshot, string | null>;
  album: PropertyProjection<MediaMetadataSnapshot, string | null>;
  albumArtRef: PropertyProjection<MediaMetadataSnapshot, string | null>;
  duration: PropertyProjection<DurationSample, number | null>;
};

type ProjectionLifecycle = Pick<PropertyProjection<unknown, unknown>, 'name' | 'start' | 'stop' | 'refresh'>;

export function deriveTitle(
  metadata: MediaMetadataSnapshot,
  deps: Pick<PropertyDeps, 'fallback' | 'playerLabel' | 'defaultTitleTemplate'>,
): Derivation<string | null> {
  const title = metadata.title ?? metadata.displayTitle;
  if (title != null) {
    return derived(title);
  }
  return lookedUp(async () => {
    const label = await deps.playerLabel();
    if (label === null) {
      return deps.fallback.get('title');
    }
    return formatDefaultTitle(deps.defaultTitleTemplate, label);
  });
}

export function deriveArtist(
  metadata: MediaMetadataSnapshot,
  deps: Pick<PropertyDeps, 'playerLabel'>,
): Derivation<string | null> {
  const artist = metadata.artist ?? metadata.subtitle;
  if (artist != null) {
    return derived(artist);
  }
  return lookedUp(() => deps.playerLabel());
}

export function createPlaybackProperties(deps: PropertyDeps): PlaybackProperties {
  const { fallback } = deps;
  return {
    title: new PropertyProjection('title', {
      source: deps.metadata,
      derive: (metadata) => deriveTitle(metadata, deps),
      cached: () => fallback.get('title'),
      persist: (value) => fallback.set('title', value),
    }),
    artist: new PropertyProjection('artist', {
      source: deps.metadata,
      derive: (metadata) => deriveArtist(metadata, deps),
      cached: () => fallback.get('artist'),
      persist: (value) => fallback.set('artist', value),
    }),
    album: new PropertyProjection('album', {
      source: deps.metadata,
      derive: (metadata) => derived(metadata.albumTitle ?? null),
      cached: () => fallback.get('album'),
      persist: (value) => fallback.set('album', value),
    }),
    albumArtRef: new PropertyProjection('albumArtRef', {
      source: deps.metadata,
      derive: (metadata) => derived(metadata.artworkRef ?? null),
      cached: () => fallback.get('albumArtRef'),
      persist: (value) => fallback.set('albumArtRef', value),
    }),
    duration: new PropertyProjection('duration', {
      source: deps.duration,
      derive: (sample) => derived(normalizeDuration(sample.millis)),
      cached: () => fallback.get('durationMillis'),
      persist: (value) => fallback.set('durationMillis', value),
    }),
  };
}

export function eachProperty(properties: PlaybackProperties): ProjectionLifecycle[] {
  return [
    properties.title,
    properties.artist,
    properties.album,
    properties.albumArtRef,
    properties.duration,
  ];
}
