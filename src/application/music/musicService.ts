import { ArtworkProjection } from '@/application/music/artworkProjection';
import { ControllerResolver } from '@/application/music/controllerResolver';
import { FallbackStore } from '@/application/music/fallbackStore';
import {
  createPlaybackProperties,
  eachProperty,
  type PlaybackProperties,
} from '@/application/music/playbackProperties';
import {
  durationSignal,
  metadataSignal,
  SessionBridge,
  timelineSignal,
  type DurationSample,
} from '@/application/music/sessionBridge';
import { SessionDiscovery } from '@/application/music/sessionDiscovery';
import { TransportFacade } from '@/application/music/transportFacade';
import {
  DEFAULT_SUPPORTED_ACTIONS,
  type ArtworkImage,
  type LaunchTarget,
  type MediaMetadataSnapshot,
  type PlaybackState,
  type SupportedActions,
  type TimelineSnapshot,
} from '@/domain/music/types';
import type { AppCatalogPort } from '@/ports/AppCatalogPort';
import type { ImageLoaderPort } from '@/ports/ImageLoaderPort';
import type { KeyValueStorePort } from '@/ports/KeyValueStorePort';
import type { MediaKeyPort } from '@/ports/MediaKeyPort';
import type { NotificationSourcePort, SourceFilterPort } from '@/ports/NotificationSourcePort';
import type { SessionResolverPort } from '@/ports/SessionPort';
import { bestEffort } from '@/shared/bestEffort';
import { SerialExecutor } from '@/shared/concurrency/serialExecutor';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';
import { constantValue, type ReadableValue } from '@/shared/reactive/replayValue';

/**
 * Unified now-playing state and controls for whatever player is active.
 */
export interface MusicService {
  readonly title: ReadableValue<string | null>;
  readonly artist: ReadableValue<string | null>;
  readonly album: ReadableValue<string | null>;
  readonly albumArt: ReadableValue<ArtworkImage | null>;
  readonly duration: ReadableValue<number | null>;
  readonly position: ReadableValue<number | null>;
  readonly playbackState: ReadableValue<PlaybackState>;
  readonly supportedActions: ReadableValue<SupportedActions>;
  readonly timeline: ReadableValue<TimelineSnapshot | null>;
  readonly lastPlayerPackage: string | null;
  play(): Promise<void>;
  pause(): Promise<void>;
  next(): Promise<void>;
  previous(): Promise<void>;
  seekTo(positionMs: number): Promise<void>;
  openPlayer(): Promise<LaunchTarget | null>;
  openPlayerChooser(): Promise<void>;
  reset(): void;
}

export type MusicServiceDeps = {
  notifications: NotificationSourcePort;
  sourceFilter: SourceFilterPort;
  sessions: SessionResolverPort;
  mediaKeys: MediaKeyPort;
  appCatalog: AppCatalogPort;
  imageLoader: ImageLoaderPort;
  store: KeyValueStorePort;
  options: MusicServiceOptions;
  log?: ComponentLogger;
};

export type MusicServiceOptions = {
  artworkSizePx: number;
  sessionResolveTimeoutMs: number;
  defaultTitleTemplate: string;
};

/**
 * Aggregates host notifications and media sessions into {@link MusicService}.
 *
 * `start()` opens the background scope; `stop()` closes it, detaching every
 * session listener and releasing the live session. Session handles are only
 * ever touched on the controller executor.
 */
export class SessionMusicService implements MusicService {
  public readonly position: ReadableValue<number | null> = constantValue<number | null>('position', null);
  public readonly playbackState: ReadableValue<PlaybackState> = constantValue<PlaybackState>(
    'playbackState',
    'stopped',
  );
  public readonly supportedActions: ReadableValue<SupportedActions> = constantValue(
    'supportedActions',
    DEFAULT_SUPPORTED_ACTIONS,
  );

  private readonly log: ComponentLogger;
  private readonly executor = new SerialExecutor('controller');
  private readonly fallback: FallbackStore;
  private readonly discovery: SessionDiscovery;
  private readonly resolver: ControllerResolver;
  private readonly metadataBridge: SessionBridge<MediaMetadataSnapshot>;
  private readonly timelineBridge: SessionBridge<TimelineSnapshot>;
  private readonly durationBridge: SessionBridge<DurationSample>;
  private readonly properties: PlaybackProperties;
  private readonly artwork: ArtworkProjection;
  private readonly transport: TransportFacade;
  private running = false;

  constructor(deps: MusicServiceDeps) {
    this.log = deps.log ?? createLogger('Music');
    this.fallback = new FallbackStore(deps.store, this.log.child('FallbackStore'));
    this.discovery = new SessionDiscovery({
      notifications: deps.notifications,
      sourceFilter: deps.sourceFilter,
      appCatalog: deps.appCatalog,
      log: this.log.child('Discovery'),
    });
    this.resolver = new ControllerResolver({
      selection: this.discovery.selected,
      sessions: deps.sessions,
      executor: this.executor,
      fallback: this.fallback,
      resolveTimeoutMs: deps.options.sessionResolveTimeoutMs,
      log: this.log.child('Resolver'),
    });
    const bridgeDeps = { handles: this.resolver.handles, executor: this.executor };
    this.metadataBridge = new SessionBridge(metadataSignal, {
      ...bridgeDeps,
      log: this.log.child('Bridge', 'metadata'),
    });
    this.timelineBridge = new SessionBridge(timelineSignal, {
      ...bridgeDeps,
      log: this.log.child('Bridge', 'timeline'),
    });
    this.durationBridge = new SessionBridge(durationSignal, {
      ...bridgeDeps,
      log: this.log.child('Bridge', 'duration'),
    });
    this.properties = createPlaybackProperties({
      metadata: this.metadataBridge.values,
      duration: this.durationBridge.values,
      fallback: this.fallback,
      playerLabel: () => this.currentPlayerLabel(deps.appCatalog),
      defaultTitleTemplate: deps.options.defaultTitleTemplate,
    });
    this.artwork = new ArtworkProjection({
      refs: this.properties.albumArtRef.values,
      loader: deps.imageLoader,
      sizePx: deps.options.artworkSizePx,
      log: this.log.child('Artwork'),
    });
    this.transport = new TransportFacade({
      currentHandle: () => this.resolver.current(),
      executor: this.executor,
      mediaKeys: deps.mediaKeys,
      appCatalog: deps.appCatalog,
      fallback: this.fallback,
      log: this.log.child('Transport'),
    });
  }

  public get title(): ReadableValue<string | null> {
    return this.properties.title.values;
  }

  public get artist(): ReadableValue<string | null> {
    return this.properties.artist.values;
  }

  public get album(): ReadableValue<string | null> {
    return this.properties.album.values;
  }

  public get albumArtRef(): ReadableValue<string | null> {
    return this.properties.albumArtRef.values;
  }

  public get albumArt(): ReadableValue<ArtworkImage | null> {
    return this.artwork.values;
  }

  public get duration(): ReadableValue<number | null> {
    return this.properties.duration.values;
  }

  public get timeline(): ReadableValue<TimelineSnapshot | null> {
    return this.timelineBridge.values;
  }

  public get lastPlayerPackage(): string | null {
    return this.fallback.get('lastPlayerPackage');
  }

  /**
   * Starts consumers before producers so every stage sees the first values.
   */
  public start(): void {
    if (this.running) return;
    this.running = true;
    for (const property of eachProperty(this.properties)) {
      property.start();
    }
    this.artwork.start();
    this.metadataBridge.start();
    this.timelineBridge.start();
    this.durationBridge.start();
    this.resolver.start();
    this.discovery.start();
    this.log.info('music service started');
  }

  public async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.discovery.stop();
    this.artwork.stop();
    for (const property of eachProperty(this.properties)) {
      property.stop();
    }
    await Promise.all([
      this.metadataBridge.stop(),
      this.timelineBridge.stop(),
      this.durationBridge.stop(),
    ]);
    await this.resolver.stop();
    await this.executor.idle();
    this.log.info('music service stopped');
  }

  /** Resolves once queued session switches and controller tasks have run. */
  public async settled(): Promise<void> {
    await this.resolver.settled();
    await this.executor.idle();
  }

  public play(): Promise<void> {
    return this.transport.play();
  }

  public pause(): Promise<void> {
    return this.transport.pause();
  }

  public next(): Promise<void> {
    return this.transport.next();
  }

  public previous(): Promise<void> {
    return this.transport.previous();
  }

  public seekTo(positionMs: number): Promise<void> {
    return this.transport.seekTo(positionMs);
  }

  public openPlayer(): Promise<LaunchTarget | null> {
    return this.transport.openPlayer();
  }

  public openPlayerChooser(): Promise<void> {
    return this.transport.openPlayerChooser();
  }

  public reset(): void {
    this.transport.reset();
    for (const property of eachProperty(this.properties)) {
      property.refresh();
    }
  }

  private async currentPlayerLabel(appCatalog: AppCatalogPort): Promise<string | null> {
    const packageIdentifier = this.resolver.current()?.resolvedPackageIdentifier;
    if (!packageIdentifier) {
      return null;
    }
    return bestEffort<string | null>(() => appCatalog.labelFor(packageIdentifier), {
      fallback: null,
      onError: 'debug',
      log: this.log,
      label: 'app label lookup failed',
      context: { packageIdentifier },
    });
  }
}
