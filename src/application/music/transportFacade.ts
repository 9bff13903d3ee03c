import type { FallbackStore } from '@/application/music/fallbackStore';
import type { LaunchTarget, MediaKeyCode } from '@/domain/music/types';
import type { AppCatalogPort } from '@/ports/AppCatalogPort';
import type { MediaKeyPort } from '@/ports/MediaKeyPort';
import type { SessionHandle } from '@/ports/SessionPort';
import { bestEffort } from '@/shared/bestEffort';
import type { SerialExecutor } from '@/shared/concurrency/serialExecutor';
import { createLogger, errorMessage, type Logger } from '@/shared/logging/logger';

type TransportDeps = {
  currentHandle: () => SessionHandle | null;
  executor: SerialExecutor;
  mediaKeys: MediaKeyPort;
  appCatalog: AppCatalogPort;
  fallback: FallbackStore;
  log?: Logger;
};

type TransportCommand = {
  name: string;
  live: (handle: SessionHandle) => void | Promise<void>;
  /** Hardware key used without a session; `null` drops the command. */
  key: MediaKeyCode | null;
};

/**
 * Playback commands for consumers. Each call checks for a live session at
 * call time: with one the command goes to the session, without one a media
 * key press is synthesized. Commands never reject; failures are logged.
 */
export class TransportFacade {
  private readonly log: Logger;

  constructor(private readonly deps: TransportDeps) {
    this.log = deps.log ?? createLogger('Music', 'Transport');
  }

  public play(): Promise<void> {
    return this.dispatch({ name: 'play', live: (handle) => handle.play(), key: 'play' });
  }

  public pause(): Promise<void> {
    return this.dispatch({ name: 'pause', live: (handle) => handle.pause(), key: 'pause' });
  }

  public next(): Promise<void> {
    return this.dispatch({ name: 'next', live: (handle) => handle.seekToNext(), key: 'next' });
  }

  public previous(): Promise<void> {
    return this.dispatch({ name: 'previous', live: (handle) => handle.seekToPrevious(), key: 'previous' });
  }

  public seekTo(positionMs: number): Promise<void> {
    return this.dispatch({ name: 'seekTo', live: (handle) => handle.seekTo(positionMs), key: null });
  }

  /**
   * Finds something to launch for the current or last player: the session's
   * own UI first, then the player's launch entry point.
   */
  public async openPlayer(): Promise<LaunchTarget | null> {
    const handle = this.deps.currentHandle();
    const intent = handle?.originatingUIIntent;
    if (intent) {
      return intent;
    }
    const packageIdentifier =
      handle?.resolvedPackageIdentifier ?? this.deps.fallback.get('lastPlayerPackage');
    if (!packageIdentifier) {
      return null;
    }
    return bestEffort<LaunchTarget | null>(
      () => this.deps.appCatalog.launchTargetFor(packageIdentifier),
      {
        fallback: null,
        onError: 'debug',
        log: this.log,
        label: 'launch target lookup failed',
        context: { packageIdentifier },
      },
    );
  }

  public async openPlayerChooser(): Promise<void> {
    try {
      await this.deps.appCatalog.openMediaPlayerChooser();
    } catch (error) {
      this.log.warn('opening player chooser failed', { message: errorMessage(error) });
    }
  }

  /** Forgets every persisted value; a live session is left alone. */
  public reset(): void {
    this.deps.fallback.clear();
    this.log.info('player state reset');
  }

  private async dispatch(command: TransportCommand): Promise<void> {
    const handle = this.deps.currentHandle();
    if (handle) {
      try {
        await this.deps.executor.run(() => command.live(handle));
      } catch (error) {
        this.log.warn('session command failed', {
          command: command.name,
          packageIdentifier: handle.resolvedPackageIdentifier,
          message: errorMessage(error),
        });
      }
      return;
    }

    if (!command.key) {
      this.log.debug('command dropped without session', { command: command.name });
      return;
    }
    await this.pressMediaKey(command.key);
  }

  private async pressMediaKey(key: MediaKeyCode): Promise<void> {
    try {
      await this.deps.mediaKeys.dispatch(key, 'down');
      await this.deps.mediaKeys.dispatch(key, 'up');
    } catch (error) {
      this.log.warn('media key dispatch failed', { key, message: errorMessage(error) });
    }
  }
}
