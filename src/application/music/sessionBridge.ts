import type { MediaMetadataSnapshot, TimelineSnapshot } from '@/domain/music/types';
import type {
  MetadataListener,
  SessionHandle,
  TimelineListener,
} from '@/ports/SessionPort';
import type { SerialExecutor } from '@/shared/concurrency/serialExecutor';
import { createLogger, errorMessage, type Logger } from '@/shared/logging/logger';
import { ReplayValue, type ReadableValue } from '@/shared/reactive/replayValue';

/**
 * One push-based signal of a session handle: how to read its current value and
 * how to watch it. `attach` returns the matching detach.
 */
export interface SessionSignal<T> {
  readonly name: string;
  read(handle: SessionHandle): T;
  attach(handle: SessionHandle, emit: (value: T) => void): () => void;
}

export const metadataSignal: SessionSignal<MediaMetadataSnapshot> = {
  name: 'metadata',
  read: (handle) => handle.currentMetadata(),
  attach: (handle, emit) => {
    const listener: MetadataListener = (metadata) => emit(metadata);
    handle.onMetadataChanged(listener);
    return () => handle.offMetadataChanged(listener);
  },
};

export const timelineSignal: SessionSignal<TimelineSnapshot> = {
  name: 'timeline',
  read: (handle) => handle.currentTimeline(),
  attach: (handle, emit) => {
    const listener: TimelineListener = (timeline) => emit(timeline);
    handle.onTimelineChanged(listener);
    return () => handle.offTimelineChanged(listener);
  },
};

/**
 * Wraps a reported duration so that an unknown duration of a live session is
 * distinguishable from "no session".
 */
export type DurationSample = { readonly millis: number | null };

// Players report a new duration together with a timeline change.
export const durationSignal: SessionSignal<DurationSample> = {
  name: 'duration',
  read: (handle) => ({ millis: handle.currentDuration() }),
  attach: (handle, emit) => {
    const listener: TimelineListener = () => emit({ millis: handle.currentDuration() });
    handle.onTimelineChanged(listener);
    return () => handle.offTimelineChanged(listener);
  },
};

type BridgeDeps = {
  handles: ReadableValue<SessionHandle | null>;
  executor: SerialExecutor;
  log?: Logger;
};

/**
 * Switching subscription from the current session handle to one signal.
 *
 * Every handle change starts a new generation. The previous listener is
 * detached on the controller executor before the next one is attached, and a
 * value delivered for an older generation is dropped.
 */
export class SessionBridge<T> {
  private readonly log: Logger;
  private readonly valueStream: ReplayValue<T | null>;
  private generation = 0;
  private detach: (() => void) | null = null;
  private lastTask: Promise<void> = Promise.resolve();
  private unsubscribe: (() => void) | null = null;

  constructor(
    private readonly signal: SessionSignal<T>,
    private readonly deps: BridgeDeps,
  ) {
    this.log = deps.log ?? createLogger('Music', 'Bridge', signal.name);
    this.valueStream = new ReplayValue<T | null>(signal.name, { log: this.log });
  }

  public get values(): ReadableValue<T | null> {
    return this.valueStream;
  }

  public start(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.deps.handles.subscribe((handle) => this.switchTo(handle));
  }

  /**
   * Stops following handles and detaches the active listener. Resolves once
   * the detach has run on the controller executor.
   */
  public async stop(): Promise<void> {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.generation += 1;
    this.detachCurrent();
    await this.lastTask;
  }

  private switchTo(handle: SessionHandle | null): void {
    const generation = ++this.generation;
    this.detachCurrent();
    if (!handle) {
      this.valueStream.emit(null);
      return;
    }
    this.submit(() => this.attachTo(handle, generation));
  }

  private attachTo(handle: SessionHandle, generation: number): void {
    if (generation !== this.generation) return;
    let initial: T;
    try {
      initial = this.signal.read(handle);
    } catch (error) {
      this.log.warn('reading current value failed', {
        packageIdentifier: handle.resolvedPackageIdentifier,
        message: errorMessage(error),
      });
      this.valueStream.emit(null);
      return;
    }
    this.valueStream.emit(initial);
    if (generation !== this.generation) return;

    this.detach = this.signal.attach(handle, (value) => {
      if (generation !== this.generation) {
        this.log.spam('dropping value from superseded session', { generation });
        return;
      }
      this.valueStream.emit(value);
    });
  }

  private detachCurrent(): void {
    const detach = this.detach;
    this.detach = null;
    if (detach) {
      this.submit(detach);
    }
  }

  private submit(task: () => void): void {
    this.lastTask = this.deps.executor.run(task).catch((error: unknown) => {
      this.log.warn('session listener task failed', { message: errorMessage(error) });
    });
  }
}
