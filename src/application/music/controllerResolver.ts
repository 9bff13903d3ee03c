import type { FallbackStore } from '@/application/music/fallbackStore';
import type { NotificationRecord } from '@/domain/music/types';
import { isSameSelection } from '@/domain/music/selection';
import type { SessionHandle, SessionResolverPort } from '@/ports/SessionPort';
import type { SerialExecutor } from '@/shared/concurrency/serialExecutor';
import { settleWithin } from '@/shared/concurrency/settleWithin';
import { createLogger, errorMessage, type Logger } from '@/shared/logging/logger';
import { ReplayValue, type ReadableValue } from '@/shared/reactive/replayValue';

type ResolverDeps = {
  selection: ReadableValue<NotificationRecord | null>;
  sessions: SessionResolverPort;
  executor: SerialExecutor;
  fallback: FallbackStore;
  resolveTimeoutMs: number;
  log?: Logger;
};

type ActiveSession = {
  handle: SessionHandle;
  record: NotificationRecord;
};

/**
 * Owns the single live {@link SessionHandle}.
 *
 * Selection changes are processed one after another: the previous handle is
 * released (after `null` has been published so dependents detach first), then
 * the replacement is resolved on the controller executor. A switch that has
 * been superseded by the time its handle arrives releases that handle instead
 * of publishing it, so no more than one handle is ever alive.
 */
export class ControllerResolver {
  private readonly log: Logger;
  private readonly handleValue: ReplayValue<SessionHandle | null>;
  private active: ActiveSession | null = null;
  private target: NotificationRecord | null = null;
  private generation = 0;
  private work: Promise<void> = Promise.resolve();
  private pendingResolve: AbortController | null = null;
  private unsubscribe: (() => void) | null = null;
  private running = false;

  constructor(private readonly deps: ResolverDeps) {
    this.log = deps.log ?? createLogger('Music', 'Resolver');
    this.handleValue = new ReplayValue<SessionHandle | null>('session handle', {
      equals: (left, right) => left === right,
      log: this.log,
    });
  }

  public get handles(): ReadableValue<SessionHandle | null> {
    return this.handleValue;
  }

  /** The handle published last, for one-shot reads. */
  public current(): SessionHandle | null {
    return this.handleValue.peek() ?? null;
  }

  /** Resolves once every queued switch has been processed. */
  public settled(): Promise<void> {
    return this.work;
  }

  public start(): void {
    if (this.running) return;
    this.running = true;
    this.handleValue.emit(null);
    this.unsubscribe = this.deps.selection.subscribe((record) => this.onSelection(record));
  }

  public async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.target = null;
    this.generation += 1;
    this.pendingResolve?.abort();
    await this.work;
    await this.releaseActive();
  }

  private onSelection(record: NotificationRecord | null): void {
    if (isSameSelection(record, this.target) && this.generation > 0) return;
    this.target = record;
    const generation = ++this.generation;
    this.work = this.work
      .then(() => this.switchTo(record, generation))
      .catch((error: unknown) => {
        this.log.error('session switch failed', { message: errorMessage(error) });
      });
  }

  private async switchTo(record: NotificationRecord | null, generation: number): Promise<void> {
    if (generation !== this.generation) return;
    if (record && this.active && isSameSelection(this.active.record, record)) {
      this.handleValue.emit(this.active.handle);
      return;
    }

    await this.releaseActive();
    if (!record) return;

    const handle = await this.construct(record);
    if (!handle) return;

    if (generation !== this.generation || !this.running) {
      this.log.debug('discarding superseded session', {
        packageIdentifier: handle.resolvedPackageIdentifier,
      });
      await this.release(handle);
      return;
    }

    this.active = { handle, record };
    this.deps.fallback.set('lastPlayerPackage', handle.resolvedPackageIdentifier);
    this.log.info('session connected', {
      packageIdentifier: handle.resolvedPackageIdentifier,
      notificationPackage: record.packageIdentifier,
    });
    this.handleValue.emit(handle);
  }

  /**
   * Starts the resolution on the controller executor and waits for it off the
   * executor. `stop()` aborts the wait; a handle that arrives afterwards is
   * released.
   */
  private async construct(record: NotificationRecord): Promise<SessionHandle | null> {
    // Wrapped so the executor does not wait for the resolution to settle.
    const { resolution } = await this.deps.executor.run(() => ({
      resolution: (async () => this.deps.sessions.resolve(record.rawSessionToken))(),
    }));
    const cancellation = new AbortController();
    this.pendingResolve = cancellation;
    const cancelled = new Promise<never>((_resolve, reject) => {
      cancellation.signal.addEventListener(
        'abort',
        () => reject(new Error('session resolution cancelled')),
        { once: true },
      );
    });
    if (!this.running) {
      cancellation.abort();
    }
    const outcome = await settleWithin(Promise.race([resolution, cancelled]), this.deps.resolveTimeoutMs);
    if (this.pendingResolve === cancellation) {
      this.pendingResolve = null;
    }

    if (outcome.kind === 'value') {
      return outcome.value;
    }

    if (cancellation.signal.aborted) {
      this.log.debug('session resolution cancelled', { packageIdentifier: record.packageIdentifier });
      this.releaseLate(resolution, record);
      return null;
    }

    if (outcome.kind === 'error') {
      this.log.warn('session resolution failed', {
        packageIdentifier: record.packageIdentifier,
        message: errorMessage(outcome.error),
      });
      return null;
    }

    this.log.warn('session resolution timed out', {
      packageIdentifier: record.packageIdentifier,
      timeoutMs: this.deps.resolveTimeoutMs,
    });
    this.releaseLate(resolution, record);
    return null;
  }

  private releaseLate(resolution: Promise<SessionHandle>, record: NotificationRecord): void {
    void resolution.then(
      (late) => this.release(late),
      (error: unknown) => {
        this.log.debug('late session resolution failed', {
          packageIdentifier: record.packageIdentifier,
          message: errorMessage(error),
        });
      },
    );
  }

  private async releaseActive(): Promise<void> {
    const previous = this.active;
    this.active = null;
    this.handleValue.emit(null);
    if (previous) {
      await this.release(previous.handle);
    }
  }

  private async release(handle: SessionHandle): Promise<void> {
    try {
      await this.deps.executor.run(() => handle.release());
      this.log.debug('session released', { packageIdentifier: handle.resolvedPackageIdentifier });
    } catch (error) {
      this.log.warn('session release failed', {
        packageIdentifier: handle.resolvedPackageIdentifier,
        message: errorMessage(error),
      });
    }
  }
}
