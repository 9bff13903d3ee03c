import { createLogger, errorMessage, type Logger } from '@/shared/logging/logger';
import { ReplayValue, type ReadableValue } from '@/shared/reactive/replayValue';

/**
 * Outcome of deriving a property from a live source value: either known right
 * away, or depending on an asynchronous lookup.
 */
export type Derivation<V> =
  | { kind: 'value'; value: V }
  | { kind: 'lookup'; run: () => Promise<V> };

export const derived = <V>(value: V): Derivation<V> => ({ kind: 'value', value });

export const lookedUp = <V>(run: () => Promise<V>): Derivation<V> => ({ kind: 'lookup', run });

export type ProjectionOptions<S, V> = {
  source: ReadableValue<S | null>;
  derive: (live: S) => Derivation<V>;
  /** Reads the persisted value used while no session is live. */
  cached: () => V;
  /** Persists a live value; runs before the value is emitted. */
  persist: (value: V) => void;
  log?: Logger;
};

/**
 * A user-facing property: the live value derived from a bridge while a session
 * is active, else the persisted one.
 *
 * Lookups run latest-wins: a result that arrives after the source moved on is
 * discarded.
 */
export class PropertyProjection<S, V> {
  private readonly log: Logger;
  private readonly output: ReplayValue<V>;
  private latest: { live: S | null } | null = null;
  private sequence = 0;
  private unsubscribe: (() => void) | null = null;

  constructor(
    public readonly name: string,
    private readonly options: ProjectionOptions<S, V>,
  ) {
    this.log = options.log ?? createLogger('Music', 'Property', name);
    // Not deduplicated: falling back to an equal cached value is still published.
    this.output = new ReplayValue<V>(name, { log: this.log });
  }

  public get values(): ReadableValue<V> {
    return this.output;
  }

  public start(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.options.source.subscribe((live) => {
      this.latest = { live };
      this.evaluate(live);
    });
  }

  public stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.sequence += 1;
  }

  /**
   * Re-reads the persisted value when no session is live, e.g. after the
   * store was cleared.
   */
  public refresh(): void {
    if (this.latest && this.latest.live === null) {
      this.evaluate(null);
    }
  }

  private evaluate(live: S | null): void {
    const sequence = ++this.sequence;
    if (live === null) {
      this.output.emit(this.options.cached());
      return;
    }

    const derivation = this.options.derive(live);
    if (derivation.kind === 'value') {
      this.commit(derivation.value);
      return;
    }

    void derivation.run().then(
      (value) => {
        if (sequence !== this.sequence) return;
        this.commit(value);
      },
      (error: unknown) => {
        if (sequence !== this.sequence) return;
        this.log.warn('property lookup failed', { message: errorMessage(error) });
        this.output.emit(this.options.cached());
      },
    );
  }

  private commit(value: V): void {
    this.options.persist(value);
    this.output.emit(value);
  }
}
