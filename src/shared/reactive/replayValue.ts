import { createLogger, errorMessage, type Logger } from '@/shared/logging/logger';

type Listener<T> = (value: T) => void;

/**
 * Read side of a {@link ReplayValue}.
 */
export interface ReadableValue<T> {
  /** Registers a listener; it immediately receives the latest value, if any. */
  subscribe(listener: Listener<T>): () => void;
  /** Latest emitted value, or `undefined` before the first emission. */
  peek(): T | undefined;
}

export type ReplayValueOptions<T> = {
  equals?: (left: T, right: T) => boolean;
  log?: Logger;
};

/**
 * Continuously-updated value that replays its latest emission to new
 * subscribers. With `equals`, emissions equal to the latest value are dropped.
 */
export class ReplayValue<T> implements ReadableValue<T> {
  private readonly listeners = new Set<Listener<T>>();
  private readonly log: Logger;
  private latest: { value: T } | null = null;
  private version = 0;

  constructor(
    private readonly name: string,
    private readonly options: ReplayValueOptions<T> = {},
  ) {
    this.log = options.log ?? createLogger('Core', 'Value');
  }

  public get listenerCount(): number {
    return this.listeners.size;
  }

  /**
   * Publishes a value. Returns false when it was dropped as a duplicate.
   */
  public emit(value: T): boolean {
    if (this.latest && this.options.equals?.(this.latest.value, value)) {
      return false;
    }
    this.latest = { value };
    const version = ++this.version;
    for (const listener of [...this.listeners]) {
      // A listener emitted a newer value; the rest already got it.
      if (version !== this.version) break;
      if (!this.listeners.has(listener)) continue;
      this.deliver(listener, value);
    }
    return true;
  }

  public subscribe(listener: Listener<T>): () => void {
    this.listeners.add(listener);
    if (this.latest) {
      this.deliver(listener, this.latest.value);
    }
    return () => {
      this.listeners.delete(listener);
    };
  }

  public peek(): T | undefined {
    return this.latest?.value;
  }

  private deliver(listener: Listener<T>, value: T): void {
    try {
      listener(value);
    } catch (error) {
      this.log.warn('value listener error', { value: this.name, message: errorMessage(error) });
    }
  }
}

/**
 * A value that never changes after construction.
 */
export function constantValue<T>(name: string, value: T): ReadableValue<T> {
  const holder = new ReplayValue<T>(name);
  holder.emit(value);
  return holder;
}
