import type { ArtworkImage } from '@/domain/music/types';
import type { ImageLoaderPort } from '@/ports/ImageLoaderPort';
import { createLogger, errorMessage, type Logger } from '@/shared/logging/logger';
import { ReplayValue, type ReadableValue } from '@/shared/reactive/replayValue';

type ArtworkDeps = {
  refs: ReadableValue<string | null>;
  loader: ImageLoaderPort;
  sizePx: number;
  log?: Logger;
};

/**
 * Decodes the projected artwork reference into image data.
 *
 * Only the newest reference is loaded to completion, and a reference that is
 * already loaded or loading is not requested again. A failed load emits
 * nothing, so the previously decoded image (or nothing) stays current.
 */
export class ArtworkProjection {
  private readonly log: Logger;
  private readonly output: ReplayValue<ArtworkImage | null>;
  private sequence = 0;
  private requestedRef: string | null = null;
  private unsubscribe: (() => void) | null = null;

  constructor(private readonly deps: ArtworkDeps) {
    this.log = deps.log ?? createLogger('Music', 'Artwork');
    this.output = new ReplayValue<ArtworkImage | null>('albumArt', {
      equals: (left, right) => left === right || (left !== null && right !== null && left.ref === right.ref),
      log: this.log,
    });
  }

  public get values(): ReadableValue<ArtworkImage | null> {
    return this.output;
  }

  public start(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.deps.refs.subscribe((ref) => this.load(ref));
  }

  public stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.requestedRef = null;
    this.sequence += 1;
  }

  private load(ref: string | null): void {
    if (ref !== null && ref === this.requestedRef) return;
    this.requestedRef = ref;
    const sequence = ++this.sequence;
    if (ref === null) {
      this.output.emit(null);
      return;
    }
    void this.deps.loader.load(ref, this.deps.sizePx).then(
      (image) => {
        if (sequence !== this.sequence) return;
        this.output.emit(image);
      },
      (error: unknown) => {
        if (sequence === this.sequence) {
          this.requestedRef = null;
        }
        this.log.warn('artwork could not be loaded', { ref, message: errorMessage(error) });
      },
    );
  }
}
