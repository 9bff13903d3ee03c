import type { ArtworkImage } from '@/domain/music/types';

export interface ImageLoaderPort {
  /** Rejects on I/O or decode failures. */
  load(artworkRef: string, targetSizePx: number): Promise<ArtworkImage>;
}
