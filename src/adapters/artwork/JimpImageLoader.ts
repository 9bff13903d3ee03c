import { promises as fs } from 'node:fs';
import { Jimp, JimpMime } from 'jimp';
import type { ArtworkImage } from '@/domain/music/types';
import type { ImageLoaderPort } from '@/ports/ImageLoaderPort';
import { locateArtwork } from '@/shared/artworkRef';
import { createLogger, type Logger } from '@/shared/logging/logger';

const FETCH_TIMEOUT_MS = 5000;

/**
 * Decodes artwork with jimp and crops it to a square PNG of the requested size.
 */
export class JimpImageLoader implements ImageLoaderPort {
  constructor(
    private readonly fetchTimeoutMs = FETCH_TIMEOUT_MS,
    private readonly log: Logger = createLogger('Artwork', 'Loader'),
  ) {}

  public async load(artworkRef: string, targetSizePx: number): Promise<ArtworkImage> {
    const source = await this.readSource(artworkRef);
    const image = await Jimp.read(source);
    image.cover({ w: targetSizePx, h: targetSizePx });
    const data = await image.getBuffer(JimpMime.png);
    this.log.debug('artwork decoded', { ref: artworkRef, size: targetSizePx, bytes: data.length });
    return {
      ref: artworkRef,
      mime: JimpMime.png,
      width: image.bitmap.width,
      height: image.bitmap.height,
      data,
    };
  }

  private async readSource(artworkRef: string): Promise<Buffer> {
    const location = locateArtwork(artworkRef);
    if (location.kind === 'file') {
      return fs.readFile(location.path);
    }
    const response = await fetch(location.url, { signal: AbortSignal.timeout(this.fetchTimeoutMs) });
    if (!response.ok) {
      throw new Error(`artwork request failed with status ${response.status}`);
    }
    return Buffer.from(await response.arrayBuffer());
  }
}
