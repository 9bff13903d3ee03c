import type {
  ArtworkImage,
  LaunchTarget,
  MediaKeyAction,
  MediaKeyCode,
} from '../../src/domain/music/types';
import type { AppCatalogPort } from '../../src/ports/AppCatalogPort';
import type { ImageLoaderPort } from '../../src/ports/ImageLoaderPort';
import type { MediaKeyPort } from '../../src/ports/MediaKeyPort';
import { createDeferred, type Deferred } from './async';

export class FakeMediaKeys implements MediaKeyPort {
  public readonly pressed: Array<[MediaKeyCode, MediaKeyAction]> = [];
  public fail = false;

  public dispatch(keyCode: MediaKeyCode, action: MediaKeyAction): void {
    if (this.fail) throw new Error('key injection denied');
    this.pressed.push([keyCode, action]);
  }
}

export class FakeAppCatalog implements AppCatalogPort {
  public readonly labels = new Map<string, string>();
  public readonly launchUris = new Map<string, string>();
  public musicApps: string[] = [];
  public failLookups = false;
  public failChooser = false;
  public chooserOpened = 0;

  public async labelFor(packageIdentifier: string): Promise<string | null> {
    if (this.failLookups) throw new Error('catalog unavailable');
    return this.labels.get(packageIdentifier) ?? null;
  }

  public async launchTargetFor(packageIdentifier: string): Promise<LaunchTarget | null> {
    if (this.failLookups) throw new Error('catalog unavailable');
    const uri = this.launchUris.get(packageIdentifier);
    return uri ? { packageIdentifier, uri } : null;
  }

  public async listMusicApps(): Promise<readonly string[]> {
    if (this.failLookups) throw new Error('catalog unavailable');
    return this.musicApps;
  }

  public async openMediaPlayerChooser(): Promise<void> {
    if (this.failChooser) throw new Error('no media player chooser configured');
    this.chooserOpened += 1;
  }
}

export class FakeImageLoader implements ImageLoaderPort {
  public readonly requests: Array<{ ref: string; size: number }> = [];
  public readonly failing = new Set<string>();
  private readonly held = new Map<string, Deferred<ArtworkImage> | null>();

  public hold(ref: string): void {
    this.held.set(ref, null);
  }

  public complete(ref: string): void {
    const pending = this.held.get(ref);
    if (!pending) {
      throw new Error(`no pending load for ${ref}`);
    }
    this.held.delete(ref);
    pending.resolve(imageFor(ref, this.requests.find((request) => request.ref === ref)?.size ?? 0));
  }

  public async load(artworkRef: string, targetSizePx: number): Promise<ArtworkImage> {
    this.requests.push({ ref: artworkRef, size: targetSizePx });
    if (this.failing.has(artworkRef)) {
      throw new Error(`cannot decode ${artworkRef}`);
    }
    if (this.held.has(artworkRef)) {
      const pending = createDeferred<ArtworkImage>();
      this.held.set(artworkRef, pending);
      return pending.promise;
    }
    return imageFor(artworkRef, targetSizePx);
  }
}

export function imageFor(ref: string, size: number): ArtworkImage {
  return { ref, mime: 'image/png', width: size, height: size, data: Buffer.from(ref) };
}
