import { fileURLToPath } from 'node:url';

/**
 * Artwork references are locators: an http(s) URL, a `file:` URL or a plain
 * filesystem path.
 */
export type ArtworkLocation =
  | { kind: 'http'; url: string }
  | { kind: 'file'; path: string };

export function isHttpUrl(value: string): boolean {
  return /^https?:\/\//i.test(value);
}

export function locateArtwork(ref: string): ArtworkLocation {
  if (isHttpUrl(ref)) {
    return { kind: 'http', url: ref };
  }
  if (/^file:/i.test(ref)) {
    return { kind: 'file', path: fileURLToPath(ref) };
  }
  return { kind: 'file', path: ref };
}
