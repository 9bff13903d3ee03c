import assert from 'node:assert/strict';
import { test } from './testHarness';
import { ArtworkProjection } from '../src/application/music/artworkProjection';
import { ReplayValue } from '../src/shared/reactive/replayValue';
import { flush } from './fakes/async';
import { FakeImageLoader } from './fakes/platform';
import { createRecordingLogger, messagesAt } from './fakes/recordingLogger';

function createArtwork() {
  const refs = new ReplayValue<string | null>('refs');
  const loader = new FakeImageLoader();
  const { log, entries } = createRecordingLogger();
  const artwork = new ArtworkProjection({ refs, loader, sizePx: 64, log });
  artwork.start();
  return { refs, loader, artwork, entries };
}

test('artwork is decoded at the configured size', async () => {
  const { refs, loader, artwork } = createArtwork();

  refs.emit('covers/one.png');
  await flush();

  assert.deepEqual(loader.requests, [{ ref: 'covers/one.png', size: 64 }]);
  assert.equal(artwork.values.peek()?.ref, 'covers/one.png');
  assert.equal(artwork.values.peek()?.width, 64);
});

test('a repeated artwork reference is loaded once', async () => {
  const { refs, loader } = createArtwork();

  refs.emit('covers/one.png');
  refs.emit('covers/one.png');
  await flush();

  assert.deepEqual(loader.requests, [{ ref: 'covers/one.png', size: 64 }]);
});

test('missing artwork reference clears the image', async () => {
  const { refs, artwork } = createArtwork();
  refs.emit('covers/one.png');
  await flush();

  refs.emit(null);

  assert.equal(artwork.values.peek(), null);
});

test('failed decode keeps the previous image', async () => {
  const { refs, loader, artwork, entries } = createArtwork();
  loader.failing.add('covers/broken.png');
  refs.emit('covers/one.png');
  await flush();

  refs.emit('covers/broken.png');
  await flush();

  assert.equal(artwork.values.peek()?.ref, 'covers/one.png');
  assert.deepEqual(messagesAt(entries, 'warn'), ['artwork could not be loaded']);
});

test('only the newest artwork reference is published', async () => {
  const { refs, loader, artwork } = createArtwork();
  loader.hold('covers/slow.png');

  refs.emit('covers/slow.png');
  refs.emit('covers/fast.png');
  await flush();
  loader.complete('covers/slow.png');
  await flush();

  assert.equal(artwork.values.peek()?.ref, 'covers/fast.png');
});
