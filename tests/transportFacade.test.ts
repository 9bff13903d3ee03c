import assert from 'node:assert/strict';
import { test } from './testHarness';
import { FallbackStore } from '../src/application/music/fallbackStore';
import { TransportFacade } from '../src/application/music/transportFacade';
import type { SessionHandle } from '../src/ports/SessionPort';
import { SerialExecutor } from '../src/shared/concurrency/serialExecutor';
import { MemoryKeyValueStore } from './fakes/keyValueStore';
import { FakeAppCatalog, FakeMediaKeys } from './fakes/platform';
import { createRecordingLogger, messagesAt } from './fakes/recordingLogger';
import { FakeSessionHandle } from './fakes/sessions';

function createTransport(initial: Record<string, string | number> = {}) {
  let handle: SessionHandle | null = null;
  const mediaKeys = new FakeMediaKeys();
  const appCatalog = new FakeAppCatalog();
  const store = new MemoryKeyValueStore(initial);
  const { log, entries } = createRecordingLogger();
  const fallback = new FallbackStore(store, log);
  const transport = new TransportFacade({
    currentHandle: () => handle,
    executor: new SerialExecutor('controller'),
    mediaKeys,
    appCatalog,
    fallback,
    log,
  });
  return {
    transport,
    mediaKeys,
    appCatalog,
    store,
    fallback,
    entries,
    connect: (next: SessionHandle | null) => {
      handle = next;
    },
  };
}

test('commands go to the live session', async () => {
  const { transport, mediaKeys, connect } = createTransport();
  const session = new FakeSessionHandle('pkgA');
  connect(session);

  await transport.play();
  await transport.pause();
  await transport.next();
  await transport.previous();
  await transport.seekTo(5000);

  assert.deepEqual(session.calls, ['play', 'pause', 'next', 'previous', 'seekTo:5000']);
  assert.deepEqual(mediaKeys.pressed, []);
});

test('commands without a session press media keys', async () => {
  const { transport, mediaKeys } = createTransport();

  await transport.play();
  await transport.next();
  await transport.previous();
  await transport.pause();

  assert.deepEqual(mediaKeys.pressed, [
    ['play', 'down'],
    ['play', 'up'],
    ['next', 'down'],
    ['next', 'up'],
    ['previous', 'down'],
    ['previous', 'up'],
    ['pause', 'down'],
    ['pause', 'up'],
  ]);
});

test('seeking without a session is dropped', async () => {
  const { transport, mediaKeys, entries } = createTransport();

  await transport.seekTo(1000);

  assert.deepEqual(mediaKeys.pressed, []);
  assert.deepEqual(messagesAt(entries, 'debug'), ['command dropped without session']);
});

test('command failures are logged, not thrown', async () => {
  const { transport, mediaKeys, entries, connect } = createTransport();
  const session = new FakeSessionHandle('pkgA');
  session.failCommands = true;
  connect(session);

  await transport.play();
  connect(null);
  mediaKeys.fail = true;
  await transport.next();

  assert.deepEqual(messagesAt(entries, 'warn'), ['session command failed', 'media key dispatch failed']);
});

test('openPlayer prefers the session UI', async () => {
  const { transport, appCatalog, connect } = createTransport();
  appCatalog.launchUris.set('pkgA', 'player-a://launch');
  connect(new FakeSessionHandle('pkgA', [], { intent: { packageIdentifier: 'pkgA', uri: 'player-a://now-playing' } }));

  assert.deepEqual(await transport.openPlayer(), { packageIdentifier: 'pkgA', uri: 'player-a://now-playing' });
});

test('openPlayer falls back to the live package launch target', async () => {
  const { transport, appCatalog, connect } = createTransport({ last_player: 'pkgB' });
  appCatalog.launchUris.set('pkgA', 'player-a://launch');
  connect(new FakeSessionHandle('pkgA'));

  assert.deepEqual(await transport.openPlayer(), { packageIdentifier: 'pkgA', uri: 'player-a://launch' });
});

test('openPlayer uses the last player without a session', async () => {
  const { transport, appCatalog } = createTransport({ last_player: 'pkgB' });
  appCatalog.launchUris.set('pkgB', 'player-b://launch');

  assert.deepEqual(await transport.openPlayer(), { packageIdentifier: 'pkgB', uri: 'player-b://launch' });
});

test('openPlayer returns null when nothing can be launched', async () => {
  const { transport, appCatalog } = createTransport({ last_player: 'pkgB' });
  assert.equal(await transport.openPlayer(), null);

  appCatalog.failLookups = true;
  assert.equal(await transport.openPlayer(), null);

  const { transport: fresh } = createTransport();
  assert.equal(await fresh.openPlayer(), null);
});

test('player chooser failures are logged', async () => {
  const { transport, appCatalog, entries } = createTransport();

  await transport.openPlayerChooser();
  appCatalog.failChooser = true;
  await transport.openPlayerChooser();

  assert.equal(appCatalog.chooserOpened, 1);
  assert.deepEqual(messagesAt(entries, 'warn'), ['opening player chooser failed']);
});

test('reset forgets persisted playback state', () => {
  const { transport, store, fallback } = createTransport({ title: 'Song', last_player: 'pkgA' });

  transport.reset();

  assert.equal(fallback.get('title'), null);
  assert.equal(fallback.get('lastPlayerPackage'), null);
  assert.equal(store.values.size, 0);
});
