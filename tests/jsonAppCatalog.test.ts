import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { test } from './testHarness';
import { JsonAppCatalog, parseAppCatalog } from '../src/adapters/platform/JsonAppCatalog';
import { createRecordingLogger } from './fakes/recordingLogger';

test('app catalog parsing skips malformed entries', () => {
  const catalog = parseAppCatalog({
    apps: [
      { packageIdentifier: 'pkgA', label: 'Player A', launchUri: 'player-a://open', musicApp: true },
      { packageIdentifier: 'pkgB' },
      { label: 'No identifier' },
      'pkgC',
    ],
    chooserCommand: ['xdg-open', 'media:'],
  });

  assert.deepEqual(catalog, {
    apps: [
      { packageIdentifier: 'pkgA', label: 'Player A', launchUri: 'player-a://open', musicApp: true },
      { packageIdentifier: 'pkgB', label: 'pkgB', launchUri: null, musicApp: false },
    ],
    chooserCommand: ['xdg-open', 'media:'],
  });
  assert.deepEqual(parseAppCatalog('nonsense'), { apps: [], chooserCommand: null });
  assert.equal(parseAppCatalog({ apps: [], chooserCommand: [] }).chooserCommand, null);
});

test('app catalog answers lookups from the loaded file', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'nowplaying-apps-'));
  try {
    const filePath = path.join(dir, 'apps.json');
    await fs.writeFile(
      filePath,
      JSON.stringify({
        apps: [
          { packageIdentifier: 'pkgA', label: 'Player A', launchUri: 'player-a://open', musicApp: true },
          { packageIdentifier: 'pkgB', label: 'Podcasts', musicApp: false },
        ],
      }),
      'utf-8',
    );
    const catalog = new JsonAppCatalog(filePath, createRecordingLogger().log);
    await catalog.load();

    assert.equal(await catalog.labelFor('pkgA'), 'Player A');
    assert.equal(await catalog.labelFor('pkgZ'), null);
    assert.deepEqual(await catalog.launchTargetFor('pkgA'), { packageIdentifier: 'pkgA', uri: 'player-a://open' });
    assert.equal(await catalog.launchTargetFor('pkgB'), null);
    assert.deepEqual(await catalog.listMusicApps(), ['pkgA']);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

test('app catalog without a chooser command rejects opening it', async () => {
  const catalog = new JsonAppCatalog('/nonexistent/apps.json', createRecordingLogger().log);
  await catalog.load();

  await assert.rejects(catalog.openMediaPlayerChooser(), /no media player chooser configured/);
});
