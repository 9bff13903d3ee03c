import { loadConfig, type EnvironmentConfig } from '@/config';
import { JimpImageLoader } from '@/adapters/artwork/JimpImageLoader';
import { InMemoryNotificationFeed } from '@/adapters/platform/InMemoryNotificationFeed';
import { JsonAppCatalog } from '@/adapters/platform/JsonAppCatalog';
import { SourceFilterSetting } from '@/adapters/platform/SourceFilterSetting';
import { JsonKeyValueStore } from '@/adapters/storage/JsonKeyValueStore';
import { SessionMusicService } from '@/application/music/musicService';
import type { AppCatalogPort } from '@/ports/AppCatalogPort';
import type { ImageLoaderPort } from '@/ports/ImageLoaderPort';
import type { MediaKeyPort } from '@/ports/MediaKeyPort';
import type { SessionResolverPort } from '@/ports/SessionPort';
import { stopWithTimeout, type StopResult } from '@/runtime/stopWithTimeout';
import { createLogger, logManager } from '@/shared/logging/logger';

/**
 * Host capabilities this project cannot provide itself. The app catalog and
 * image loader default to the bundled JSON and jimp adapters.
 */
export type PlatformPorts = {
  sessions: SessionResolverPort;
  mediaKeys: MediaKeyPort;
  appCatalog?: AppCatalogPort;
  imageLoader?: ImageLoaderPort;
};

/**
 * Descriptor for services that need graceful shutdown coordination.
 */
type LifecycleService = {
  name: string;
  stop: () => Promise<void>;
};

export type Runtime = {
  music: SessionMusicService;
  notifications: InMemoryNotificationFeed;
  sourceFilter: SourceFilterSetting;
  start: () => Promise<void>;
  stop: () => Promise<StopResult[]>;
};

export function createRuntime(
  platform: PlatformPorts,
  overrides: Partial<EnvironmentConfig> = {},
): Runtime {
  const config = loadConfig(overrides);
  logManager.configure({
    level: config.env.logLevel,
    scopeLevels: config.env.logScopeLevels,
    json: config.env.logJson,
  });
  const log = createLogger('Runtime');

  const store = new JsonKeyValueStore(config.paths.musicState);
  const bundledCatalog = new JsonAppCatalog(config.paths.appCatalog);
  const appCatalog: AppCatalogPort = platform.appCatalog ?? bundledCatalog;
  const notifications = new InMemoryNotificationFeed();
  const sourceFilter = new SourceFilterSetting(config.env.sourceFilterDefault);
  const music = new SessionMusicService({
    notifications,
    sourceFilter,
    sessions: platform.sessions,
    mediaKeys: platform.mediaKeys,
    appCatalog,
    imageLoader: platform.imageLoader ?? new JimpImageLoader(),
    store,
    options: {
      artworkSizePx: config.env.artworkSizePx,
      sessionResolveTimeoutMs: config.env.sessionResolveTimeoutMs,
      defaultTitleTemplate: config.env.defaultTitleTemplate,
    },
  });

  // Stopped in order: the service writes its last values before the store flushes.
  const services: LifecycleService[] = [
    { name: 'music service', stop: () => music.stop() },
    { name: 'settings store', stop: () => store.flush() },
  ];

  return {
    music,
    notifications,
    sourceFilter,
    start: async () => {
      await store.load();
      if (!platform.appCatalog) {
        await bundledCatalog.load();
      }
      music.start();
      log.info('runtime started', { dataDir: config.env.dataDir });
    },
    stop: async () => {
      const results: StopResult[] = [];
      for (const service of services) {
        results.push(await stopWithTimeout(service.name, service.stop, config.env.stopTimeoutMs, log));
      }
      return results;
    },
  };
}
