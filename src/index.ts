export { createRuntime, type PlatformPorts, type Runtime } from '@/runtime/bootstrap';
export { loadConfig, type AppConfig, type EnvironmentConfig } from '@/config';
export {
  SessionMusicService,
  type MusicService,
  type MusicServiceDeps,
  type MusicServiceOptions,
} from '@/application/music/musicService';
export { InMemoryNotificationFeed } from '@/adapters/platform/InMemoryNotificationFeed';
export { SourceFilterSetting } from '@/adapters/platform/SourceFilterSetting';
export { JsonAppCatalog } from '@/adapters/platform/JsonAppCatalog';
export { JsonKeyValueStore } from '@/adapters/storage/JsonKeyValueStore';
export { JimpImageLoader } from '@/adapters/artwork/JimpImageLoader';
export type * from '@/domain/music/types';
export { DEFAULT_SUPPORTED_ACTIONS } from '@/domain/music/types';
export type { AppCatalogPort } from '@/ports/AppCatalogPort';
export type { ImageLoaderPort } from '@/ports/ImageLoaderPort';
export type { KeyValueStorePort } from '@/ports/KeyValueStorePort';
export type { MediaKeyPort } from '@/ports/MediaKeyPort';
export type { NotificationSourcePort, SourceFilterPort } from '@/ports/NotificationSourcePort';
export type { SessionHandle, SessionResolverPort } from '@/ports/SessionPort';
export type { ReadableValue } from '@/shared/reactive/replayValue';
export { logManager, createLogger } from '@/shared/logging/logger';
