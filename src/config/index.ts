import { loadEnvironment, type EnvironmentConfig } from '@/config/environment';
import { resolveDataPath } from '@/shared/utils/file';

export interface StoragePaths {
  musicState: string;
  appCatalog: string;
}

function buildStoragePaths(env: EnvironmentConfig): StoragePaths {
  return {
    musicState: resolveDataPath(env.dataDir, 'music.json'),
    appCatalog: resolveDataPath(env.dataDir, 'apps.json'),
  };
}

/**
 * Aggregates all configuration builders into a single bootstrap helper.
 */
export const loadConfig = (overrides: Partial<EnvironmentConfig> = {}) => {
  const env = loadEnvironment(overrides);
  return {
    env,
    paths: buildStoragePaths(env),
  };
};

export type AppConfig = ReturnType<typeof loadConfig>;
export type { EnvironmentConfig } from '@/config/environment';
