import type { LogLevel } from '@/types/logLevel';

/**
 * Canonical runtime configuration consumed by the music service and its adapters.
 */
export interface EnvironmentConfig {
  logLevel: LogLevel;
  /** Thresholds per logger scope path, e.g. `{ "Music|Resolver": "debug" }`. */
  logScopeLevels: Record<string, LogLevel>;
  logJson: boolean;
  dataDir: string;
  /** Edge length in pixels that artwork is decoded and cropped to. */
  artworkSizePx: number;
  sessionResolveTimeoutMs: number;
  stopTimeoutMs: number;
  /** `{app}` is replaced with the player's label. */
  defaultTitleTemplate: string;
  sourceFilterDefault: boolean;
}

const DEFAULT_ENVIRONMENT: EnvironmentConfig = {
  logLevel: 'info',
  logScopeLevels: {},
  logJson: false,
  dataDir: 'data',
  artworkSizePx: 192,
  sessionResolveTimeoutMs: 5000,
  stopTimeoutMs: 3000,
  defaultTitleTemplate: 'Playing on {app}',
  sourceFilterDefault: false,
};

/**
 * Returns the static environment configuration merged with explicit overrides
 * (process environment variables are not consulted).
 */
export function loadEnvironment(overrides: Partial<EnvironmentConfig> = {}): EnvironmentConfig {
  return { ...DEFAULT_ENVIRONMENT, ...overrides };
}
