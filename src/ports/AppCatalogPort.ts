import type { LaunchTarget } from '@/domain/music/types';

/**
 * Host lookups keyed by package identifier. Lookups resolve to `null` for
 * unknown packages and may reject when the host cannot answer.
 */
export interface AppCatalogPort {
  labelFor(packageIdentifier: string): Promise<string | null>;
  launchTargetFor(packageIdentifier: string): Promise<LaunchTarget | null>;
  listMusicApps(): Promise<readonly string[]>;
  openMediaPlayerChooser(): Promise<void>;
}
