import { spawn } from 'node:child_process';
import type { LaunchTarget } from '@/domain/music/types';
import type { AppCatalogPort } from '@/ports/AppCatalogPort';
import { createLogger, type Logger } from '@/shared/logging/logger';
import { isRecord, readJson } from '@/shared/utils/file';

export interface AppEntry {
  packageIdentifier: string;
  label: string;
  launchUri: string | null;
  musicApp: boolean;
}

export interface AppCatalogFile {
  apps: AppEntry[];
  chooserCommand: string[] | null;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((part) => typeof part === 'string');
}

/**
 * Validates the catalog file; malformed entries are skipped.
 */
export function parseAppCatalog(data: unknown): AppCatalogFile {
  if (!isRecord(data)) {
    return { apps: [], chooserCommand: null };
  }
  const apps: AppEntry[] = [];
  const rawApps: unknown[] = Array.isArray(data.apps) ? data.apps : [];
  for (const raw of rawApps) {
    if (!isRecord(raw)) continue;
    const { packageIdentifier, label, launchUri, musicApp } = raw;
    if (typeof packageIdentifier !== 'string' || !packageIdentifier) continue;
    apps.push({
      packageIdentifier,
      label: typeof label === 'string' && label ? label : packageIdentifier,
      launchUri: typeof launchUri === 'string' && launchUri ? launchUri : null,
      musicApp: musicApp === true,
    });
  }
  const command = data.chooserCommand;
  const chooserCommand = isStringArray(command) && command.length > 0 ? command : null;
  return { apps, chooserCommand };
}

/**
 * App labels, launch targets and the music-app allow-list, read from a JSON
 * file. The media player chooser is an external command, when configured.
 */
export class JsonAppCatalog implements AppCatalogPort {
  private apps = new Map<string, AppEntry>();
  private chooserCommand: readonly string[] | null = null;

  constructor(
    private readonly filePath: string,
    private readonly log: Logger = createLogger('Platform', 'AppCatalog'),
  ) {}

  public async load(): Promise<void> {
    const data = await readJson(this.filePath);
    this.apply(parseAppCatalog(data));
    this.log.info('app catalog loaded', { filePath: this.filePath, apps: this.apps.size });
  }

  public apply(catalog: AppCatalogFile): void {
    this.apps = new Map(catalog.apps.map((app) => [app.packageIdentifier, app]));
    this.chooserCommand = catalog.chooserCommand;
  }

  public async labelFor(packageIdentifier: string): Promise<string | null> {
    return this.apps.get(packageIdentifier)?.label ?? null;
  }

  public async launchTargetFor(packageIdentifier: string): Promise<LaunchTarget | null> {
    const uri = this.apps.get(packageIdentifier)?.launchUri;
    return uri ? { packageIdentifier, uri } : null;
  }

  public async listMusicApps(): Promise<readonly string[]> {
    return [...this.apps.values()].filter((app) => app.musicApp).map((app) => app.packageIdentifier);
  }

  public async openMediaPlayerChooser(): Promise<void> {
    const command = this.chooserCommand;
    if (!command || command.length === 0) {
      throw new Error('no media player chooser configured');
    }
    const [executable, ...args] = command;
    this.log.info('opening media player chooser', { command: command.join(' ') });
    const proc = spawn(executable, args, { stdio: 'ignore', detached: true });
    await new Promise<void>((resolve, reject) => {
      proc.once('spawn', () => resolve());
      proc.once('error', reject);
    });
    proc.unref();
  }
}
