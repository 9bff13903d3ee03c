import { promises as fs } from 'node:fs';
import path from 'node:path';
import { createLogger, errorMessage } from '@/shared/logging/logger';
import { safeJsonParse } from '@/shared/bestEffort';

const log = createLogger('Core', 'File');

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Resolves an absolute path under the configured data directory.
 */
export function resolveDataPath(dataDir: string, ...segments: string[]): string {
  return path.resolve(process.cwd(), dataDir, ...segments);
}

/**
 * Reads a JSON file and returns its parsed value (or undefined if missing or unparseable).
 */
export async function readJson(filePath: string): Promise<unknown> {
  try {
    const content = await fs.readFile(filePath, 'utf-8');
    const parsed = safeJsonParse(content, {
      onError: 'debug',
      log,
      label: 'json parse failed',
      context: { filePath },
    });
    if (parsed === undefined) {
      log.warn('failed to read json', { filePath, error: 'invalid json' });
    }
    return parsed;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
      log.warn('failed to read json', { filePath, error: errorMessage(error) });
    }
    return undefined;
  }
}

/**
 * Serializes a value to JSON and replaces the file atomically (write to a
 * sibling temp file, then rename).
 */
export async function writeJson(filePath: string, data: unknown): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tempPath = `${filePath}.tmp`;
  await fs.writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');
  await fs.rename(tempPath, filePath);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
