import { existsSync, mkdirSync } from 'node:fs';
import os from 'node:os';
import { join } from 'node:path';

/**
 * Default base for runtime data (recordings, screenshots).
 * Overridden by PALMTALK_DATA_DIR through the config layer.
 */
export function defaultDataDir(): string {
  return join(os.homedir(), '.palmtalk', 'data');
}

/** Resolves a path under the given data directory. */
export function resolveDataPath(dataDir: string, ...segments: string[]): string {
  return join(dataDir, ...segments);
}

/** Ensures that a directory exists. */
export function ensureDirPath(dirPath: string): void {
  if (!existsSync(dirPath)) mkdirSync(dirPath, { recursive: true });
}
