/**
 * Binary Location
 * 
 * Finds external executables with automatic OS detection.
 * 
 * Priority order:
 * 1. Environment variable (e.g., FFMPEG_PATH)
 * 2. Bundled binary folder (<binariesDir>/<os>/<name>)
 * 3. System PATH
 * 
 * Every candidate must exist and be executable; nothing is assumed.
 */

import { accessSync, constants, statSync } from 'node:fs';
import { delimiter, join } from 'node:path';

export interface BinaryLookupOptions {
  /** Explicit path, usually from an environment variable */
  explicitPath?: string;
  binariesDir?: string;
  platform?: NodeJS.Platform;
  /** PATH value to search; defaults to process.env.PATH */
  searchPath?: string;
}

export interface BinaryLocation {
  name: string;
  resolvedPath: string | null;
  isAvailable: boolean;
  /** Every candidate that was checked, in order */
  searched: string[];
}

/**
 * OS-specific subfolder
 */
function getOsFolder(platform: NodeJS.Platform): string {
  switch (platform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'macos';
    default:
      return 'linux';
  }
}

/**
 * Get executable extension for an OS
 */
function getExeExt(platform: NodeJS.Platform): string {
  return platform === 'win32' ? '.exe' : '';
}

/**
 * Check that a path is a regular file the current user may execute
 */
export function isExecutableFile(filePath: string): boolean {
  try {
    if (!statSync(filePath).isFile()) return false;
    accessSync(filePath, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Locate a binary by name
 */
export function locateBinary(name: string, options: BinaryLookupOptions = {}): BinaryLocation {
  const platform = options.platform ?? process.platform;
  const exeName = name + getExeExt(platform);
  const candidates: string[] = [];

  // 1. Explicit path
  if (options.explicitPath) {
    candidates.push(options.explicitPath);
  }

  // 2. Bundled binary folder
  if (options.binariesDir) {
    candidates.push(join(options.binariesDir, getOsFolder(platform), exeName));
  }

  // 3. System PATH
  const searchPath = options.searchPath ?? process.env['PATH'] ?? '';
  for (const dir of searchPath.split(delimiter)) {
    if (dir.length > 0) {
      candidates.push(join(dir, exeName));
    }
  }

  const searched: string[] = [];
  for (const candidate of candidates) {
    searched.push(candidate);
    if (isExecutableFile(candidate)) {
      return { name, resolvedPath: candidate, isAvailable: true, searched };
    }
  }

  return { name, resolvedPath: null, isAvailable: false, searched };
}
