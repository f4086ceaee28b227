/**
 * Destination Resolver
 * 
 * Computes a non-colliding output path beside the source:
 * clip.mov → clip.mp4, then clip (1).mp4, clip (2).mp4, ...
 * 
 * Uniqueness holds at resolution time only; nothing re-checks before the
 * backend writes.
 */

import { existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { getBasename } from '@mediaconv/utils';

export type ExistsCheck = (path: string) => boolean;

export function resolveDestination(
  sourcePath: string,
  targetExtension: string,
  exists: ExistsCheck = existsSync
): string {
  const dir = dirname(sourcePath);
  const name = getBasename(sourcePath);
  const ext = targetExtension.replace(/^\./, '');

  let destination = join(dir, `${name}.${ext}`);
  for (let counter = 1; exists(destination); counter++) {
    destination = join(dir, `${name} (${counter}).${ext}`);
  }
  return destination;
}
