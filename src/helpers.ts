import * as path from 'path';

import type { SeriesCallback } from './types.js';

/**
 * Awaits `callback` for each item in turn; the next item starts only after the
 * previous one settled
 */
export async function forEachSeries<T>(items: readonly T[], callback: SeriesCallback<T>): Promise<void> {
  for (const [position, item] of items.entries()) {
    await callback(item, position);
  }
}

/**
 * Normalizes path separators to forward slashes
 */
export function toPosix(input: string): string {
  return input.replace(/\\/g, '/');
}

/**
 * Returns `target` relative to `root` with forward slashes, or undefined when
 * it is the root itself or lies outside of it
 */
export function relativeToRoot(root: string, target: string): string | undefined {
  const relative = path.relative(root, target);

  if (!relative || path.isAbsolute(relative) || relative === '..' || relative.startsWith(`..${path.sep}`)) {
    return undefined;
  }

  return toPosix(relative);
}

/**
 * Checks whether `target` is `root` or lies below it
 */
export function isWithin(root: string, target: string): boolean {
  return path.resolve(root) === path.resolve(target) || relativeToRoot(root, target) !== undefined;
}

/**
 * Errors raised by the operating system carry a string errno code
 */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

export function isPermissionError(err: unknown): boolean {
  return isErrnoException(err) && (err.code === 'EACCES' || err.code === 'EPERM');
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Sorts directory entries by name using plain code unit order
 */
export function byName<T extends { name: string }>(a: T, b: T): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}
