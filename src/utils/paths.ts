import { homedir } from 'node:os';
import { resolve } from 'node:path';

const CASE_INSENSITIVE_PLATFORMS: ReadonlySet<NodeJS.Platform> = new Set(['win32', 'darwin']);

export function isCaseInsensitive(platform: NodeJS.Platform = process.platform): boolean {
  return CASE_INSENSITIVE_PLATFORMS.has(platform);
}

export function toAbsolutePath(path: string): string {
  if (!path) return '';
  return resolve(path);
}

/** Comparison key for a recording path: absolute, case-folded where the filesystem ignores case. */
export function normalizePathKey(
  path: string,
  platform: NodeJS.Platform = process.platform
): string {
  const abs = toAbsolutePath(path);
  return isCaseInsensitive(platform) ? abs.toLowerCase() : abs;
}

/** Cleans a user-supplied path: trims, strips surrounding quotes, expands `~`, resolves. */
export function cleanUserPath(raw: string | undefined): string {
  if (!raw) return '';
  let p = raw.trim();
  if (p.length >= 2 && p.startsWith('"') && p.endsWith('"')) {
    p = p.slice(1, -1).trim();
  }
  if (!p) return '';
  if (p === '~') {
    p = homedir();
  } else if (p.startsWith('~/') || p.startsWith('~\\')) {
    p = homedir() + p.slice(1);
  }
  return resolve(p);
}
