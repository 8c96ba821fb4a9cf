import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { errorMessage, type Logger } from '../logging/logger.js';
import type { RecordingHost } from './types.js';

const LOCATION_KEYS = ['path', 'directory', 'rec_path', 'recording_path'];
const EXTENSION_KEYS = ['format', 'rec_format', 'file_format', 'container', 'extension'];

export type ResolutionSource =
  | 'stop_event'
  | 'last_recording'
  | 'output_file'
  | 'latest_in_directory'
  | 'output_location';

export interface ResolvedPath {
  path: string;
  source: ResolutionSource | null;
}

export function firstSetting(settings: Record<string, string>, keys: string[]): string {
  for (const key of keys) {
    const value = settings[key];
    if (value) return value;
  }
  return '';
}

/** Newest regular file in `directory` (by mtime), optionally limited to one extension. */
export async function findLatestFile(directory: string, extHint = ''): Promise<string> {
  const ext = extHint.replace(/^\./, '').toLowerCase();
  let newest = '';
  let newestMtime = -Infinity;

  const entries = await readdir(directory, { withFileTypes: true });
  for (const entry of entries) {
    if (!entry.isFile()) continue;
    if (ext && !entry.name.toLowerCase().endsWith(`.${ext}`)) continue;
    const candidate = join(directory, entry.name);
    const info = await stat(candidate);
    if (info.mtimeMs > newestMtime) {
      newest = candidate;
      newestMtime = info.mtimeMs;
    }
  }
  return newest;
}

async function kindOf(path: string): Promise<'file' | 'directory' | null> {
  try {
    const info = await stat(path);
    if (info.isFile()) return 'file';
    if (info.isDirectory()) return 'directory';
    return null;
  } catch {
    return null;
  }
}

/**
 * Finds the file of the recording that just stopped: ask the host directly,
 * then inspect its output settings, then take the newest matching file in the
 * output directory. Host failures are logged and fall through to the next
 * source.
 */
export async function resolveRecordingPath(host: RecordingHost, logger: Logger): Promise<ResolvedPath> {
  try {
    const direct = await host.lastRecordingPath();
    if (direct) return { path: direct, source: 'last_recording' };
  } catch (err) {
    logger.warn(`Last-recording query failed: ${errorMessage(err)}`, { host: host.name });
  }

  let settings: Record<string, string>;
  try {
    settings = await host.recordingOutputSettings();
  } catch (err) {
    logger.warn(`Output settings query failed: ${errorMessage(err)}`, { host: host.name });
    return { path: '', source: null };
  }

  const location = firstSetting(settings, LOCATION_KEYS);
  if (!location) return { path: '', source: null };
  const extHint = firstSetting(settings, EXTENSION_KEYS);

  const kind = await kindOf(location);
  if (kind === 'file') return { path: location, source: 'output_file' };
  if (kind === 'directory') {
    try {
      const latest = await findLatestFile(location, extHint);
      if (latest) return { path: latest, source: 'latest_in_directory' };
    } catch (err) {
      logger.warn(`Could not scan output directory: ${errorMessage(err)}`, { directory: location });
    }
  }
  return { path: location, source: 'output_location' };
}

/** Whole seconds, or `null` for unknown and non-positive values. */
export function positiveSeconds(value: number | null): number | null {
  if (value !== null && Number.isFinite(value) && value > 0) return Math.trunc(value);
  return null;
}

/** Duration from the host, `null` when unknown, non-positive or the query fails. */
export async function resolveDuration(host: RecordingHost, logger: Logger): Promise<number | null> {
  try {
    return positiveSeconds(await host.recordingDurationSeconds());
  } catch (err) {
    logger.warn(`Recording duration query failed: ${errorMessage(err)}`, { host: host.name });
  }
  return null;
}
