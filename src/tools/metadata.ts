import { mkdir, writeFile } from 'node:fs/promises';
import { arch, hostname, platform, release, type, version as osVersion } from 'node:os';
import { basename, join } from 'node:path';
import { stringify } from 'csv-stringify/sync';
import type { Delimiter } from '../config/schema.js';
import type { RecordingHost, SceneSnapshot } from '../host/types.js';
import { formatLocalIso, formatUtcIso, fromMillis } from '../utils/time.js';
import { errorMessage, type Logger } from '../logging/logger.js';

export const METADATA_EXTENSION = '.metadata.csv';

export const METADATA_COLUMNS = [
  'recording_path',
  'recording_filename',
  'recording_size_bytes',
  'recording_mtime_local',
  'recording_mtime_utc',
  'recording_stop_time_local',
  'recording_duration_seconds',
  'recording_hash_sha256',
  'system_platform',
  'system_os',
  'system_os_release',
  'system_os_version',
  'system_machine',
  'system_hostname',
  'node_version',
  'host_version',
  'scene_name',
  'scene_snapshot_time_local',
  'scene_snapshot_time_utc',
  'source_name',
  'source_kind',
  'sceneitem_id',
  'sceneitem_enabled',
  'sceneitem_locked',
] as const;

export type MetadataColumn = (typeof METADATA_COLUMNS)[number];
export type MetadataRow = Record<MetadataColumn, string>;

export interface SystemFacts {
  platform: string;
  os: string;
  osRelease: string;
  osVersion: string;
  machine: string;
  hostname: string;
  nodeVersion: string;
}

export interface EnvironmentSnapshot {
  system: SystemFacts;
  hostVersion: string;
  scene: SceneSnapshot | null;
}

export interface RecordingFacts {
  path: string;
  sizeBytes: number;
  mtimeMs: number | null;
  stopTimeIso: string;
  durationSeconds: number | null;
  sha256: string;
}

export function collectSystemFacts(): SystemFacts {
  return {
    platform: platform(),
    os: type(),
    osRelease: release(),
    osVersion: osVersion(),
    machine: arch(),
    hostname: hostname(),
    nodeVersion: process.version,
  };
}

function settle<T>(call: () => Promise<T>): Promise<T> {
  try {
    return call();
  } catch (err) {
    return Promise.reject(err);
  }
}

/**
 * System facts plus whatever the host can report right now. Both host queries
 * are issued before the first await so the snapshot reflects the moment of the
 * call. Host failures leave blanks.
 */
export async function captureEnvironment(host: RecordingHost, logger: Logger): Promise<EnvironmentSnapshot> {
  const [version, sceneResult] = await Promise.allSettled([
    settle(() => host.hostVersion()),
    settle(() => host.sceneSnapshot()),
  ]);

  let hostVersion = '';
  if (version.status === 'fulfilled') {
    hostVersion = version.value;
  } else {
    logger.warn(`Host version query failed: ${errorMessage(version.reason)}`, { host: host.name });
  }

  let scene: SceneSnapshot | null = null;
  if (sceneResult.status === 'fulfilled') {
    scene = sceneResult.value;
  } else {
    logger.warn(`Scene snapshot failed: ${errorMessage(sceneResult.reason)}`, { host: host.name });
  }

  return { system: collectSystemFacts(), hostVersion, scene };
}

function flag(value: boolean | null): string {
  return value === null ? '' : String(value);
}

/** One row per scene item, or a single row with blank source columns when there are none. */
export function buildMetadataRows(recording: RecordingFacts, env: EnvironmentSnapshot): MetadataRow[] {
  const mtime = recording.mtimeMs === null ? null : fromMillis(recording.mtimeMs);
  const snapshotAt = env.scene ? fromMillis(env.scene.takenAtMs) : null;

  const base: MetadataRow = {
    recording_path: recording.path,
    recording_filename: basename(recording.path),
    recording_size_bytes: String(recording.sizeBytes),
    recording_mtime_local: mtime ? formatLocalIso(mtime) : '',
    recording_mtime_utc: mtime ? formatUtcIso(mtime) : '',
    recording_stop_time_local: recording.stopTimeIso,
    recording_duration_seconds: recording.durationSeconds === null ? '' : String(recording.durationSeconds),
    recording_hash_sha256: recording.sha256,
    system_platform: env.system.platform,
    system_os: env.system.os,
    system_os_release: env.system.osRelease,
    system_os_version: env.system.osVersion,
    system_machine: env.system.machine,
    system_hostname: env.system.hostname,
    node_version: env.system.nodeVersion,
    host_version: env.hostVersion,
    scene_name: env.scene?.sceneName ?? '',
    scene_snapshot_time_local: snapshotAt ? formatLocalIso(snapshotAt) : '',
    scene_snapshot_time_utc: snapshotAt ? formatUtcIso(snapshotAt) : '',
    source_name: '',
    source_kind: '',
    sceneitem_id: '',
    sceneitem_enabled: '',
    sceneitem_locked: '',
  };

  const items = env.scene?.items ?? [];
  if (items.length === 0) return [base];

  return items.map((item) => ({
    ...base,
    source_name: item.sourceName,
    source_kind: item.sourceKind,
    sceneitem_id: item.sceneItemId,
    sceneitem_enabled: flag(item.enabled),
    sceneitem_locked: flag(item.locked),
  }));
}

export function formatMetadataCsv(rows: MetadataRow[], delimiter: Delimiter): string {
  return stringify(rows, {
    header: true,
    columns: [...METADATA_COLUMNS],
    delimiter,
    record_delimiter: 'unix',
  });
}

/** Writes `<name>.metadata.csv` beside the sidecar. Overwrites on reprocess. */
export async function writeMetadataCsv(
  outputDir: string,
  rows: MetadataRow[],
  delimiter: Delimiter,
  logger: Logger
): Promise<string> {
  const first = rows[0];
  if (!first) return '';
  const target = join(outputDir, first.recording_filename + METADATA_EXTENSION);
  try {
    await mkdir(outputDir, { recursive: true });
    await writeFile(target, formatMetadataCsv(rows, delimiter), 'utf-8');
    logger.info(`Metadata written: ${target}`, { rows: rows.length });
    return target;
  } catch (err) {
    logger.error(`Metadata write failed: ${errorMessage(err)}`, { target });
    return '';
  }
}
