import { mkdir, stat, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { errorMessage, type Logger } from '../logging/logger.js';

export const SIDECAR_EXTENSION = '.sha256';

export function sidecarFileName(recordingPath: string): string {
  return basename(recordingPath) + SIDECAR_EXTENSION;
}

/** `<digest>  <filename>\n`, the layout `sha256sum -c` reads. */
export function formatSidecar(digest: string, fileName: string): string {
  return `${digest}  ${fileName}\n`;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Picks the sidecar directory: the configured one (created on demand), else
 * the recording's own directory. Returns `''` when neither is usable.
 */
export async function resolveSidecarDir(
  recordingPath: string,
  configuredDir: string,
  logger: Logger
): Promise<string> {
  if (configuredDir) {
    if (await isDirectory(configuredDir)) return configuredDir;
    try {
      await mkdir(configuredDir, { recursive: true });
      return configuredDir;
    } catch (err) {
      logger.warn(`Configured hash output dir unusable: ${errorMessage(err)}`, { configuredDir });
    }
  }

  const recordingDir = dirname(recordingPath);
  if (recordingDir && (await isDirectory(recordingDir))) return recordingDir;
  return '';
}

export interface SidecarResult {
  ok: boolean;
  sidecarPath: string;
}

/** Writes (or overwrites) `<name>.sha256` in `outputDir`. Failures are logged, not thrown. */
export async function writeSidecar(
  outputDir: string,
  recordingPath: string,
  digest: string,
  logger: Logger
): Promise<SidecarResult> {
  const fileName = basename(recordingPath);
  const sidecarPath = join(outputDir, sidecarFileName(recordingPath));
  try {
    await mkdir(outputDir, { recursive: true });
    await writeFile(sidecarPath, formatSidecar(digest, fileName), 'utf-8');
    logger.info(`Sidecar written: ${sidecarPath}`);
    return { ok: true, sidecarPath };
  } catch (err) {
    logger.error(`Sidecar write failed: ${errorMessage(err)}`, { sidecarPath });
    return { ok: false, sidecarPath };
  }
}
