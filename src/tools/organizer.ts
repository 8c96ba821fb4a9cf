import { copyFile, mkdir, rename, stat, unlink } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { DateTime } from 'luxon';
import { isErrnoCode } from '../utils/errors.js';
import { errorMessage, type Logger } from '../logging/logger.js';

const TIMESTAMP_NAME = /^(?:\d{8}_\d{6}|\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2})$/;

export type FileMover = (src: string, dst: string) => Promise<void>;

export interface MoveOptions {
  retries: number;
  delayMs: number;
  logger: Logger;
  move?: FileMover;
  /** Clock for collision suffixes. */
  now?: DateTime;
}

/** True for names OBS-style timestamps produce, e.g. `20261019_140305` or `2026-10-19_14-03-05`. */
export function isTimestampName(name: string): boolean {
  return TIMESTAMP_NAME.test(name);
}

export function folderTimestamp(now: DateTime = DateTime.now()): string {
  return now.toFormat('yyyyMMdd_HHmmss');
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (err) {
    if (isErrnoCode(err, 'ENOENT')) return false;
    throw err;
  }
}

/**
 * `<parentDir>/<baseName>` unless taken. A taken name gets a timestamp suffix
 * (or `_1` when it already is a timestamp), then `_2`, `_3`, ... until free.
 */
export async function uniqueFolder(
  parentDir: string,
  baseName: string,
  now: DateTime = DateTime.now()
): Promise<string> {
  let candidate = baseName;
  if (await pathExists(join(parentDir, candidate))) {
    candidate = isTimestampName(baseName) ? `${baseName}_1` : `${baseName}_${folderTimestamp(now)}`;
  }
  if (await pathExists(join(parentDir, candidate))) {
    let suffix = 2;
    while (await pathExists(join(parentDir, `${candidate}_${suffix}`))) suffix += 1;
    candidate = `${candidate}_${suffix}`;
  }
  return join(parentDir, candidate);
}

/** Rename, or copy and unlink when the target is on another device. */
export const moveFile: FileMover = async (src, dst) => {
  try {
    await rename(src, dst);
  } catch (err) {
    if (!isErrnoCode(err, 'EXDEV')) throw err;
    await copyFile(src, dst);
    await unlink(src);
  }
};

export async function moveWithRetries(
  src: string,
  dst: string,
  { retries, delayMs, logger, move = moveFile }: MoveOptions
): Promise<boolean> {
  const delay = Math.max(0, delayMs);
  let lastError: unknown;

  for (let attempt = 1; attempt <= retries; attempt++) {
    try {
      await move(src, dst);
      return true;
    } catch (err) {
      lastError = err;
      logger.warn(`Move attempt ${attempt}/${retries} failed: ${errorMessage(err)}`, { src, dst });
      if (attempt < retries) await sleep(delay);
    }
  }
  logger.error(`Failed to move recording after ${retries} attempts: ${errorMessage(lastError)}`, { src });
  return false;
}

/**
 * Moves `<dir>/<name>.<ext>` to `<dir>/<name>/<name>.<ext>`, picking a free
 * folder name. Returns the new path, or `''` when the recording stayed put.
 */
export async function moveIntoOwnFolder(recordingPath: string, options: MoveOptions): Promise<string> {
  const { logger } = options;
  const fileName = basename(recordingPath);
  const baseName = basename(fileName, extname(fileName));

  let targetDir: string;
  try {
    targetDir = await uniqueFolder(dirname(recordingPath), baseName, options.now);
    await mkdir(targetDir, { recursive: true });
  } catch (err) {
    logger.error(`Failed to create target folder: ${errorMessage(err)}`, { path: recordingPath });
    return '';
  }

  const destination = join(targetDir, fileName);
  logger.info(`Moving recording to: ${destination}`);
  return (await moveWithRetries(recordingPath, destination, options)) ? destination : '';
}
