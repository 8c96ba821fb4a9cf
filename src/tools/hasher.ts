import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { setTimeout as sleep } from 'node:timers/promises';
import { isIoError } from '../utils/errors.js';
import { errorMessage, type Logger } from '../logging/logger.js';

export const HASH_ALGORITHM = 'sha256';
export const READ_CHUNK_SIZE = 1024 * 1024;

/** Lowercase hex SHA-256 of the file's content, read in 1 MiB chunks. */
export async function hashFile(path: string): Promise<string> {
  const hash = createHash(HASH_ALGORITHM);
  const stream = createReadStream(path, { highWaterMark: READ_CHUNK_SIZE });
  for await (const chunk of stream) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

export interface HashRetryOptions {
  retries: number;
  delayMs: number;
  logger: Logger;
  hash?: (path: string) => Promise<string>;
}

/**
 * Hashes with bounded retries. Returns `''` once the attempts are used up;
 * an empty string is a failed hash, never a digest.
 */
export async function hashFileWithRetries(
  path: string,
  { retries, delayMs, logger, hash = hashFile }: HashRetryOptions
): Promise<string> {
  const delay = Math.max(0, delayMs);

  for (let attempt = 1; attempt <= retries; attempt++) {
    try {
      return await hash(path);
    } catch (err) {
      if (isIoError(err)) {
        logger.warn(`Hash attempt ${attempt}/${retries} failed: ${errorMessage(err)}`, { path });
      } else {
        logger.error(`Unexpected hash error on attempt ${attempt}/${retries}: ${errorMessage(err)}`, {
          path,
        });
      }
      if (attempt < retries) {
        await sleep(delay);
      }
    }
  }
  return '';
}
