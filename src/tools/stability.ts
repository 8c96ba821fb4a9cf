import { stat } from 'node:fs/promises';
import { setTimeout as sleep } from 'node:timers/promises';
import { isErrnoCode } from '../utils/errors.js';
import { errorMessage, type Logger } from '../logging/logger.js';

export interface StabilityObservation {
  stable: boolean;
  size: number;
}

/** Size of the file in bytes, or `null` when it does not exist. */
export type SizeReader = (path: string) => Promise<number | null>;

export interface StabilityOptions {
  retries: number;
  delayMs: number;
  logger: Logger;
  sizeOf?: SizeReader;
}

export const statSize: SizeReader = async (path) => {
  try {
    return (await stat(path)).size;
  } catch (err) {
    if (isErrnoCode(err, 'ENOENT')) return null;
    throw err;
  }
};

/**
 * Waits until two size reads `delayMs` apart agree on a non-zero size.
 *
 * This is a heuristic for "the writer is done", not a lock check. Errors
 * while reading the size count as a failed attempt; this never throws.
 */
export async function waitForStableFile(
  path: string,
  { retries, delayMs, logger, sizeOf = statSize }: StabilityOptions
): Promise<StabilityObservation> {
  const delay = Math.max(0, delayMs);
  let lastError: unknown;

  for (let attempt = 1; attempt <= retries; attempt++) {
    try {
      const first = await sizeOf(path);
      if (first === null) {
        logger.debug(`Stability check ${attempt}/${retries}: file not present yet`, { path });
        await sleep(delay);
        continue;
      }

      await sleep(delay);
      const second = await sizeOf(path);
      if (second !== null && first === second && second > 0) {
        logger.debug(`File stable at ${second} bytes after ${attempt} check(s)`, { path });
        return { stable: true, size: second };
      }
      logger.debug(`Stability check ${attempt}/${retries}: size ${first} -> ${second ?? 'missing'}`, {
        path,
      });
    } catch (err) {
      lastError = err;
    }
    await sleep(delay);
  }

  if (lastError !== undefined) {
    logger.warn(`File stability check error: ${errorMessage(lastError)}`, { path });
  }
  return { stable: false, size: 0 };
}
