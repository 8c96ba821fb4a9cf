import { randomBytes } from 'node:crypto';
import { DateTime } from 'luxon';

/**
 * `run_<local yyyyMMdd>_<6 hex>`: ties every log line of one pipeline run
 * together and sorts by the day the recording stopped.
 */
export function generateRunId(now: DateTime = DateTime.now()): string {
  return `run_${now.toFormat('yyyyMMdd')}_${randomBytes(3).toString('hex')}`;
}
