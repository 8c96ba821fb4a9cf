import type { Delimiter } from '../config/schema.js';

export const LEDGER_FILE_NAME = 'recording_hashes.csv';

export const LEDGER_HEADER = [
  'end_time_iso',
  'file_path',
  'file_name',
  'file_size_bytes',
  'duration_seconds',
  'sha256',
] as const;

export interface LedgerEntry {
  endTimeIso: string;
  filePath: string;
  fileName: string;
  fileSizeBytes: number;
  durationSeconds: number | null;
  sha256: string;
}

export type AppendOutcome =
  | { status: 'appended'; ledgerPath: string }
  | { status: 'deduplicated'; ledgerPath: string }
  | { status: 'failed'; ledgerPath: string; reason: string };

export interface LedgerSettings {
  /** Explicit ledger file; empty means one ledger per recording directory. */
  ledgerPath: string;
  delimiter: Delimiter;
}
