import type { RecLedgerConfig } from '../config/schema.js';
import type { RecordingHost, RecordingStop } from '../host/types.js';
import type { LedgerStore } from '../ledger/store.js';
import type { Logger } from '../logging/logger.js';
import type { EnvironmentSnapshot } from '../tools/metadata.js';
import type { hashFileWithRetries } from '../tools/hasher.js';
import type { waitForStableFile } from '../tools/stability.js';
import type { writeSidecar } from '../tools/sidecar.js';

export type StageName =
  | 'resolve_path'
  | 'dedupe_check'
  | 'snapshot_environment'
  | 'organize_folder'
  | 'stabilize'
  | 'hash'
  | 'resolve_output_dir'
  | 'write_sidecar'
  | 'append_ledger'
  | 'write_metadata';

export type StageStatus = 'passed' | 'failed' | 'skipped';

export type RunOutcome = 'done' | 'aborted' | 'deduplicated';

/** What a stage reports back; stages never throw across this boundary. */
export type StageResult =
  | { ok: true }
  | { ok: false; reason: string; outcome?: Exclude<RunOutcome, 'done'> };

export interface StageRecord {
  name: StageName;
  status: StageStatus;
  durationMs: number;
  reason?: string;
}

/** Settings a run needs; a snapshot taken when the recording stopped. */
export type PipelineSettings = Pick<
  RecLedgerConfig,
  | 'ledgerOutputDirectory'
  | 'delimiter'
  | 'retryCount'
  | 'retryDelayMs'
  | 'captureMetadata'
  | 'organizeIntoFolder'
>;

export interface RecordingRequest {
  runId: string;
  /** Local ISO-8601 time at which the stop signal arrived. */
  endTimeIso: string;
  settings: PipelineSettings;
  /** Path and duration reported with the stop event; the host is asked when absent. */
  stop?: RecordingStop;
  /** Environment capture started when the stop arrived; `null` if it failed. */
  environment?: Promise<EnvironmentSnapshot | null>;
}

/** Stage implementations, replaceable in tests. */
export interface PipelineTools {
  waitForStableFile: typeof waitForStableFile;
  hashFileWithRetries: typeof hashFileWithRetries;
  writeSidecar: typeof writeSidecar;
}

export interface PipelineDeps {
  host: RecordingHost;
  ledger: LedgerStore;
  logger: Logger;
  tools?: Partial<PipelineTools>;
}

export interface RunContext {
  request: RecordingRequest;
  host: RecordingHost;
  ledger: LedgerStore;
  tools: PipelineTools;
  recordingPath: string;
  durationSeconds: number | null;
  sizeBytes: number;
  sha256: string;
  outputDir: string;
  sidecarPath: string;
  ledgerPath: string;
  metadataPath: string;
  environment: EnvironmentSnapshot | null;
  stageRecords: StageRecord[];
}

export interface PipelineStage {
  name: StageName;
  /** A failed required stage aborts the run; an optional one is logged and skipped past. */
  required: boolean;
  execute: (ctx: RunContext, logger: Logger) => Promise<StageResult>;
}

export interface PipelinePlan {
  stages: PipelineStage[];
  skippedStages: StageName[];
}

export interface RunReport {
  runId: string;
  endTimeIso: string;
  recordingPath: string;
  outcome: RunOutcome;
  executedStages: StageName[];
  skippedStages: StageName[];
  durationsMs: Partial<Record<StageName, number>>;
  failedStage?: StageName;
  reason?: string;
  sizeBytes: number;
  sha256: string;
  sidecarPath: string;
  ledgerPath: string;
  metadataPath: string;
}
