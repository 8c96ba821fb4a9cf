import type { RunContext, RunOutcome, RunReport, StageName } from './types.js';

/** Summarizes a finished run from the stage records it accumulated. */
export function buildRunReport(
  ctx: RunContext,
  outcome: RunOutcome,
  failedStage?: StageName,
  reason?: string
): RunReport {
  const durationsMs: Partial<Record<StageName, number>> = {};
  const executedStages: StageName[] = [];
  const skippedStages: StageName[] = [];

  for (const record of ctx.stageRecords) {
    if (record.status === 'skipped') {
      skippedStages.push(record.name);
      continue;
    }
    durationsMs[record.name] = record.durationMs;
    executedStages.push(record.name);
  }

  return {
    runId: ctx.request.runId,
    endTimeIso: ctx.request.endTimeIso,
    recordingPath: ctx.recordingPath,
    outcome,
    executedStages,
    skippedStages,
    durationsMs,
    failedStage,
    reason,
    sizeBytes: ctx.sizeBytes,
    sha256: ctx.sha256,
    sidecarPath: ctx.sidecarPath,
    ledgerPath: ctx.ledgerPath,
    metadataPath: ctx.metadataPath,
  };
}
