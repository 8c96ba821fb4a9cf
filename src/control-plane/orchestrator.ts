import { childLogger, errorMessage } from '../logging/logger.js';
import { timed } from '../utils/timer.js';
import { hashFileWithRetries } from '../tools/hasher.js';
import { waitForStableFile } from '../tools/stability.js';
import { writeSidecar } from '../tools/sidecar.js';
import { buildRunReport } from './report.js';
import { buildPipeline } from './workflow.js';
import type {
  PipelineDeps,
  PipelinePlan,
  PipelineTools,
  RecordingRequest,
  RunContext,
  RunReport,
  StageName,
  StageResult,
} from './types.js';

const defaultTools: PipelineTools = {
  waitForStableFile,
  hashFileWithRetries,
  writeSidecar,
};

/**
 * Runs one recording through the pipeline. Every failure is absorbed at the
 * stage boundary and reported in the returned `RunReport`; this never rejects.
 */
export async function runPipeline(
  request: RecordingRequest,
  deps: PipelineDeps,
  plan: PipelinePlan = buildPipeline(request.settings)
): Promise<RunReport> {
  const runLogger = childLogger(deps.logger, { component: 'pipeline', runId: request.runId });
  const ctx: RunContext = {
    request,
    host: deps.host,
    ledger: deps.ledger,
    tools: { ...defaultTools, ...deps.tools },
    recordingPath: '',
    durationSeconds: null,
    sizeBytes: 0,
    sha256: '',
    outputDir: '',
    sidecarPath: '',
    ledgerPath: '',
    metadataPath: '',
    environment: null,
    stageRecords: [],
  };

  const skippedSet = new Set<StageName>(plan.skippedStages);

  runLogger.info(`Run started (host=${deps.host.name})`, { endTimeIso: request.endTimeIso });

  for (const stage of plan.stages) {
    const stageLogger = childLogger(runLogger, { stage: stage.name, path: ctx.recordingPath || undefined });

    if (skippedSet.has(stage.name)) {
      ctx.stageRecords.push({ name: stage.name, status: 'skipped', durationMs: 0 });
      stageLogger.debug(`[skip] ${stage.name}`);
      continue;
    }

    stageLogger.debug(`[run]  ${stage.name}`);

    const { value: result, durationMs } = await timed(async (): Promise<StageResult> => {
      try {
        return await stage.execute(ctx, stageLogger);
      } catch (err) {
        return { ok: false, reason: `unexpected error: ${errorMessage(err)}` };
      }
    });

    if (result.ok) {
      ctx.stageRecords.push({ name: stage.name, status: 'passed', durationMs });
      stageLogger.info(`[pass] ${stage.name} (${durationMs}ms)`);
      continue;
    }

    ctx.stageRecords.push({ name: stage.name, status: 'failed', durationMs, reason: result.reason });

    if (!stage.required) {
      stageLogger.warn(`[warn] ${stage.name}: ${result.reason}; continuing`);
      continue;
    }

    const outcome = result.outcome ?? 'aborted';
    if (outcome === 'deduplicated') {
      stageLogger.info(`Run deduplicated at ${stage.name}: ${result.reason}`);
    } else {
      stageLogger.error(`Run aborted at ${stage.name}: ${result.reason}`);
    }
    return buildRunReport(ctx, outcome, stage.name, result.reason);
  }

  runLogger.info(`Run done: ${ctx.recordingPath}`, {
    path: ctx.recordingPath,
    sha256: ctx.sha256,
    ledgerPath: ctx.ledgerPath,
  });
  return buildRunReport(ctx, 'done');
}
