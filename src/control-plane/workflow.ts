import { stat } from 'node:fs/promises';
import { basename } from 'node:path';
import { positiveSeconds, resolveDuration, resolveRecordingPath, type ResolvedPath } from '../host/resolver.js';
import { toAbsolutePath } from '../utils/paths.js';
import { errorMessage } from '../logging/logger.js';
import { buildMetadataRows, captureEnvironment, writeMetadataCsv } from '../tools/metadata.js';
import { moveIntoOwnFolder } from '../tools/organizer.js';
import { resolveSidecarDir } from '../tools/sidecar.js';
import type { PipelinePlan, PipelineSettings, PipelineStage, StageName, StageResult } from './types.js';

const passed: StageResult = { ok: true };

function fail(reason: string): StageResult {
  return { ok: false, reason };
}

/**
 * Stage order for one recording. Required stages abort the run on failure;
 * the sidecar and metadata writers are best-effort. Moving into a folder and
 * the metadata stages only run when their setting is on.
 */
export function buildPipeline(settings: PipelineSettings): PipelinePlan {
  const stages: PipelineStage[] = [
    {
      name: 'resolve_path',
      required: true,
      execute: async (ctx, logger) => {
        const stop = ctx.request.stop;
        const resolved: ResolvedPath = stop?.path
          ? { path: stop.path, source: 'stop_event' }
          : await resolveRecordingPath(ctx.host, logger);
        const abs = toAbsolutePath(resolved.path);
        if (!abs) return fail('no usable recording path');
        ctx.recordingPath = abs;
        ctx.durationSeconds = stop
          ? positiveSeconds(stop.durationSeconds)
          : await resolveDuration(ctx.host, logger);
        logger.info(`Recording path resolved via ${resolved.source ?? 'unknown'}`, {
          path: abs,
          durationSeconds: ctx.durationSeconds,
        });
        return passed;
      },
    },
    {
      name: 'dedupe_check',
      required: true,
      execute: async (ctx) => {
        if (await ctx.ledger.isRecorded(ctx.recordingPath)) {
          return { ok: false, reason: 'already recorded in ledger (deduplicated)', outcome: 'deduplicated' };
        }
        return passed;
      },
    },
    {
      name: 'snapshot_environment',
      required: false,
      execute: async (ctx, logger) => {
        ctx.environment = await (ctx.request.environment ?? captureEnvironment(ctx.host, logger));
        return ctx.environment ? passed : fail('environment snapshot could not be captured');
      },
    },
    {
      name: 'organize_folder',
      required: true,
      execute: async (ctx, logger) => {
        const { retryCount, retryDelayMs } = ctx.request.settings;
        const moved = await moveIntoOwnFolder(ctx.recordingPath, {
          retries: retryCount,
          delayMs: retryDelayMs,
          logger,
        });
        if (!moved) return fail('recording could not be moved into its own folder');
        ctx.recordingPath = moved;
        return passed;
      },
    },
    {
      name: 'stabilize',
      required: true,
      execute: async (ctx, logger) => {
        const { retryCount, retryDelayMs } = ctx.request.settings;
        const observation = await ctx.tools.waitForStableFile(ctx.recordingPath, {
          retries: retryCount,
          delayMs: retryDelayMs,
          logger,
        });
        if (!observation.stable) return fail('file not ready after retries');
        ctx.sizeBytes = observation.size;
        return passed;
      },
    },
    {
      name: 'hash',
      required: true,
      execute: async (ctx, logger) => {
        const { retryCount, retryDelayMs } = ctx.request.settings;
        const digest = await ctx.tools.hashFileWithRetries(ctx.recordingPath, {
          retries: retryCount,
          delayMs: retryDelayMs,
          logger,
        });
        if (!digest) return fail('failed to hash file after retries');
        ctx.sha256 = digest;
        return passed;
      },
    },
    {
      name: 'resolve_output_dir',
      required: true,
      execute: async (ctx, logger) => {
        const dir = await resolveSidecarDir(
          ctx.recordingPath,
          ctx.request.settings.ledgerOutputDirectory,
          logger
        );
        if (!dir) return fail('hash output directory could not be resolved');
        ctx.outputDir = dir;
        return passed;
      },
    },
    {
      name: 'write_sidecar',
      required: false,
      execute: async (ctx, logger) => {
        const result = await ctx.tools.writeSidecar(ctx.outputDir, ctx.recordingPath, ctx.sha256, logger);
        if (!result.ok) return fail(`failed to write sidecar ${result.sidecarPath}`);
        ctx.sidecarPath = result.sidecarPath;
        return passed;
      },
    },
    {
      name: 'append_ledger',
      required: true,
      execute: async (ctx) => {
        const outcome = await ctx.ledger.append({
          endTimeIso: ctx.request.endTimeIso,
          filePath: ctx.recordingPath,
          fileName: basename(ctx.recordingPath),
          fileSizeBytes: ctx.sizeBytes,
          durationSeconds: ctx.durationSeconds,
          sha256: ctx.sha256,
        });
        ctx.ledgerPath = outcome.ledgerPath;
        if (outcome.status === 'appended') return passed;
        if (outcome.status === 'deduplicated') {
          return { ok: false, reason: 'ledger append deduplicated', outcome: 'deduplicated' };
        }
        return fail(outcome.reason);
      },
    },
    {
      name: 'write_metadata',
      required: false,
      execute: async (ctx, logger) => {
        if (!ctx.environment) return fail('no environment snapshot was captured');
        let mtimeMs: number | null = null;
        try {
          mtimeMs = (await stat(ctx.recordingPath)).mtimeMs;
        } catch (err) {
          logger.warn(`Could not read recording mtime: ${errorMessage(err)}`);
        }
        const rows = buildMetadataRows(
          {
            path: ctx.recordingPath,
            sizeBytes: ctx.sizeBytes,
            mtimeMs,
            stopTimeIso: ctx.request.endTimeIso,
            durationSeconds: ctx.durationSeconds,
            sha256: ctx.sha256,
          },
          ctx.environment
        );
        ctx.metadataPath = await writeMetadataCsv(ctx.outputDir, rows, ctx.request.settings.delimiter, logger);
        return ctx.metadataPath ? passed : fail('failed to write metadata report');
      },
    },
  ];

  const skippedStages: StageName[] = [];
  if (!settings.captureMetadata) skippedStages.push('snapshot_environment', 'write_metadata');
  if (!settings.organizeIntoFolder) skippedStages.push('organize_folder');

  return { stages, skippedStages };
}
