import type { RecLedgerConfig } from '../config/schema.js';
import type { RecordingHost, RecordingStop } from '../host/types.js';
import type { LedgerStore } from '../ledger/store.js';
import { errorMessage, type Logger } from '../logging/logger.js';
import { captureEnvironment, type EnvironmentSnapshot } from '../tools/metadata.js';
import { generateRunId } from '../utils/id.js';
import { localIsoNow } from '../utils/time.js';
import { runPipeline } from './orchestrator.js';
import type { PipelineSettings, PipelineTools, RecordingRequest, RunReport } from './types.js';

export interface DispatcherOptions {
  host: RecordingHost;
  ledger: LedgerStore;
  logger: Logger;
  config: RecLedgerConfig;
  tools?: Partial<PipelineTools>;
  /** Overridable clock for the row's end time. */
  now?: () => string;
}

function toSettings(config: RecLedgerConfig): PipelineSettings {
  return {
    ledgerOutputDirectory: config.ledgerOutputDirectory,
    delimiter: config.delimiter,
    retryCount: config.retryCount,
    retryDelayMs: config.retryDelayMs,
    captureMetadata: config.captureMetadata,
    organizeIntoFolder: config.organizeIntoFolder,
  };
}

/**
 * Turns "recording stopped" signals into background pipeline runs.
 *
 * Each signal starts an independent run; there is no queue and no limit.
 * `recordingStopped` returns as soon as the run is scheduled. Everything that
 * describes the finished recording (end time, path, duration, environment) is
 * taken before it returns, since the host may already be recording the next one.
 */
export class RecordingDispatcher {
  private settings: PipelineSettings;
  private readonly inflight = new Set<Promise<RunReport | null>>();
  private readonly logger: Logger;
  private readonly now: () => string;

  constructor(private readonly options: DispatcherOptions) {
    this.settings = toSettings(options.config);
    this.logger = options.logger.child({ component: 'dispatcher' });
    this.now = options.now ?? localIsoNow;
  }

  get pending(): number {
    return this.inflight.size;
  }

  get currentSettings(): Readonly<PipelineSettings> {
    return this.settings;
  }

  /** Swaps the settings used by future runs and reloads the ledger's seen set. */
  async applyConfig(config: RecLedgerConfig): Promise<void> {
    this.settings = toSettings(config);
    await this.options.ledger.configure({ ledgerPath: config.ledgerPath, delimiter: config.delimiter });
    this.logger.info('Configuration applied', {
      ledgerPath: config.ledgerPath || '(per recording directory)',
      outputDir: config.ledgerOutputDirectory || '(beside recording)',
      delimiter: config.delimiter,
      retryCount: config.retryCount,
      retryDelayMs: config.retryDelayMs,
    });
  }

  /** Schedules a run and returns its id without waiting for it. */
  recordingStopped(stop?: RecordingStop): string {
    const runId = generateRunId();
    const request: RecordingRequest = {
      runId,
      endTimeIso: this.now(),
      settings: this.settings,
      stop,
      environment: this.settings.captureMetadata ? this.snapshotEnvironment(runId) : undefined,
    };
    this.logger.info('Recording stop received; run scheduled', { runId, path: stop?.path || undefined });

    const task: Promise<RunReport | null> = runPipeline(request, {
      host: this.options.host,
      ledger: this.options.ledger,
      logger: this.options.logger,
      tools: this.options.tools,
    })
      .catch((err: unknown) => {
        this.logger.error(`Run crashed: ${errorMessage(err)}`, { runId });
        return null;
      })
      .finally(() => {
        this.inflight.delete(task);
      });
    this.inflight.add(task);
    return runId;
  }

  private snapshotEnvironment(runId: string): Promise<EnvironmentSnapshot | null> {
    return captureEnvironment(this.options.host, this.options.logger).catch((err: unknown) => {
      this.logger.warn(`Environment snapshot failed: ${errorMessage(err)}`, { runId });
      return null;
    });
  }

  /** Waits for every run scheduled so far, including ones started while waiting. */
  async drain(): Promise<RunReport[]> {
    const reports: RunReport[] = [];
    while (this.inflight.size > 0) {
      const batch = [...this.inflight];
      for (const report of await Promise.all(batch)) {
        if (report) reports.push(report);
      }
      for (const task of batch) this.inflight.delete(task);
    }
    return reports;
  }
}
