import { Command, InvalidArgumentError } from 'commander';
import { loadConfig } from '../config/config.js';
import type { RawConfig, RecLedgerConfig } from '../config/schema.js';
import { RecordingDispatcher } from '../control-plane/dispatcher.js';
import type { RunReport } from '../control-plane/types.js';
import { ObsRecordingHost } from '../host/obs-host.js';
import { StaticRecordingHost } from '../host/static-host.js';
import type { RecordingHost } from '../host/types.js';
import { LedgerStore } from '../ledger/store.js';
import { getLogger, type Logger } from '../logging/logger.js';
import { cleanUserPath } from '../utils/paths.js';
import { DirectoryPoller } from '../watch/poller.js';

interface ConfigFlags {
  config?: string;
  ledger?: string;
  outDir?: string;
  delimiter?: string;
  retryCount?: string;
  retryDelay?: string;
  metadata?: boolean;
  organize?: boolean;
}

interface ProcessFlags extends ConfigFlags {
  duration?: number;
  dir?: string;
  ext?: string;
}

interface WatchFlags extends ConfigFlags {
  interval?: string;
  ext?: string;
  logFile?: string;
}

function parseSeconds(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0) {
    throw new InvalidArgumentError('Duration must be a non-negative number of seconds.');
  }
  return n;
}

function withConfigOptions(command: Command): Command {
  return command
    .option('--config <path>', 'JSON config file (default: ./recledger.config.json)')
    .option('--ledger <path>', 'Ledger CSV path (default: recording_hashes.csv beside each recording)')
    .option('--out-dir <dir>', 'Directory for .sha256 sidecars (default: beside the recording)')
    .option('--delimiter <char>', 'Ledger delimiter: "," or ";"')
    .option('--retry-count <n>', 'Stability/hash attempts')
    .option('--retry-delay <ms>', 'Delay between attempts in milliseconds')
    .option('--metadata', 'Also write a <name>.metadata.csv environment report')
    .option('--organize', 'Move each recording into its own folder before hashing');
}

function overridesFrom(flags: ConfigFlags): RawConfig {
  return {
    ledger_path: flags.ledger,
    ledger_output_directory: flags.outDir,
    delimiter: flags.delimiter,
    retry_count: flags.retryCount,
    retry_delay_ms: flags.retryDelay,
    capture_metadata: flags.metadata,
    organize_into_folder: flags.organize,
  };
}

async function startDispatcher(
  host: RecordingHost,
  config: RecLedgerConfig,
  logger: Logger
): Promise<RecordingDispatcher> {
  const ledger = new LedgerStore({ logger, ledgerPath: config.ledgerPath, delimiter: config.delimiter });
  const dispatcher = new RecordingDispatcher({ host, ledger, logger, config });
  await dispatcher.applyConfig(config);
  return dispatcher;
}

function printReport(report: RunReport): void {
  const tag = report.outcome === 'done' ? 'done' : report.outcome.toUpperCase();
  console.log(`[recledger] ${tag} ${report.recordingPath || '(unresolved)'} id=${report.runId}`);
  if (report.sha256) console.log(`  sha256  ${report.sha256}`);
  if (report.sidecarPath) console.log(`  sidecar ${report.sidecarPath}`);
  if (report.ledgerPath) console.log(`  ledger  ${report.ledgerPath}`);
  if (report.metadataPath) console.log(`  report  ${report.metadataPath}`);
  if (report.failedStage) console.log(`  stage   ${report.failedStage}: ${report.reason ?? ''}`);
}

function waitForShutdown(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

export function buildCli(): Command {
  const program = new Command();

  program
    .name('recledger')
    .description(
      'Hash finished recordings into .sha256 sidecars and a deduplicated CSV ledger.\n\n' +
        'Waits for each file to stop growing, hashes it with SHA-256 and records one\n' +
        'ledger row per recording path.'
    )
    .version('0.1.0');

  withConfigOptions(
    program
      .command('process')
      .description('Process one finished recording')
      .argument('[file]', 'Recording file (omit to use the newest file in --dir)')
      .option('--duration <seconds>', 'Recording duration in seconds', parseSeconds)
      .option('--dir <directory>', 'Directory to search when no file is given')
      .option('--ext <extension>', 'Extension filter for --dir (e.g. mkv)')
  ).action(async (file: string | undefined, flags: ProcessFlags) => {
    const logger = getLogger();
    const config = await loadConfig({ configPath: flags.config, overrides: overridesFrom(flags), logger });
    const host = new StaticRecordingHost({
      path: file ? cleanUserPath(file) : undefined,
      durationSeconds: flags.duration ?? null,
      directory: flags.dir ? cleanUserPath(flags.dir) : undefined,
      extension: flags.ext,
    });

    const dispatcher = await startDispatcher(host, config, logger);
    dispatcher.recordingStopped();
    const reports = await dispatcher.drain();

    for (const report of reports) printReport(report);
    if (reports.some((r) => r.outcome === 'aborted')) {
      process.exitCode = 2;
    }
  });

  withConfigOptions(
    program.command('listen').description('Connect to OBS over obs-websocket and process every stopped recording')
  ).action(async (flags: ConfigFlags) => {
    const logger = getLogger();
    const config = await loadConfig({ configPath: flags.config, overrides: overridesFrom(flags), logger });

    let dispatcher: RecordingDispatcher | undefined;
    let reportLost: (reason: string) => void = () => undefined;
    const connectionLost = new Promise<string>((resolve) => {
      reportLost = resolve;
    });
    const host = new ObsRecordingHost({
      url: config.obsWebsocketUrl,
      password: config.obsWebsocketPassword,
      logger,
      onRecordingStopped: (stop) => {
        dispatcher?.recordingStopped(stop);
      },
      onConnectionLost: (reason) => reportLost(reason),
    });
    dispatcher = await startDispatcher(host, config, logger);
    await host.connect();
    console.log(`[recledger] listening on ${config.obsWebsocketUrl} (Ctrl+C to stop)`);

    const ended = await Promise.race([
      waitForShutdown().then((signal) => ({ signal, lost: '' })),
      connectionLost.then((reason) => ({ signal: null, lost: reason })),
    ]);
    if (ended.signal) {
      logger.info(`Received ${ended.signal}; waiting for in-flight runs`, { pending: dispatcher.pending });
    } else {
      logger.error(`OBS connection lost (${ended.lost}); waiting for in-flight runs`, {
        pending: dispatcher.pending,
      });
    }
    const reports = await dispatcher.drain();
    if (ended.signal) {
      await host.disconnect();
      console.log(`[recledger] stopped after ${reports.length} pending run(s)`);
    } else {
      console.error(`[recledger] connection to OBS lost after ${reports.length} pending run(s)`);
      process.exitCode = 1;
    }
  });

  withConfigOptions(
    program
      .command('watch')
      .description('Poll a directory and hash new recordings (no ledger, in-memory dedupe by file name)')
      .argument('<dir>', 'Directory to watch')
      .option('--interval <ms>', 'Polling interval in milliseconds')
      .option('--ext <list>', 'Comma-separated extension allowlist (default: .mp4,.mkv,.mov,.flv)')
      .option('--log-file <path>', 'Append "<name>,<sha256>" lines to this file')
  ).action(async (dir: string, flags: WatchFlags) => {
    const logger = getLogger();
    const config = await loadConfig({
      configPath: flags.config,
      overrides: { ...overridesFrom(flags), watch_interval_ms: flags.interval, watch_extensions: flags.ext },
      logger,
    });

    const poller = new DirectoryPoller({
      directory: cleanUserPath(dir),
      extensions: config.watchExtensions,
      intervalMs: config.watchIntervalMs,
      retryCount: config.retryCount,
      retryDelayMs: config.retryDelayMs,
      outputDir: config.ledgerOutputDirectory || undefined,
      logFile: flags.logFile ? cleanUserPath(flags.logFile) : undefined,
      logger,
    });
    poller.start();

    const signal = await waitForShutdown();
    logger.info(`Received ${signal}; stopping poller`);
    await poller.stop();
  });

  return program;
}
