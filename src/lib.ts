export { loadConfig, normalizeConfig, readConfigFile, configFromEnv } from './config/config.js';
export { defaultConfig, type Delimiter, type RecLedgerConfig, type RawConfig } from './config/schema.js';
export { RecordingDispatcher, type DispatcherOptions } from './control-plane/dispatcher.js';
export { runPipeline } from './control-plane/orchestrator.js';
export { buildPipeline } from './control-plane/workflow.js';
export type {
  PipelineSettings,
  PipelineTools,
  RecordingRequest,
  RunOutcome,
  RunReport,
  StageName,
  StageResult,
} from './control-plane/types.js';
export { ObsRecordingHost, type ObsHostOptions } from './host/obs-host.js';
export { StaticRecordingHost, type StaticHostOptions } from './host/static-host.js';
export { resolveRecordingPath, findLatestFile } from './host/resolver.js';
export type { RecordingHost, RecordingStop, SceneSnapshot, SceneItemSnapshot } from './host/types.js';
export { LedgerStore, type LedgerStoreOptions } from './ledger/store.js';
export { LEDGER_HEADER, LEDGER_FILE_NAME, type LedgerEntry, type AppendOutcome } from './ledger/types.js';
export { createLogger, getLogger, type Logger } from './logging/logger.js';
export { hashFile, hashFileWithRetries } from './tools/hasher.js';
export { moveIntoOwnFolder, uniqueFolder } from './tools/organizer.js';
export { waitForStableFile, type StabilityObservation } from './tools/stability.js';
export { writeSidecar, resolveSidecarDir, formatSidecar } from './tools/sidecar.js';
export { DirectoryPoller, type PollerOptions } from './watch/poller.js';
