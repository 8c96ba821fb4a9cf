import OBSWebSocket from 'obs-websocket-js';
import { errorMessage, type Logger } from '../logging/logger.js';
import type { RecordingHost, RecordingStop, SceneItemSnapshot, SceneSnapshot } from './types.js';

const OUTPUT_STARTED = 'OBS_WEBSOCKET_OUTPUT_STARTED';
const OUTPUT_STOPPED = 'OBS_WEBSOCKET_OUTPUT_STOPPED';

export interface ObsHostOptions {
  url: string;
  password?: string;
  logger: Logger;
  /** Called once per stopped recording with the path and duration known at that moment. */
  onRecordingStopped: (stop: RecordingStop) => void;
  /** Called once when the websocket closes without `disconnect()` having been asked for. */
  onConnectionLost?: (reason: string) => void;
}

function asString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function asBoolean(value: unknown): boolean | null {
  return typeof value === 'boolean' ? value : null;
}

/**
 * OBS Studio over obs-websocket (v5 protocol). Tracks record start/stop
 * events to know the path and duration of the recording that just ended.
 */
export class ObsRecordingHost implements RecordingHost {
  readonly name = 'obs-websocket';
  private readonly obs = new OBSWebSocket();
  private readonly logger: Logger;
  private startedAt: number | null = null;
  private lastPath = '';
  private lastDurationSeconds: number | null = null;
  private closing = false;
  private lost = false;

  constructor(private readonly options: ObsHostOptions) {
    this.logger = options.logger.child({ component: 'obs-host' });
    this.obs.on('RecordStateChanged', (event) => {
      const outputPath = 'outputPath' in event ? asString(event.outputPath) : '';
      this.handleRecordState(event.outputState, outputPath, Date.now());
    });
    this.obs.on('ConnectionClosed', (err) => {
      this.handleConnectionClosed(err.message);
    });
  }

  async connect(): Promise<void> {
    const { obsWebSocketVersion, negotiatedRpcVersion } = await this.obs.connect(
      this.options.url,
      this.options.password || undefined
    );
    this.logger.info(`Connected to obs-websocket ${obsWebSocketVersion} (rpc v${negotiatedRpcVersion})`, {
      url: this.options.url,
    });
  }

  async disconnect(): Promise<void> {
    this.closing = true;
    await this.obs.disconnect();
  }

  handleConnectionClosed(reason: string): void {
    if (this.closing) {
      this.logger.info('Connection closed');
      return;
    }
    this.logger.warn(`Connection lost: ${reason}`);
    if (this.lost) return;
    this.lost = true;
    this.options.onConnectionLost?.(reason);
  }

  handleRecordState(state: string, outputPath: string, nowMs: number): void {
    if (state === OUTPUT_STARTED) {
      this.startedAt = nowMs;
      this.lastPath = '';
      this.lastDurationSeconds = null;
      this.logger.info('Recording started');
      return;
    }
    if (state !== OUTPUT_STOPPED) return;

    this.lastPath = outputPath;
    this.lastDurationSeconds =
      this.startedAt === null ? null : Math.trunc((nowMs - this.startedAt) / 1000);
    this.startedAt = null;
    this.logger.info('Recording stopped', {
      path: outputPath || '(unknown)',
      durationSeconds: this.lastDurationSeconds,
    });
    this.options.onRecordingStopped({ path: outputPath, durationSeconds: this.lastDurationSeconds });
  }

  async lastRecordingPath(): Promise<string> {
    return this.lastPath;
  }

  async recordingDurationSeconds(): Promise<number | null> {
    return this.lastDurationSeconds;
  }

  async recordingOutputSettings(): Promise<Record<string, string>> {
    const { recordDirectory } = await this.obs.call('GetRecordDirectory');
    return recordDirectory ? { directory: recordDirectory } : {};
  }

  async sceneSnapshot(): Promise<SceneSnapshot | null> {
    const takenAtMs = Date.now();
    const { currentProgramSceneName } = await this.obs.call('GetCurrentProgramScene');
    if (!currentProgramSceneName) return null;

    let items: SceneItemSnapshot[] = [];
    try {
      const { sceneItems } = await this.obs.call('GetSceneItemList', { sceneName: currentProgramSceneName });
      items = sceneItems.map((item) => ({
        sourceName: asString(item.sourceName),
        sourceKind: asString(item.inputKind) || asString(item.sourceType),
        sceneItemId: item.sceneItemId === undefined ? '' : String(item.sceneItemId),
        enabled: asBoolean(item.sceneItemEnabled),
        locked: asBoolean(item.sceneItemLocked),
      }));
    } catch (err) {
      this.logger.warn(`Scene item query failed: ${errorMessage(err)}`, { scene: currentProgramSceneName });
    }
    return { sceneName: currentProgramSceneName, takenAtMs, items };
  }

  async hostVersion(): Promise<string> {
    const { obsVersion, obsWebSocketVersion } = await this.obs.call('GetVersion');
    return `obs ${obsVersion} (obs-websocket ${obsWebSocketVersion})`;
  }
}
