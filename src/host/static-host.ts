import type { RecordingHost, SceneSnapshot } from './types.js';

export interface StaticHostOptions {
  path?: string;
  durationSeconds?: number | null;
  /** Directory to search when no path is given. */
  directory?: string;
  extension?: string;
  version?: string;
  scene?: SceneSnapshot | null;
}

/** Host for one-shot runs where the recording is named on the command line. */
export class StaticRecordingHost implements RecordingHost {
  readonly name = 'static';

  constructor(private readonly options: StaticHostOptions) {}

  async lastRecordingPath(): Promise<string> {
    return this.options.path ?? '';
  }

  async recordingDurationSeconds(): Promise<number | null> {
    return this.options.durationSeconds ?? null;
  }

  async recordingOutputSettings(): Promise<Record<string, string>> {
    const settings: Record<string, string> = {};
    if (this.options.directory) settings.directory = this.options.directory;
    if (this.options.extension) settings.extension = this.options.extension;
    return settings;
  }

  async sceneSnapshot(): Promise<SceneSnapshot | null> {
    return this.options.scene ?? null;
  }

  async hostVersion(): Promise<string> {
    return this.options.version ?? `node ${process.version}`;
  }
}
