export interface SceneItemSnapshot {
  sourceName: string;
  sourceKind: string;
  sceneItemId: string;
  enabled: boolean | null;
  locked: boolean | null;
}

export interface SceneSnapshot {
  sceneName: string;
  takenAtMs: number;
  items: SceneItemSnapshot[];
}

/** What the host knew at the moment a recording stopped. */
export interface RecordingStop {
  /** Output file reported with the stop event, or `''`. */
  path: string;
  durationSeconds: number | null;
}

/**
 * What the recording application exposes to the pipeline. Every method may
 * fail or return an empty value; callers treat both as "unknown".
 */
export interface RecordingHost {
  readonly name: string;
  /** Path of the recording that just stopped, or `''`. */
  lastRecordingPath(): Promise<string>;
  recordingDurationSeconds(): Promise<number | null>;
  /** Output settings such as `path`/`directory` and `format`/`extension`. */
  recordingOutputSettings(): Promise<Record<string, string>>;
  sceneSnapshot(): Promise<SceneSnapshot | null>;
  hostVersion(): Promise<string>;
}
