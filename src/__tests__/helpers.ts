import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Writable } from 'node:stream';
import winston from 'winston';
import { createLogger, type Logger } from '../logging/logger.js';
import type { RecordingHost, SceneSnapshot } from '../host/types.js';

export interface LogEntry {
  level: string;
  message: string;
  [key: string]: unknown;
}

export interface CapturedLogger {
  logger: Logger;
  entries: LogEntry[];
  /** Messages logged so far, optionally filtered by level. Waits one macrotask for delivery. */
  messages: (level?: string) => Promise<string[]>;
}

function toEntry(chunk: unknown): LogEntry {
  if (typeof chunk === 'object' && chunk !== null) {
    const record: Record<string, unknown> = { ...chunk };
    return { ...record, level: String(record.level), message: String(record.message) };
  }
  return { level: 'unknown', message: String(chunk) };
}

export function captureLogger(): CapturedLogger {
  const entries: LogEntry[] = [];
  const stream = new Writable({
    objectMode: true,
    write(chunk: unknown, _encoding, callback) {
      entries.push(toEntry(chunk));
      callback();
    },
  });
  const logger = createLogger({ level: 'debug', transports: [new winston.transports.Stream({ stream })] });

  return {
    logger,
    entries,
    messages: async (level?: string) => {
      await flushLogs();
      return entries.filter((e) => level === undefined || e.level === level).map((e) => e.message);
    },
  };
}

export function flushLogs(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export async function makeTempDir(prefix = 'recledger-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export interface FakeHostOptions {
  path?: string;
  durationSeconds?: number | null;
  settings?: Record<string, string>;
  scene?: SceneSnapshot | null;
  version?: string;
  failPathQuery?: boolean;
}

export class FakeHost implements RecordingHost {
  readonly name = 'fake';
  pathQueries = 0;

  constructor(private readonly options: FakeHostOptions = {}) {}

  async lastRecordingPath(): Promise<string> {
    this.pathQueries += 1;
    if (this.options.failPathQuery) throw new Error('host unavailable');
    return this.options.path ?? '';
  }

  async recordingDurationSeconds(): Promise<number | null> {
    return this.options.durationSeconds ?? null;
  }

  async recordingOutputSettings(): Promise<Record<string, string>> {
    return this.options.settings ?? {};
  }

  async sceneSnapshot(): Promise<SceneSnapshot | null> {
    return this.options.scene ?? null;
  }

  async hostVersion(): Promise<string> {
    return this.options.version ?? 'fake 1.0';
  }
}

/** Size reader that reports a larger size on every call. */
export function growingSize(start = 1): (path: string) => Promise<number> {
  let size = start;
  return async () => size++;
}
