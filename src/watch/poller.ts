import { appendFile, readdir } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { errorMessage, type Logger } from '../logging/logger.js';
import { hashFileWithRetries } from '../tools/hasher.js';
import { waitForStableFile, type SizeReader } from '../tools/stability.js';
import { writeSidecar } from '../tools/sidecar.js';

export interface PollerOptions {
  directory: string;
  extensions: string[];
  intervalMs: number;
  retryCount: number;
  retryDelayMs: number;
  /** Sidecar directory; defaults to the watched directory. */
  outputDir?: string;
  /** Optional plain `name,digest` log, one line per hashed file. */
  logFile?: string;
  logger: Logger;
  sizeOf?: SizeReader;
}

export interface PolledFile {
  fileName: string;
  sha256: string;
  sidecarPath: string;
}

/**
 * Polling alternative to event-driven runs: every `intervalMs` it looks for
 * new files by extension and hashes them. Files are keyed by name in memory
 * only; nothing is deduplicated across restarts.
 */
export class DirectoryPoller {
  private readonly seen = new Set<string>();
  private readonly extensions: Set<string>;
  private readonly logger: Logger;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private scanning: Promise<PolledFile[]> | null = null;

  constructor(private readonly options: PollerOptions) {
    this.extensions = new Set(options.extensions.map((ext) => ext.toLowerCase()));
    this.logger = options.logger.child({ component: 'poller', directory: options.directory });
  }

  get seenCount(): number {
    return this.seen.size;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.logger.info(`Monitoring ${this.options.directory} every ${this.options.intervalMs}ms`, {
      extensions: [...this.extensions],
    });
    this.schedule(0);
  }

  /** Stops future scans and waits for the one in progress, if any. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.scanning) await this.scanning;
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.scanning = this.scanOnce()
        .catch((err: unknown) => {
          this.logger.error(`Scan failed: ${errorMessage(err)}`);
          return [];
        })
        .finally(() => {
          this.scanning = null;
          if (this.running) this.schedule(this.options.intervalMs);
        });
    }, delayMs);
  }

  /** One pass over the directory. New files are processed one after another. */
  async scanOnce(): Promise<PolledFile[]> {
    const entries = await readdir(this.options.directory, { withFileTypes: true });
    const processed: PolledFile[] = [];

    for (const entry of entries) {
      if (!entry.isFile()) continue;
      if (!this.extensions.has(extname(entry.name).toLowerCase())) continue;
      if (this.seen.has(entry.name)) continue;

      const result = await this.processFile(entry.name);
      if (result) processed.push(result);
    }
    return processed;
  }

  private async processFile(fileName: string): Promise<PolledFile | null> {
    const path = join(this.options.directory, fileName);
    const logger = this.logger.child({ path });
    const { retryCount, retryDelayMs } = this.options;
    logger.info(`New recording detected: ${fileName}`);

    const observation = await waitForStableFile(path, {
      retries: retryCount,
      delayMs: retryDelayMs,
      logger,
      sizeOf: this.options.sizeOf,
    });
    if (!observation.stable) {
      logger.warn(`File not ready after retries, will retry next scan: ${fileName}`);
      return null;
    }

    const sha256 = await hashFileWithRetries(path, { retries: retryCount, delayMs: retryDelayMs, logger });
    if (!sha256) {
      logger.error(`Failed to hash file after retries: ${fileName}`);
      return null;
    }
    this.seen.add(fileName);
    logger.info(`SHA-256: ${sha256}`);

    const sidecar = await writeSidecar(this.options.outputDir ?? this.options.directory, path, sha256, logger);

    if (this.options.logFile) {
      try {
        await appendFile(this.options.logFile, `${fileName},${sha256}\n`, 'utf-8');
      } catch (err) {
        logger.error(`Hash log write failed: ${errorMessage(err)}`, { logFile: this.options.logFile });
      }
    }

    return { fileName, sha256, sidecarPath: sidecar.ok ? sidecar.sidecarPath : '' };
  }
}
