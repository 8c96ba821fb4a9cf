import { appendFile, mkdir, readFile, stat } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { AsyncLock } from '../utils/lock.js';
import { isErrnoCode } from '../utils/errors.js';
import { normalizePathKey, toAbsolutePath } from '../utils/paths.js';
import { errorMessage, type Logger } from '../logging/logger.js';
import { entryToRow, extractFilePaths, formatHeader, formatRows, parseRows } from './csv.js';
import {
  LEDGER_FILE_NAME,
  type AppendOutcome,
  type LedgerEntry,
  type LedgerSettings,
} from './types.js';

export interface LedgerStoreOptions extends Partial<LedgerSettings> {
  logger: Logger;
  platform?: NodeJS.Platform;
}

/**
 * Append-only CSV ledger with at most one row per normalized recording path.
 *
 * The seen set mirrors the `file_path` column of the ledger it was loaded
 * from. Two locks guard it: `ioLock` serializes every ledger read and write,
 * `membershipLock` serializes mutation of the seen set. An append holds both
 * across check-and-insert, so concurrent appends of one path produce one row.
 */
export class LedgerStore {
  private settings: LedgerSettings;
  private readonly logger: Logger;
  private readonly platform: NodeJS.Platform;
  private readonly seen = new Set<string>();
  private loadedFrom = '';
  private readonly ioLock = new AsyncLock();
  private readonly membershipLock = new AsyncLock();

  constructor(options: LedgerStoreOptions) {
    this.settings = {
      ledgerPath: options.ledgerPath ?? '',
      delimiter: options.delimiter ?? ',',
    };
    this.logger = options.logger.child({ component: 'ledger' });
    this.platform = options.platform ?? process.platform;
  }

  get currentSettings(): Readonly<LedgerSettings> {
    return this.settings;
  }

  /** Ledger file the seen set currently reflects; empty before the first load. */
  get sourcePath(): string {
    return this.loadedFrom;
  }

  get seenCount(): number {
    return this.seen.size;
  }

  /** Applies new settings and reloads the seen set from the configured ledger, if any. */
  async configure(settings: Partial<LedgerSettings>): Promise<void> {
    this.settings = {
      ledgerPath: settings.ledgerPath ?? this.settings.ledgerPath,
      delimiter: settings.delimiter ?? this.settings.delimiter,
    };
    if (this.settings.ledgerPath) {
      await this.reload(this.settings.ledgerPath);
    }
  }

  resolvePath(recordingPath: string): string {
    if (this.settings.ledgerPath) return this.settings.ledgerPath;
    if (!recordingPath) return '';
    const dir = dirname(toAbsolutePath(recordingPath));
    if (!dir) return '';
    return join(dir, LEDGER_FILE_NAME);
  }

  normalize(path: string): string {
    return normalizePathKey(path, this.platform);
  }

  async ensureLoaded(ledgerPath: string): Promise<void> {
    await this.ioLock.run(() => this.ensureLoadedUnlocked(ledgerPath));
  }

  async reload(ledgerPath: string): Promise<void> {
    await this.ioLock.run(() => this.reloadUnlocked(ledgerPath));
  }

  /**
   * Advisory membership test against the ledger this recording would be
   * written to. The authoritative decision is taken again inside `append`.
   */
  async isRecorded(recordingPath: string): Promise<boolean> {
    const ledgerPath = this.resolvePath(recordingPath);
    if (!ledgerPath) return false;
    await this.ensureLoaded(ledgerPath);
    const key = this.normalize(recordingPath);
    return this.membershipLock.run(() => this.seen.has(key));
  }

  async append(entry: LedgerEntry): Promise<AppendOutcome> {
    const ledgerPath = this.resolvePath(entry.filePath);
    if (!ledgerPath) {
      this.logger.error('Ledger path could not be resolved.', { path: entry.filePath });
      return { status: 'failed', ledgerPath: '', reason: 'ledger path could not be resolved' };
    }

    const delimiter = this.settings.delimiter;
    const key = this.normalize(entry.filePath);

    return this.ioLock.run(async (): Promise<AppendOutcome> => {
      await this.ensureLoadedUnlocked(ledgerPath);

      const inserted = await this.membershipLock.run(() => {
        if (this.seen.has(key)) return false;
        this.seen.add(key);
        return true;
      });
      if (!inserted) {
        this.logger.info(`Ledger append deduplicated: ${entry.filePath}`, { ledgerPath });
        return { status: 'deduplicated', ledgerPath };
      }

      try {
        await mkdir(dirname(ledgerPath), { recursive: true });
        const isNew = await isMissingOrEmpty(ledgerPath);
        const text = (isNew ? formatHeader(delimiter) : '') + formatRows([entryToRow(entry)], delimiter);
        await appendFile(ledgerPath, text, 'utf-8');
        this.logger.info(`Ledger row written: ${ledgerPath}`, { path: entry.filePath, header: isNew });
        return { status: 'appended', ledgerPath };
      } catch (err) {
        const reason = errorMessage(err);
        this.logger.error(`Ledger write failed: ${reason}`, { path: entry.filePath, ledgerPath });
        await this.membershipLock.run(() => {
          this.seen.delete(key);
        });
        return { status: 'failed', ledgerPath, reason: `ledger write failed: ${reason}` };
      }
    });
  }

  private async ensureLoadedUnlocked(ledgerPath: string): Promise<void> {
    if (!ledgerPath || this.loadedFrom === ledgerPath) return;
    await this.reloadUnlocked(ledgerPath);
  }

  private async reloadUnlocked(ledgerPath: string): Promise<void> {
    await this.membershipLock.run(() => {
      this.seen.clear();
      this.loadedFrom = ledgerPath;
    });
    if (!ledgerPath) return;

    let text: string;
    try {
      text = await readFile(ledgerPath, 'utf-8');
    } catch (err) {
      if (isErrnoCode(err, 'ENOENT')) {
        this.logger.debug(`No ledger yet at ${ledgerPath}; starting empty.`);
      } else {
        this.logger.warn(`Ledger preload failed: ${errorMessage(err)}`, { ledgerPath });
      }
      return;
    }

    let keys: string[];
    try {
      keys = extractFilePaths(parseRows(text, this.settings.delimiter)).map((p) => this.normalize(p));
    } catch (err) {
      this.logger.warn(`Ledger preload failed: ${errorMessage(err)}`, { ledgerPath });
      return;
    }

    await this.membershipLock.run(() => {
      for (const key of keys) this.seen.add(key);
    });
    this.logger.info(`Loaded ${this.seen.size} recorded path(s) from ${ledgerPath}`);
  }
}

async function isMissingOrEmpty(path: string): Promise<boolean> {
  try {
    const info = await stat(path);
    return info.size === 0;
  } catch (err) {
    if (isErrnoCode(err, 'ENOENT')) return true;
    throw err;
  }
}
