import { mkdir, readFile, rmdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { LedgerStore } from '../ledger/store.js';
import type { LedgerEntry } from '../ledger/types.js';
import { captureLogger, makeTempDir, removeDir } from './helpers.js';

const HEADER = 'end_time_iso,file_path,file_name,file_size_bytes,duration_seconds,sha256';
const T = '2026-10-19T14:03:05+02:00';

function makeEntry(filePath: string, overrides: Partial<LedgerEntry> = {}): LedgerEntry {
  const fileName = filePath.split('/').pop() ?? filePath;
  return {
    endTimeIso: T,
    filePath,
    fileName,
    fileSizeBytes: 1024,
    durationSeconds: 30,
    sha256: 'f'.repeat(64),
    ...overrides,
  };
}

function dataLines(text: string): string[] {
  return text.split('\n').filter((line) => line.length > 0 && !line.startsWith('end_time_iso'));
}

describe('LedgerStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  describe('resolvePath', () => {
    it('prefers the configured ledger path', () => {
      const { logger } = captureLogger();
      const store = new LedgerStore({ logger, ledgerPath: '/ledgers/all.csv' });

      expect(store.resolvePath('/rec/show.mkv')).toBe('/ledgers/all.csv');
    });

    it('derives recording_hashes.csv beside the recording otherwise', () => {
      const { logger } = captureLogger();
      const store = new LedgerStore({ logger });

      expect(store.resolvePath('/rec/show.mkv')).toBe('/rec/recording_hashes.csv');
    });

    it('returns an empty string without a recording path', () => {
      const { logger } = captureLogger();
      const store = new LedgerStore({ logger });

      expect(store.resolvePath('')).toBe('');
    });
  });

  describe('reload', () => {
    it('populates the seen set with exactly the recorded paths', async () => {
      const ledgerPath = join(dir, 'ledger.csv');
      await writeFile(
        ledgerPath,
        `${HEADER}\n${T},${dir}/a.mkv,a.mkv,10,,aa\n${T},${dir}/b.mkv,b.mkv,20,5,bb\n`
      );
      const { logger } = captureLogger();
      const store = new LedgerStore({ logger, ledgerPath });

      await store.reload(ledgerPath);

      expect(store.sourcePath).toBe(ledgerPath);
      expect(store.seenCount).toBe(2);
      expect(await store.isRecorded(join(dir, 'a.mkv'))).toBe(true);
      expect(await store.isRecorded(join(dir, 'b.mkv'))).toBe(true);
      expect(await store.isRecorded(join(dir, 'c.mkv'))).toBe(false);
    });

    it('reads a headerless ledger by column position', async () => {
      const ledgerPath = join(dir, 'ledger.csv');
      await writeFile(ledgerPath, `${T};${dir}/a.mkv;a.mkv;10;;aa\n`);
      const { logger } = captureLogger();
      const store = new LedgerStore({ logger, ledgerPath, delimiter: ';' });

      await store.reload(ledgerPath);

      expect(await store.isRecorded(join(dir, 'a.mkv'))).toBe(true);
    });

    it('starts empty when the ledger does not exist yet', async () => {
      const { logger } = captureLogger();
      const store = new LedgerStore({ logger });
      const ledgerPath = join(dir, 'none.csv');

      await store.reload(ledgerPath);

      expect(store.seenCount).toBe(0);
      expect(store.sourcePath).toBe(ledgerPath);
    });

    it('clears and reloads when configured with a different ledger', async () => {
      const first = join(dir, 'first.csv');
      const second = join(dir, 'second.csv');
      await writeFile(first, `${HEADER}\n${T},${dir}/a.mkv,a.mkv,10,,aa\n`);
      await writeFile(second, `${HEADER}\n${T},${dir}/x.mkv,x.mkv,10,,xx\n${T},${dir}/y.mkv,y.mkv,10,,yy\n`);
      const { logger } = captureLogger();
      const store = new LedgerStore({ logger });

      await store.configure({ ledgerPath: first });
      expect(store.seenCount).toBe(1);

      await store.configure({ ledgerPath: second });
      expect(store.sourcePath).toBe(second);
      expect(store.seenCount).toBe(2);
      expect(await store.isRecorded(join(dir, 'a.mkv'))).toBe(false);
    });
  });

  describe('append', () => {
    it('writes the header once for a new ledger', async () => {
      const { logger } = captureLogger();
      const store = new LedgerStore({ logger });
      const path = join(dir, 'show.mkv');

      const outcome = await store.append(makeEntry(path, { durationSeconds: null }));

      const ledgerPath = join(dir, 'recording_hashes.csv');
      expect(outcome).toEqual({ status: 'appended', ledgerPath });
      expect(await readFile(ledgerPath, 'utf-8')).toBe(
        `${HEADER}\n${T},${path},show.mkv,1024,,${'f'.repeat(64)}\n`
      );
    });

    it('writes the header into an existing empty file', async () => {
      const ledgerPath = join(dir, 'ledger.csv');
      await writeFile(ledgerPath, '');
      const { logger } = captureLogger();
      const store = new LedgerStore({ logger, ledgerPath });

      await store.append(makeEntry(join(dir, 'a.mkv')));

      const lines = (await readFile(ledgerPath, 'utf-8')).split('\n');
      expect(lines[0]).toBe(HEADER);
      expect(lines.filter((l) => l === HEADER)).toHaveLength(1);
    });

    it('never rewrites the header of a ledger with content', async () => {
      const ledgerPath = join(dir, 'ledger.csv');
      const existing = `${HEADER}\n${T},${dir}/a.mkv,a.mkv,10,,aa\n`;
      await writeFile(ledgerPath, existing);
      const { logger } = captureLogger();
      const store = new LedgerStore({ logger, ledgerPath });

      await store.append(makeEntry(join(dir, 'b.mkv'), { sha256: 'bb', durationSeconds: 7 }));

      expect(await readFile(ledgerPath, 'utf-8')).toBe(`${existing}${T},${dir}/b.mkv,b.mkv,1024,7,bb\n`);
    });

    it('accepts a new path after reload and rejects a recorded one', async () => {
      const ledgerPath = join(dir, 'ledger.csv');
      await writeFile(
        ledgerPath,
        `${HEADER}\n${T},${dir}/a.mkv,a.mkv,10,,aa\n${T},${dir}/b.mkv,b.mkv,20,,bb\n`
      );
      const captured = captureLogger();
      const store = new LedgerStore({ logger: captured.logger, ledgerPath });
      await store.configure({ ledgerPath });

      const added = await store.append(makeEntry(join(dir, 'c.mkv')));
      const repeated = await store.append(makeEntry(join(dir, 'a.mkv')));

      expect(added.status).toBe('appended');
      expect(repeated).toEqual({ status: 'deduplicated', ledgerPath });
      expect(dataLines(await readFile(ledgerPath, 'utf-8'))).toHaveLength(3);
      expect(await captured.messages('info')).toContain(`Ledger append deduplicated: ${dir}/a.mkv`);
    });

    it('appends exactly one row for many concurrent appends of one path', async () => {
      const { logger } = captureLogger();
      const store = new LedgerStore({ logger });
      const path = join(dir, 'burst.mkv');

      const outcomes = await Promise.all(Array.from({ length: 10 }, () => store.append(makeEntry(path))));

      expect(outcomes.filter((o) => o.status === 'appended')).toHaveLength(1);
      expect(outcomes.filter((o) => o.status === 'deduplicated')).toHaveLength(9);
      const text = await readFile(join(dir, 'recording_hashes.csv'), 'utf-8');
      expect(dataLines(text)).toHaveLength(1);
      expect(text.split('\n').filter((l) => l === HEADER)).toHaveLength(1);
    });

    it('keeps one row per path when different paths race', async () => {
      const { logger } = captureLogger();
      const store = new LedgerStore({ logger });
      const paths = ['a', 'b', 'c'].map((n) => join(dir, `${n}.mkv`));

      await Promise.all([...paths, ...paths].map((p) => store.append(makeEntry(p))));

      const lines = dataLines(await readFile(join(dir, 'recording_hashes.csv'), 'utf-8'));
      expect(lines).toHaveLength(3);
      for (const p of paths) {
        expect(lines.filter((l) => l.includes(`,${p},`))).toHaveLength(1);
      }
    });

    it('folds case on case-insensitive platforms', async () => {
      const { logger } = captureLogger();
      const store = new LedgerStore({ logger, platform: 'darwin' });

      const first = await store.append(makeEntry(join(dir, 'Show.MKV')));
      const second = await store.append(makeEntry(join(dir, 'show.mkv')));

      expect(first.status).toBe('appended');
      expect(second.status).toBe('deduplicated');
    });

    it('keeps case distinct on case-sensitive platforms', async () => {
      const { logger } = captureLogger();
      const store = new LedgerStore({ logger, platform: 'linux' });

      await store.append(makeEntry(join(dir, 'Show.MKV')));
      const second = await store.append(makeEntry(join(dir, 'show.mkv')));

      expect(second.status).toBe('appended');
    });

    it('rolls the path back out of the seen set when the write fails', async () => {
      const ledgerPath = join(dir, 'ledger-as-dir');
      await mkdir(ledgerPath);
      const captured = captureLogger();
      const store = new LedgerStore({ logger: captured.logger, ledgerPath });
      const path = join(dir, 'retry.mkv');

      const failed = await store.append(makeEntry(path));

      expect(failed.status).toBe('failed');
      expect(await store.isRecorded(path)).toBe(false);
      const errors = await captured.messages('error');
      expect(errors).toHaveLength(1);
      expect(errors[0]).toMatch(/^Ledger write failed: /);

      await rmdir(ledgerPath);
      const retried = await store.append(makeEntry(path));

      expect(retried).toEqual({ status: 'appended', ledgerPath });
      expect(dataLines(await readFile(ledgerPath, 'utf-8'))).toHaveLength(1);
    });

    it('uses the configured delimiter for header and rows', async () => {
      const ledgerPath = join(dir, 'semi.csv');
      const { logger } = captureLogger();
      const store = new LedgerStore({ logger, ledgerPath, delimiter: ';' });

      await store.append(makeEntry(join(dir, 'a.mkv'), { durationSeconds: null, sha256: 'aa' }));

      expect(await readFile(ledgerPath, 'utf-8')).toBe(
        'end_time_iso;file_path;file_name;file_size_bytes;duration_seconds;sha256\n' +
          `${T};${dir}/a.mkv;a.mkv;1024;;aa\n`
      );
    });
  });
});
