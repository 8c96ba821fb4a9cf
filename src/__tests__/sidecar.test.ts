import { mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { formatSidecar, resolveSidecarDir, sidecarFileName, writeSidecar } from '../tools/sidecar.js';
import { captureLogger, makeTempDir, removeDir } from './helpers.js';

const DIGEST = 'a'.repeat(64);

describe('sidecar writer', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('formats digest and file name separated by two spaces', () => {
    expect(formatSidecar(DIGEST, 'show.mkv')).toBe(`${DIGEST}  show.mkv\n`);
    expect(sidecarFileName('/rec/show.mkv')).toBe('show.mkv.sha256');
  });

  it('writes <name>.sha256 into the output directory, creating it', async () => {
    const { logger } = captureLogger();
    const outDir = join(dir, 'hashes', 'nested');

    const result = await writeSidecar(outDir, '/rec/show.mkv', DIGEST, logger);

    expect(result).toEqual({ ok: true, sidecarPath: join(outDir, 'show.mkv.sha256') });
    expect(await readFile(result.sidecarPath, 'utf-8')).toBe(`${DIGEST}  show.mkv\n`);
  });

  it('overwrites an existing sidecar instead of appending', async () => {
    const { logger } = captureLogger();
    await writeSidecar(dir, '/rec/show.mkv', 'b'.repeat(64), logger);

    const result = await writeSidecar(dir, '/rec/show.mkv', DIGEST, logger);

    expect(await readFile(result.sidecarPath, 'utf-8')).toBe(`${DIGEST}  show.mkv\n`);
  });

  it('reports failure when the directory cannot be created', async () => {
    const captured = captureLogger();
    const blocker = join(dir, 'blocker');
    await writeFile(blocker, 'not a directory');

    const result = await writeSidecar(join(blocker, 'sub'), '/rec/show.mkv', DIGEST, captured.logger);

    expect(result.ok).toBe(false);
    const errors = await captured.messages('error');
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatch(/^Sidecar write failed: /);
  });
});

describe('resolveSidecarDir', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('creates and uses a configured directory', async () => {
    const { logger } = captureLogger();
    const configured = join(dir, 'sidecars');

    expect(await resolveSidecarDir(join(dir, 'show.mkv'), configured, logger)).toBe(configured);
    expect((await stat(configured)).isDirectory()).toBe(true);
  });

  it("falls back to the recording's directory when none is configured", async () => {
    const { logger } = captureLogger();

    expect(await resolveSidecarDir(join(dir, 'show.mkv'), '', logger)).toBe(dir);
  });

  it('warns and falls back when the configured directory is unusable', async () => {
    const captured = captureLogger();
    const blocker = join(dir, 'blocker');
    await writeFile(blocker, 'x');
    const recDir = join(dir, 'rec');
    await mkdir(recDir);

    const resolved = await resolveSidecarDir(join(recDir, 'show.mkv'), join(blocker, 'out'), captured.logger);

    expect(resolved).toBe(recDir);
    const warnings = await captured.messages('warn');
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatch(/^Configured hash output dir unusable: /);
  });

  it('returns an empty string when nothing is usable', async () => {
    const { logger } = captureLogger();

    expect(await resolveSidecarDir(join(dir, 'missing', 'show.mkv'), '', logger)).toBe('');
  });
});
