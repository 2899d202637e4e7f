import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  artifactPath,
  infoTime,
  pageSourcePath,
  readCollectionInfo,
  writeCollectionInfo,
} from '../../src/report/writer.js';

describe('artifactPath', () => {
  it('places each screenshot under its collection, named after the step', () => {
    expect(artifactPath('/out', { collectionId: '000001', stepName: 'view-data' })).toBe(
      path.join('/out', '000001', 'view-data.png'),
    );
  });

  it('keeps the page source next to the screenshot', () => {
    expect(pageSourcePath('/out', { collectionId: '000001', stepName: 'landing' })).toBe(
      path.join('/out', '000001', 'landing.html'),
    );
  });
});

describe('infoTime', () => {
  it('rounds durations to the millisecond', () => {
    expect(infoTime({ kind: 'duration', seconds: 1.23456 })).toBe(1.235);
  });

  it('spells out failures', () => {
    expect(infoTime({ kind: 'timeout' })).toBe('timed out');
    expect(infoTime({ kind: 'error', message: 'boom' })).toBe('ERROR: boom');
  });
});

describe('writeCollectionInfo', () => {
  let outDir: string;

  beforeEach(async () => {
    outDir = await mkdtemp(path.join(tmpdir(), 'webshots-info-'));
  });

  afterEach(async () => {
    await rm(outDir, { recursive: true, force: true });
  });

  it('writes the step times as YAML next to the screenshots', async () => {
    const file = await writeCollectionInfo(outDir, '000001', [
      { stepName: 'landing', outcome: { kind: 'duration', seconds: 1.5 } },
      { stepName: 'edit-metadata', outcome: { kind: 'timeout' } },
    ]);

    expect(file).toBe(path.join(outDir, '000001', 'info.yaml'));
    expect(await readFile(file, 'utf-8')).toBe(
      'times:\n  landing: 1.5\n  edit-metadata: timed out\n',
    );
  });

  it('overwrites the previous record', async () => {
    await writeCollectionInfo(outDir, '000001', [
      { stepName: 'landing', outcome: { kind: 'timeout' } },
    ]);
    await writeCollectionInfo(outDir, '000001', [
      { stepName: 'landing', outcome: { kind: 'duration', seconds: 2 } },
    ]);

    await expect(readCollectionInfo(outDir, '000001')).resolves.toEqual({ times: { landing: 2 } });
  });
});
