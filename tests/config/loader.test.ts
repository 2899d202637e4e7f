import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ZodError } from 'zod';

import { loadConfigFile } from '../../src/config/loader.js';

describe('loadConfigFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'webshots-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('yields the empty config when the file does not exist', async () => {
    await expect(loadConfigFile(path.join(dir, '.webshots.yaml'))).resolves.toEqual({
      instances: {},
      timeouts: {},
      signals: {},
    });
  });

  it('treats an empty file as the empty config', async () => {
    const file = path.join(dir, '.webshots.yaml');
    await writeFile(file, '');
    await expect(loadConfigFile(file)).resolves.toEqual({ instances: {}, timeouts: {}, signals: {} });
  });

  it('reads YAML', async () => {
    const file = path.join(dir, '.webshots.yaml');
    await writeFile(
      file,
      [
        'instance: dandi-staging',
        'headless: true',
        'timeouts:',
        '  settle: 0',
        'signals:',
        '  progress:',
        '    strategy: css',
        '    value: .spinner',
      ].join('\n'),
    );

    await expect(loadConfigFile(file)).resolves.toEqual({
      instance: 'dandi-staging',
      instances: {},
      headless: true,
      timeouts: { settle: 0 },
      signals: { progress: { strategy: 'css', value: '.spinner' } },
    });
  });

  it('reads JSON', async () => {
    const file = path.join(dir, 'webshots.json');
    await writeFile(
      file,
      JSON.stringify({
        instances: { local: { guiUrl: 'http://localhost:8085', apiUrl: 'http://localhost:8000/api' } },
        login: false,
      }),
    );

    const config = await loadConfigFile(file);

    expect(config.login).toBe(false);
    expect(config.instances.local?.apiUrl).toBe('http://localhost:8000/api');
  });

  it('rejects invalid values', async () => {
    const file = path.join(dir, '.webshots.yaml');
    await writeFile(file, 'timeouts:\n  settle: -1\n');
    await expect(loadConfigFile(file)).rejects.toBeInstanceOf(ZodError);
  });

  it('rejects unknown selector strategies', async () => {
    const file = path.join(dir, '.webshots.yaml');
    await writeFile(file, 'signals:\n  loggedIn:\n    strategy: magic\n    value: x\n');
    await expect(loadConfigFile(file)).rejects.toBeInstanceOf(ZodError);
  });
});
