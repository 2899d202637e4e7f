import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { DEFAULT_SIGNALS, DEFAULT_TIMEOUTS } from '../../src/config/defaults.js';
import { UnknownInstanceError } from '../../src/config/instances.js';
import { resolveRunSettings } from '../../src/config/resolve.js';
import { fileConfigSchema } from '../../src/schema/index.js';

const EMPTY = fileConfigSchema.parse({});

describe('resolveRunSettings', () => {
  it('falls back to the built-in defaults', () => {
    expect(resolveRunSettings({}, EMPTY)).toEqual({
      instanceName: 'dandi',
      instance: {
        guiUrl: 'https://dandiarchive.org',
        apiUrl: 'https://api.dandiarchive.org/api',
      },
      worker: {
        baseUrl: 'https://dandiarchive.org/#/dandiset',
        headless: false,
        login: true,
        outDir: path.resolve('.'),
        logLevel: 'info',
        viewport: { width: 1920, height: 1080 },
        timeouts: DEFAULT_TIMEOUTS,
        signals: DEFAULT_SIGNALS,
      },
    });
  });

  it('lets CLI flags win over the config file', () => {
    const file = fileConfigSchema.parse({
      instance: 'dandi-staging',
      headless: true,
      outDir: 'from-file',
      logLevel: 'debug',
    });

    const settings = resolveRunSettings({ headless: false, outDir: '/srv/shots' }, file);

    expect(settings.instanceName).toBe('dandi-staging');
    expect(settings.worker.headless).toBe(false);
    expect(settings.worker.outDir).toBe('/srv/shots');
    expect(settings.worker.logLevel).toBe('debug');
  });

  it('merges partial timeouts and signals over the defaults', () => {
    const file = fileConfigSchema.parse({
      timeouts: { readyWait: 1000 },
      signals: { loggedIn: { strategy: 'text', value: 'Log out' } },
    });

    const { worker } = resolveRunSettings({}, file);

    expect(worker.timeouts).toEqual({ ...DEFAULT_TIMEOUTS, readyWait: 1000 });
    expect(worker.signals.loggedIn).toEqual({ strategy: 'text', value: 'Log out' });
    expect(worker.signals.progress).toEqual(DEFAULT_SIGNALS.progress);
  });

  it('uses instances declared in the config file', () => {
    const file = fileConfigSchema.parse({
      instances: {
        local: { guiUrl: 'http://localhost:8085', apiUrl: 'http://localhost:8000/api' },
      },
    });

    const settings = resolveRunSettings({ instance: 'local' }, file);

    expect(settings.worker.baseUrl).toBe('http://localhost:8085/#/dandiset');
  });

  it('overrides URLs and strips trailing slashes', () => {
    const settings = resolveRunSettings(
      { guiUrl: 'https://gui.test/', apiUrl: 'https://api.test/api//' },
      EMPTY,
    );

    expect(settings.instance).toEqual({
      guiUrl: 'https://gui.test',
      apiUrl: 'https://api.test/api',
    });
  });

  it('routes a bare deploy-preview GUI origin to its collection pages', () => {
    const settings = resolveRunSettings(
      {
        instance: 'dandi-staging',
        guiUrl: 'https://deploy-preview-42--gui.test.app',
      },
      EMPTY,
    );

    expect(settings.instance.guiUrl).toBe('https://deploy-preview-42--gui.test.app');
    expect(settings.instance.apiUrl).toBe('https://api-staging.dandiarchive.org/api');
    expect(settings.worker.baseUrl).toBe('https://deploy-preview-42--gui.test.app/#/dandiset');
  });

  it('rejects an unknown instance, listing the known ones', () => {
    expect(() => resolveRunSettings({ instance: 'nope' }, EMPTY)).toThrow(
      new UnknownInstanceError('nope', ['dandi', 'dandi-staging']),
    );
    expect(() => resolveRunSettings({ instance: 'nope' }, EMPTY)).toThrow(
      'Unknown instance "nope" (known: dandi, dandi-staging)',
    );
  });
});
