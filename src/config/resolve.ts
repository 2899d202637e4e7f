import path from 'node:path';

import type { FileConfig, Instance, LogLevel, WorkerConfig } from '../schema/index.js';
import { DEFAULT_SIGNALS, DEFAULT_TIMEOUTS, VIEWPORT } from './defaults.js';
import { DEFAULT_INSTANCE, collectionsUrl, resolveInstance } from './instances.js';

// ── CLI overrides ────────────────────────────────────────────

export interface RunOverrides {
  instance?: string | undefined;
  guiUrl?: string | undefined;
  apiUrl?: string | undefined;
  outDir?: string | undefined;
  headless?: boolean | undefined;
  login?: boolean | undefined;
  logLevel?: LogLevel | undefined;
}

export interface RunSettings {
  instanceName: string;
  instance: Instance;
  worker: WorkerConfig;
}

// ── Merge ────────────────────────────────────────────────────

/**
 * Merge CLI flags over the config file over built-in defaults.
 * The result is the only configuration the harness sees.
 */
export function resolveRunSettings(
  overrides: RunOverrides,
  file: FileConfig,
): RunSettings {
  const instanceName = overrides.instance ?? file.instance ?? DEFAULT_INSTANCE;
  const known = resolveInstance(instanceName, file.instances);
  const instance: Instance = {
    guiUrl: stripTrailingSlash(overrides.guiUrl ?? known.guiUrl),
    apiUrl: stripTrailingSlash(overrides.apiUrl ?? known.apiUrl),
  };

  return {
    instanceName,
    instance,
    worker: {
      baseUrl: collectionsUrl(instance.guiUrl),
      headless: overrides.headless ?? file.headless ?? false,
      login: overrides.login ?? file.login ?? true,
      outDir: path.resolve(overrides.outDir ?? file.outDir ?? '.'),
      logLevel: overrides.logLevel ?? file.logLevel ?? 'info',
      viewport: VIEWPORT,
      timeouts: { ...DEFAULT_TIMEOUTS, ...file.timeouts },
      signals: { ...DEFAULT_SIGNALS, ...file.signals },
    },
  };
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}
