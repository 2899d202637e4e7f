import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import { InvalidArgumentError, Option } from 'commander';
import type { Command } from 'commander';
import { ZodError } from 'zod';

import type { LogLevel, RunReport } from '../schema/index.js';
import { logLevelSchema } from '../schema/index.js';
import {
  MissingCredentialsError,
  UnknownInstanceError,
  loadConfigFile,
  loadCredentials,
  resolveRunSettings,
} from '../config/index.js';
import type { RunSettings } from '../config/index.js';
import { listCollections } from '../catalog/index.js';
import {
  FatalError,
  RetryBudgetExceededError,
  Supervisor,
  WorkerInterruptedError,
  errorMessage,
  fileSink,
  reapDescendants,
  runWebshots,
  sessionWorkerFactory,
} from '../core/index.js';
import { countFailures, generateJSON, generateMarkdown, serializeJSON } from '../report/index.js';
import {
  commitStateSchema,
  resolveGitHubToken,
  setCommitStatus,
  statusStateFor,
} from '../github/index.js';
import type { CommitState } from '../github/index.js';
import { createLogger } from '../utils/logger.js';

// ── Exit codes ───────────────────────────────────────────────
// Per-item timeouts and errors never change the exit code.

export const EXIT_CODES = {
  OK: 0,
  ABORTED: 1,
  CONFIG: 2,
  INTERRUPTED: 130,
} as const;

export function exitCodeFor(err: unknown): number {
  if (err instanceof WorkerInterruptedError) return EXIT_CODES.INTERRUPTED;
  if (
    err instanceof ZodError ||
    err instanceof UnknownInstanceError ||
    err instanceof MissingCredentialsError ||
    err instanceof InvalidArgumentError
  ) {
    return EXIT_CODES.CONFIG;
  }
  return EXIT_CODES.ABORTED;
}

// ── Option parsers ───────────────────────────────────────────

function parseLogLevel(value: string): LogLevel {
  const parsed = logLevelSchema.safeParse(value.toLowerCase());
  if (!parsed.success) {
    throw new InvalidArgumentError(`Expected one of ${logLevelSchema.options.join(', ')}.`);
  }
  return parsed.data;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

// ── Stderr summary ───────────────────────────────────────────

function printSummary(report: RunReport, outDir: string): void {
  const steps = report.collections.reduce((n, c) => n + c.steps.length, 0);
  const failures = countFailures(report);

  process.stderr.write(`\n--- Webshots Result ---\n`);
  process.stderr.write(`Instance:    ${report.instance}\n`);
  process.stderr.write(`Collections: ${String(report.collections.length)}\n`);
  process.stderr.write(`Steps:       ${String(steps - failures)} ok, ${String(failures)} failed\n`);
  process.stderr.write(`Status:      ${statusStateFor(report)}\n`);
  process.stderr.write(`Output:      ${outDir}\n\n`);
}

// ── Run command ──────────────────────────────────────────────

interface RunOptions {
  instance?: string;
  guiUrl?: string;
  apiUrl?: string;
  outDir?: string;
  headless?: true;
  login: boolean;
  logLevel?: LogLevel;
  config: string;
  json?: true;
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Screenshot every step of the given (or all) collections')
    .argument('[ids...]', 'Collection identifiers (default: every collection in the archive)')
    .option('-i, --instance <name>', 'Archive instance (dandi, dandi-staging, or one from the config file)')
    .option('--gui-url <url>', 'Override the instance GUI origin (e.g. a deploy preview host)')
    .option('--api-url <url>', 'Override the instance API URL')
    .option('-o, --out-dir <dir>', 'Directory for screenshots and reports')
    .option('--headless', 'Run browser headless')
    .option('--no-login', 'Skip logging into the GUI')
    .option('-l, --log-level <level>', 'debug, info, warn or error', parseLogLevel)
    .option('--config <path>', 'Path to config file', '.webshots.yaml')
    .option('--json', 'Output JSON to stdout')
    .action(async (ids: string[], opts: RunOptions) => {
      // 1. Resolve configuration (CLI flags override the config file)
      let settings: RunSettings;
      try {
        const fileConfig = await loadConfigFile(opts.config);
        settings = resolveRunSettings(
          {
            instance: opts.instance,
            guiUrl: opts.guiUrl,
            apiUrl: opts.apiUrl,
            outDir: opts.outDir,
            headless: opts.headless,
            // commander defaults --no-login to true; only an explicit flag overrides the file
            login: opts.login ? undefined : false,
            logLevel: opts.logLevel,
          },
          fileConfig,
        );
        if (settings.worker.login) {
          loadCredentials(process.env);
        }
      } catch (err) {
        process.stderr.write(`Config error: ${errorMessage(err)}\n`);
        process.exitCode = EXIT_CODES.CONFIG;
        return;
      }

      const logger = createLogger(settings.worker.logLevel);
      const supervisor = new Supervisor({
        config: settings.worker,
        factory: sessionWorkerFactory(logger),
        logger,
      });

      // 2. Ctrl-C stops the worker and the run; a second one exits at once
      let interrupts = 0;
      const onSigint = (): void => {
        interrupts++;
        if (interrupts > 1) process.exit(EXIT_CODES.INTERRUPTED);
        logger.warn('Interrupt received; stopping');
        supervisor.interrupt();
      };
      process.on('SIGINT', onSigint);

      try {
        // 3. Collections: explicit ids win over the catalog
        const collectionIds =
          ids.length > 0 ? ids : await listCollections(settings.instance.apiUrl);
        logger.section(
          `${String(collectionIds.length)} collection(s) on ${settings.instanceName} (${settings.instance.guiUrl})`,
        );

        // 4. Run every step through the supervised worker
        const report = await runWebshots({
          instance: settings.instanceName,
          guiUrl: settings.instance.guiUrl,
          collectionIds,
          executor: supervisor,
          sink: fileSink(settings.worker.outDir),
          logger,
        });

        // 5. Summary report
        await writeFile(
          path.join(settings.worker.outDir, 'README.md'),
          generateMarkdown(report),
          'utf-8',
        );

        if (opts.json) {
          process.stdout.write(serializeJSON(generateJSON(report)) + '\n');
        }

        printSummary(report, settings.worker.outDir);
        process.exitCode = EXIT_CODES.OK;
      } catch (err) {
        if (err instanceof FatalError || err instanceof RetryBudgetExceededError) {
          logger.error(`Run aborted: ${err.message}`);
        } else if (err instanceof WorkerInterruptedError) {
          logger.error('Run interrupted');
        } else {
          logger.error(errorMessage(err));
        }
        process.exitCode = exitCodeFor(err);
      } finally {
        process.off('SIGINT', onSigint);
        await supervisor.close();
        const reaped = await reapDescendants();
        if (reaped.terminated.length > 0) {
          logger.debug(`Reaped ${String(reaped.terminated.length)} leftover process(es)`);
        }
      }
    });
}

// ── PR status command ────────────────────────────────────────

interface StatusOptions {
  repository: string;
  pr: number;
  state: CommitState;
  context?: string;
  description?: string;
  targetUrl?: string;
}

export function registerStatusCommand(program: Command): void {
  program
    .command('set-pr-status')
    .description('Set a commit status on the head of a pull request')
    .requiredOption('-R, --repository <owner/name>', 'Repository holding the pull request')
    .requiredOption('--pr <number>', 'Pull request number', parsePositiveInt)
    .addOption(
      new Option('--state <state>', 'Commit status state')
        .choices(commitStateSchema.options)
        .makeOptionMandatory(),
    )
    .option('--context <context>', 'Status context label')
    .option('-d, --description <text>', 'Status description')
    .option('--target-url <url>', 'Link shown next to the status')
    .action(async (opts: StatusOptions) => {
      try {
        const token = await resolveGitHubToken(process.env);
        await setCommitStatus(
          {
            repository: opts.repository,
            pr: opts.pr,
            state: opts.state,
            context: opts.context,
            description: opts.description,
            targetUrl: opts.targetUrl,
          },
          token,
        );
        process.stderr.write(`Set ${opts.state} on ${opts.repository}#${String(opts.pr)}\n`);
      } catch (err) {
        process.stderr.write(`Error: ${errorMessage(err)}\n`);
        process.exitCode = exitCodeFor(err);
      }
    });
}
