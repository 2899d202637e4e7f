import type { Outcome, WorkItem, WorkerConfig } from '../schema/index.js';
import { loadCredentials } from '../config/credentials.js';
import { runStep } from '../core/stepMachine.js';
import { getStepSpec, showsLanding } from '../core/steps.js';
import type { Logger } from '../utils/logger.js';
import { login } from './auth.js';
import { launchPlaywrightDriver } from './driver.js';
import type { BrowserDriver, DriverFactory } from './driver.js';

// ── Public types ─────────────────────────────────────────────

export type SessionConfig = Omit<WorkerConfig, 'logLevel'>;

export interface SessionDeps {
  logger: Logger;
  launch?: DriverFactory;
  env?: NodeJS.ProcessEnv;
  sleep?: (ms: number) => Promise<void>;
}

// ── Session ──────────────────────────────────────────────────

/**
 * Owns one browser for its whole life: launched (and logged in) by
 * {@link Session.open}, released by {@link Session.close}. Failure
 * during `open` releases the browser before rethrowing.
 */
export class Session {
  private closed = false;
  /** Collection whose landing page is on screen, when known. */
  private landingShown: string | undefined;

  private constructor(
    private readonly driver: BrowserDriver,
    private readonly config: SessionConfig,
    private readonly deps: SessionDeps,
  ) {}

  static async open(config: SessionConfig, deps: SessionDeps): Promise<Session> {
    const credentials = config.login ? loadCredentials(deps.env ?? process.env) : undefined;
    const launch = deps.launch ?? launchPlaywrightDriver;

    deps.logger.debug(`Launching browser (headless=${String(config.headless)})`);
    const driver = await launch({ headless: config.headless, viewport: config.viewport });

    try {
      if (credentials !== undefined) {
        await login(driver, {
          baseUrl: config.baseUrl,
          credentials,
          signals: config.signals,
          timeouts: config.timeouts,
          logger: deps.logger,
        });
      }
    } catch (err) {
      await driver.close();
      throw err;
    }

    return new Session(driver, config, deps);
  }

  isAlive(): boolean {
    return !this.closed && this.driver.isAlive();
  }

  async runStep(item: WorkItem): Promise<Outcome> {
    if (this.closed) {
      throw new Error('Session is closed');
    }
    const spec = getStepSpec(item.stepName);
    const landingShown = this.landingShown;
    this.landingShown = undefined;

    const outcome = await runStep(this.driver, item, spec, {
      baseUrl: this.config.baseUrl,
      outDir: this.config.outDir,
      signals: this.config.signals,
      timeouts: this.config.timeouts,
      logger: this.deps.logger,
      landingShown,
      ...(this.deps.sleep !== undefined ? { sleep: this.deps.sleep } : {}),
    });
    if (outcome.kind === 'duration' && showsLanding(spec)) {
      this.landingShown = item.collectionId;
    }
    return outcome;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.driver.close();
  }
}

// ── Scoped acquisition ───────────────────────────────────────

export async function withSession<T>(
  config: SessionConfig,
  deps: SessionDeps,
  use: (session: Session) => Promise<T>,
): Promise<T> {
  const session = await Session.open(config, deps);
  try {
    return await use(session);
  } finally {
    await session.close();
  }
}
