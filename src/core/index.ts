/**
 * Core module: the crash-tolerant harness.
 * Step state machine, isolated worker supervision, process reaping
 * and the sequential run over collections.
 */

export { STEP_SPECS, STEP_NAMES, getStepSpec } from './steps.js';
export type { StepSpec, StepAction, Navigation } from './steps.js';
export { runStep } from './stepMachine.js';
export type { StepRunOptions, StepState } from './stepMachine.js';
export {
  WaitTimeoutError,
  DriverCrashedError,
  FatalError,
  RetryBudgetExceededError,
  WorkerInterruptedError,
  errorMessage,
} from './errors.js';
export { Supervisor } from './supervisor.js';
export type { StepExecutor, SupervisorOptions } from './supervisor.js';
export {
  QueuedChannel,
  forkWorker,
  isInterrupt,
  sessionWorkerFactory,
  sessionWorkerPath,
} from './worker.js';
export type {
  ChannelReceive,
  WorkerChannel,
  WorkerExit,
  WorkerFactory,
  WorkerProcess,
} from './worker.js';
export { serveWorker, processPort, WORKER_EXIT } from './workerRuntime.js';
export type { WorkerPort, WorkerDeps } from './workerRuntime.js';
export { reapDescendants, reapProcessTree, terminatePids, systemProcessTable } from './reaper.js';
export type { ProcessTable, ReapOptions, ReapResult } from './reaper.js';
export { runWebshots, fileSink } from './harness.js';
export type { ArtifactSink, HarnessOptions } from './harness.js';
