/**
 * Worker process entry point, forked by the supervisor.
 */

import { processPort, serveWorker } from './workerRuntime.js';

serveWorker(processPort());
