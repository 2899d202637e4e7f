/**
 * Report module.
 * Artifact paths and per-collection info records, plus the run
 * summary rendered as markdown (README.md) and JSON.
 */

export {
  INFO_FILE,
  artifactPath,
  pageSourcePath,
  collectionDir,
  infoTime,
  toCollectionInfo,
  writeCollectionInfo,
  readCollectionInfo,
} from './writer.js';
export {
  JSON_OUTPUT_VERSION,
  computeStepStats,
  countFailures,
  generateJSON,
  generateMarkdown,
  serializeJSON,
} from './reporter.js';
export type { JsonOutput, StepStats } from './reporter.js';
