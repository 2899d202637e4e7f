/**
 * GitHub module: reports a run's result as a pull-request status.
 */

export {
  setCommitStatus,
  statusStateFor,
  resolveGitHubToken,
  readGitConfig,
  commitStateSchema,
  repositorySchema,
  GitHubError,
} from './status.js';
export type { CommitState, CommitStatusRequest, GitConfigReader } from './status.js';
