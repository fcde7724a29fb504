/**
 * @branchgate/git
 *
 * Local git access for branchgate: reads the checked-out branch that
 * seeds branch resolution.
 *
 * @packageDocumentation
 */

// Git command utilities (local branch reader)
export {
  isGitRepository,
  getRepositoryRoot,
  getCurrentBranch,
  DetachedHeadError
} from './git-commands.js';

// Secure git command execution (low-level - use high-level APIs when possible)
export {
  executeGitCommand,
  execGitCommand,
  tryGitCommand,
  validateGitRef,
  GitCommandError,
  type GitExecutionOptions,
  type GitExecutionResult
} from './git-executor.js';
