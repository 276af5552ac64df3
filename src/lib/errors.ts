export class RigError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly exitCode: number = 1,
  ) {
    super(message);
    this.name = 'RigError';
  }
}

export class TmuxNotFoundError extends RigError {
  constructor() {
    super(
      'tmux is not installed or not in PATH. Install it with: brew install tmux',
      'TMUX_NOT_FOUND',
    );
    this.name = 'TmuxNotFoundError';
  }
}

export class NotGitRepoError extends RigError {
  constructor(dir: string) {
    super(
      `Not a git repository: ${dir}`,
      'NOT_GIT_REPO',
    );
    this.name = 'NotGitRepoError';
  }
}

export class GitCommandError extends RigError {
  constructor(command: string, detail: string) {
    super(
      detail ? `git ${command} failed:\n${detail}` : `git ${command} failed`,
      'GIT_FAILED',
    );
    this.name = 'GitCommandError';
  }
}

export class InvalidNameError extends RigError {
  constructor(reason: string) {
    super(reason, 'INVALID_NAME');
    this.name = 'InvalidNameError';
  }
}

export class RepositoryNotFoundError extends RigError {
  constructor(repoPath: string) {
    super(
      `Repo not found: ${repoPath}`,
      'REPOSITORY_NOT_FOUND',
    );
    this.name = 'RepositoryNotFoundError';
  }
}

export class WorkspaceNotFoundError extends RigError {
  constructor(workspacePath: string, remedy: string) {
    super(
      `Crew workspace not found: ${workspacePath}\nRun '${remedy}' first`,
      'WORKSPACE_NOT_FOUND',
    );
    this.name = 'WorkspaceNotFoundError';
  }
}

export class NotFoundError extends RigError {
  constructor(workspacePath: string) {
    super(
      `Crew workspace not found: ${workspacePath} (no worktree, git metadata or session)`,
      'NOT_FOUND',
    );
    this.name = 'NotFoundError';
  }
}

export class SessionNotFoundError extends RigError {
  constructor(name: string) {
    super(`Session not found: ${name}`, 'SESSION_NOT_FOUND');
    this.name = 'SessionNotFoundError';
  }
}

export class AmbiguousContextError extends RigError {
  constructor(reposRoot: string, workersRoot: string) {
    super(
      `Could not infer rig. Use --rig=<repo> or run from within a repo in ${reposRoot} or ${workersRoot}`,
      'AMBIGUOUS_CONTEXT',
    );
    this.name = 'AmbiguousContextError';
  }
}

export class NoBaseBranchError extends RigError {
  constructor(tried: string[]) {
    super(
      `Could not find base branch (tried: ${tried.join(', ')})`,
      'NO_BASE_BRANCH',
    );
    this.name = 'NoBaseBranchError';
  }
}

export class WorktreeCreationError extends RigError {
  constructor(worktreePath: string, detail: string) {
    super(
      `Failed to create worktree at ${worktreePath}: ${detail}`,
      'WORKTREE_CREATION_FAILED',
    );
    this.name = 'WorktreeCreationError';
  }
}

export class SessionCreationError extends RigError {
  constructor(sessionName: string, detail: string) {
    super(
      `Failed to create session ${sessionName}: ${detail}`,
      'SESSION_CREATION_FAILED',
    );
    this.name = 'SessionCreationError';
  }
}

export class CancelledError extends RigError {
  constructor(reason?: string) {
    super(reason ? `Cancelled - ${reason}` : 'Cancelled', 'CANCELLED');
    this.name = 'CancelledError';
  }
}

export class FormulaNotFoundError extends RigError {
  constructor(
    formula: string,
    public readonly available: string[],
  ) {
    super(
      available.length > 0
        ? `Formula not found: ${formula}\nAvailable formulas: ${available.join(', ')}`
        : `Formula not found: ${formula}\nNo formulas available`,
      'FORMULA_NOT_FOUND',
    );
    this.name = 'FormulaNotFoundError';
  }
}

export class InvalidWorkPathError extends RigError {
  constructor(workPath: string) {
    super(
      `Work path must be in format 'work/<name>', got: ${workPath}`,
      'INVALID_WORK_PATH',
    );
    this.name = 'InvalidWorkPathError';
  }
}

export class WorkItemNotFoundError extends RigError {
  constructor(workName: string) {
    super(
      `Work directory not found: work/${workName}\nRun 'rig work create ${workName}' first`,
      'WORK_ITEM_NOT_FOUND',
    );
    this.name = 'WorkItemNotFoundError';
  }
}

export class BranchNotFoundError extends RigError {
  constructor(branch: string, workName: string) {
    super(
      `Feature branch not found: ${branch}\nRun 'rig work create ${workName}' first`,
      'BRANCH_NOT_FOUND',
    );
    this.name = 'BranchNotFoundError';
  }
}

export class NotOnFeatureBranchError extends RigError {
  constructor(branch: string) {
    super(
      `Not on a feature branch (expected feat/<name>), current branch: ${branch || '(detached)'}`,
      'NOT_ON_FEATURE_BRANCH',
    );
    this.name = 'NotOnFeatureBranchError';
  }
}

export class HookNotFoundError extends RigError {
  constructor(workName: string) {
    super(
      `No hook found for work: ${workName}\nRun 'rig sling work/${workName}' to create one`,
      'HOOK_NOT_FOUND',
    );
    this.name = 'HookNotFoundError';
  }
}

export class HookExistsError extends RigError {
  constructor(workName: string, existingFormula: string | null, requested: string) {
    const current = existingFormula ? `formula '${existingFormula}'` : 'an unknown formula';
    super(
      `work/${workName}/hook.md already exists for ${current}, not '${requested}'.\n`
        + `Delete work/${workName}/hook.md first to regenerate it`,
      'HOOK_EXISTS',
    );
    this.name = 'HookExistsError';
  }
}

export class LockError extends RigError {
  constructor(key: string) {
    super(
      `Could not acquire lock for ${key}. Another rig process may be working on it.`,
      'LOCK_FAILED',
    );
    this.name = 'LockError';
  }
}

export class ConfigError extends RigError {
  constructor(configFile: string, detail: string) {
    super(`Invalid config ${configFile}: ${detail}`, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}
