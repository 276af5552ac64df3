import fs from 'node:fs/promises';
import path from 'node:path';
import { execa, ExecaError } from 'execa';
import { GitCommandError, NoBaseBranchError, NotGitRepoError } from '../lib/errors.js';
import { execaEnv } from '../lib/env.js';

export interface WorktreeInfo {
  path: string;
  /** Short branch name, or null for a detached HEAD. */
  branch: string | null;
}

/**
 * Git operations the orchestration layer needs. Every path argument is
 * absolute; `repoPath` is the main checkout of the repository.
 */
export interface WorktreeBackend {
  branchExists(repoPath: string, branch: string): Promise<boolean>;
  /** Branch that `origin/HEAD` points at, or null when unknown. */
  resolveDefaultRemoteBranch(repoPath: string): Promise<string | null>;
  createWorktree(repoPath: string, worktreePath: string, newBranch: string, fromBranch: string): Promise<void>;
  createWorktreeFromBranch(repoPath: string, worktreePath: string, branch: string): Promise<void>;
  removeWorktree(repoPath: string, worktreePath: string): Promise<void>;
  pruneWorktrees(repoPath: string): Promise<void>;
  deleteBranch(repoPath: string, branch: string): Promise<void>;
  /** Create `branch` from `fromBranch` and check it out in `repoPath`. */
  createBranch(repoPath: string, branch: string, fromBranch: string): Promise<void>;
  currentBranch(dir: string): Promise<string>;
  checkoutBranch(dir: string, branch: string): Promise<void>;
  repositoryRoot(dir: string): Promise<string>;
  isRepository(dir: string): Promise<boolean>;
  listWorktrees(repoPath: string): Promise<WorktreeInfo[]>;
  worktreeIsRegistered(repoPath: string, worktreePath: string): Promise<boolean>;
  /** `git status --porcelain` output restricted to `pathspec`; empty when clean. */
  pendingChanges(repoPath: string, pathspec: string): Promise<string>;
  commit(repoPath: string, pathspecs: string[], message: string): Promise<void>;
}

/**
 * Parse `git worktree list --porcelain`. Entries are separated by blank
 * lines; the first entry is the main worktree.
 */
export function parseWorktreeList(porcelain: string): WorktreeInfo[] {
  const worktrees: WorktreeInfo[] = [];
  let current: WorktreeInfo | null = null;

  for (const line of porcelain.split('\n')) {
    if (line.startsWith('worktree ')) {
      current = { path: line.slice('worktree '.length), branch: null };
      worktrees.push(current);
    } else if (line.startsWith('branch ') && current) {
      current.branch = line.slice('branch '.length).replace(/^refs\/heads\//, '');
    }
  }

  return worktrees;
}

export const COMMON_BASE_BRANCHES = ['main', 'master', 'develop'] as const;

/**
 * Pick the branch new work starts from: the remote's default branch, then
 * the configured default, then the usual suspects.
 */
export async function resolveBaseBranch(
  git: WorktreeBackend,
  repoPath: string,
  configuredDefault: string,
): Promise<string> {
  const remote = await git.resolveDefaultRemoteBranch(repoPath);
  if (remote && await git.branchExists(repoPath, remote)) {
    return remote;
  }

  const candidates = [configuredDefault, ...COMMON_BASE_BRANCHES]
    .filter((b, i, all) => b !== '' && all.indexOf(b) === i);

  for (const branch of candidates) {
    if (await git.branchExists(repoPath, branch)) {
      return branch;
    }
  }

  throw new NoBaseBranchError(['origin/HEAD', ...candidates]);
}

function failureDetail(err: unknown): string {
  if (err instanceof ExecaError) {
    return String(err.stderr ?? '').trim() || err.shortMessage;
  }
  return err instanceof Error ? err.message : String(err);
}

async function git(args: string[], cwd: string): Promise<string> {
  try {
    const result = await execa('git', args, { ...execaEnv, cwd });
    return result.stdout;
  } catch (err) {
    throw new GitCommandError(args.slice(0, 2).join(' '), failureDetail(err));
  }
}

async function gitSucceeds(args: string[], cwd: string): Promise<boolean> {
  try {
    await execa('git', args, { ...execaEnv, cwd });
    return true;
  } catch {
    return false;
  }
}

export class GitWorktreeBackend implements WorktreeBackend {
  async branchExists(repoPath: string, branch: string): Promise<boolean> {
    return gitSucceeds(['show-ref', '--verify', '--quiet', `refs/heads/${branch}`], repoPath);
  }

  async resolveDefaultRemoteBranch(repoPath: string): Promise<string | null> {
    try {
      const ref = (await git(['symbolic-ref', 'refs/remotes/origin/HEAD'], repoPath)).trim();
      const branch = ref.replace(/^refs\/remotes\/origin\//, '');
      return branch || null;
    } catch (err) {
      if (err instanceof GitCommandError) return null;
      throw err;
    }
  }

  async createWorktree(repoPath: string, worktreePath: string, newBranch: string, fromBranch: string): Promise<void> {
    await git(['worktree', 'add', worktreePath, '-b', newBranch, fromBranch], repoPath);
  }

  async createWorktreeFromBranch(repoPath: string, worktreePath: string, branch: string): Promise<void> {
    await git(['worktree', 'add', worktreePath, branch], repoPath);
  }

  async removeWorktree(repoPath: string, worktreePath: string): Promise<void> {
    await git(['worktree', 'remove', worktreePath, '--force'], repoPath);
  }

  async pruneWorktrees(repoPath: string): Promise<void> {
    await git(['worktree', 'prune'], repoPath);
  }

  async deleteBranch(repoPath: string, branch: string): Promise<void> {
    await git(['branch', '-D', branch], repoPath);
  }

  async createBranch(repoPath: string, branch: string, fromBranch: string): Promise<void> {
    await git(['checkout', '-b', branch, fromBranch], repoPath);
  }

  async currentBranch(dir: string): Promise<string> {
    return (await git(['branch', '--show-current'], dir)).trim();
  }

  async checkoutBranch(dir: string, branch: string): Promise<void> {
    await git(['checkout', branch], dir);
  }

  async repositoryRoot(dir: string): Promise<string> {
    try {
      return (await git(['rev-parse', '--show-toplevel'], dir)).trim();
    } catch {
      throw new NotGitRepoError(dir);
    }
  }

  async isRepository(dir: string): Promise<boolean> {
    try {
      await fs.stat(path.join(dir, '.git'));
      return true;
    } catch {
      return false;
    }
  }

  async listWorktrees(repoPath: string): Promise<WorktreeInfo[]> {
    return parseWorktreeList(await git(['worktree', 'list', '--porcelain'], repoPath));
  }

  async worktreeIsRegistered(repoPath: string, worktreePath: string): Promise<boolean> {
    const target = path.resolve(worktreePath);
    const worktrees = await this.listWorktrees(repoPath);
    return worktrees.some((wt) => path.resolve(wt.path) === target);
  }

  async pendingChanges(repoPath: string, pathspec: string): Promise<string> {
    return (await git(['status', '--porcelain', '--', pathspec], repoPath)).trim();
  }

  async commit(repoPath: string, pathspecs: string[], message: string): Promise<void> {
    await git(['add', '--', ...pathspecs], repoPath);
    await git(['commit', '-m', message], repoPath);
  }
}
