import fs from 'node:fs/promises';
import path from 'node:path';
import { errorMessage, warn } from '../lib/output.js';
import { pathExists, removeIfEmpty } from '../lib/fs.js';
import type { WorktreeBackend } from './worktree.js';

/**
 * Run a cleanup step whose failure must not stop the caller. Returns
 * whether the step succeeded; failures are reported with `warn`.
 */
export async function bestEffort(label: string, fn: () => Promise<unknown>): Promise<boolean> {
  try {
    await fn();
    return true;
  } catch (err) {
    warn(`${label}: ${errorMessage(err)}`);
    return false;
  }
}

export interface RollbackTarget {
  repoPath: string;
  worktreePath: string;
  /** Branch created for this worktree; existing branches are never deleted. */
  createdBranch: string | null;
}

/**
 * Undo a half-finished worker creation: deregister and delete the
 * worktree, prune metadata, and drop the branch if this run created it.
 * Returns true when nothing was left behind.
 */
export async function rollbackWorktree(git: WorktreeBackend, target: RollbackTarget): Promise<boolean> {
  const { repoPath, worktreePath, createdBranch } = target;
  let clean = true;

  const registered = await git.worktreeIsRegistered(repoPath, worktreePath).catch((err: unknown) => {
    warn(`Could not list worktrees: ${errorMessage(err)}`);
    return false;
  });
  if (registered) {
    clean = await bestEffort(`Could not remove worktree ${worktreePath}`,
      () => git.removeWorktree(repoPath, worktreePath)) && clean;
  }
  if (await pathExists(worktreePath)) {
    clean = await bestEffort(`Could not delete ${worktreePath}`,
      () => fs.rm(worktreePath, { recursive: true, force: true })) && clean;
  }
  await bestEffort('Could not prune worktree metadata', () => git.pruneWorktrees(repoPath));
  if (createdBranch && await git.branchExists(repoPath, createdBranch)) {
    clean = await bestEffort(`Could not delete branch ${createdBranch}`,
      () => git.deleteBranch(repoPath, createdBranch)) && clean;
  }
  await bestEffort('Could not remove empty directory',
    () => removeIfEmpty(path.dirname(worktreePath)));

  if (!clean) {
    warn(`Worktree may be orphaned at ${worktreePath}. Clean it up with 'git worktree prune' and by deleting the directory`);
  }
  return clean;
}
