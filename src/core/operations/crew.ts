import fs from 'node:fs/promises';
import path from 'node:path';
import { bestEffort, rollbackWorktree } from '../cleanup.js';
import type { RigContext } from '../backend.js';
import { workerLayout } from '../layout.js';
import { workerLockKey } from '../lock.js';
import { findPolecats, type WorkerDir } from '../status.js';
import { normalizeSessionName } from '../tmux.js';
import { resolveBaseBranch } from '../worktree.js';
import {
  CancelledError,
  NotFoundError,
  RepositoryNotFoundError,
  SessionCreationError,
  WorkspaceNotFoundError,
  WorktreeCreationError,
} from '../../lib/errors.js';
import { pathExists, removeIfEmpty } from '../../lib/fs.js';
import { validateName } from '../../lib/name.js';
import { errorMessage, info, warn } from '../../lib/output.js';
import { repoPath, sessionName, workBranchName, workerPath } from '../../lib/paths.js';

export interface WorkerInput {
  repo: string;
  worker: string;
}

interface WorkerCoordinates {
  repoPath: string;
  path: string;
  session: string;
  branch: string;
}

function coordinates(ctx: RigContext, { repo, worker }: WorkerInput): WorkerCoordinates {
  return {
    repoPath: repoPath(ctx.config.reposRoot, repo),
    path: workerPath(ctx.config.workersRoot, repo, worker),
    session: sessionName(repo, worker),
    branch: workBranchName(worker),
  };
}

async function requireRepository(ctx: RigContext, dir: string): Promise<void> {
  if (!(await ctx.git.isRepository(dir))) {
    throw new RepositoryNotFoundError(dir);
  }
}

export type CrewAddOutcome = 'created' | 'attached' | 'session-recreated';

export interface CrewAddResult {
  repo: string;
  worker: string;
  path: string;
  session: string;
  branch: string;
  baseBranch: string;
  outcome: CrewAddOutcome;
  reusedBranch: boolean;
}

/**
 * Create (or reuse) a crew member's worktree and session, then attach.
 * Re-running on an existing workspace only restores the session.
 */
export async function performCrewAdd(ctx: RigContext, input: WorkerInput): Promise<CrewAddResult> {
  validateName(input.worker);
  const c = coordinates(ctx, input);
  await requireRepository(ctx, c.repoPath);
  const baseBranch = await resolveBaseBranch(ctx.git, c.repoPath, ctx.config.defaultBranch);

  const result = await ctx.lock.withLock(workerLockKey(input.repo, input.worker), async () => {
    const base = { ...input, path: c.path, session: c.session, branch: c.branch, baseBranch };

    if (await pathExists(c.path)) {
      if (await ctx.sessions.exists(c.session)) {
        info(`Crew workspace already exists, attaching to ${c.session}`);
        return { ...base, outcome: 'attached' as const, reusedBranch: true };
      }
      info('Crew workspace exists but its session is not running, recreating it');
      await createSession(ctx, input, c);
      return { ...base, outcome: 'session-recreated' as const, reusedBranch: true };
    }

    await fs.mkdir(path.dirname(c.path), { recursive: true });
    info(`Creating crew workspace for ${input.worker} on ${input.repo}`);
    info(`Branch: ${c.branch} (from ${baseBranch})`);

    let reusedBranch = false;
    if (await ctx.git.branchExists(c.repoPath, c.branch)) {
      warn(`Branch ${c.branch} already exists`);
      if (!(await ctx.prompter.confirm('Use existing branch?', true))) {
        throw new CancelledError('delete the branch first or use a different crew name');
      }
      reusedBranch = true;
    }

    const rollback = {
      repoPath: c.repoPath,
      worktreePath: c.path,
      createdBranch: reusedBranch ? null : c.branch,
    };

    try {
      if (reusedBranch) {
        await ctx.git.createWorktreeFromBranch(c.repoPath, c.path, c.branch);
      } else {
        await ctx.git.createWorktree(c.repoPath, c.path, c.branch, baseBranch);
      }
    } catch (err) {
      await rollbackWorktree(ctx.git, rollback);
      throw new WorktreeCreationError(c.path, errorMessage(err));
    }

    try {
      await createSession(ctx, input, c);
    } catch (err) {
      warn('Session creation failed, removing the new worktree');
      await rollbackWorktree(ctx.git, rollback);
      throw err;
    }

    return { ...base, outcome: 'created' as const, reusedBranch };
  });

  await ctx.sessions.attach(c.session);
  return result;
}

async function createSession(ctx: RigContext, input: WorkerInput, c: WorkerCoordinates): Promise<void> {
  try {
    await ctx.sessions.create(c.session, workerLayout(input.repo, input.worker, c.branch, c.path));
  } catch (err) {
    throw new SessionCreationError(c.session, errorMessage(err));
  }
}

export interface CrewStartResult {
  path: string;
  session: string;
  branch: string;
  switchedBranch: boolean;
  sessionCreated: boolean;
}

/** Attach to an existing crew workspace, restoring its session if needed. */
export async function performCrewStart(ctx: RigContext, input: WorkerInput): Promise<CrewStartResult> {
  validateName(input.worker);
  const c = coordinates(ctx, input);

  if (!(await pathExists(c.path))) {
    throw new WorkspaceNotFoundError(c.path, `rig crew add ${input.worker} --rig=${input.repo}`);
  }

  let switchedBranch = false;
  const current = await ctx.git.currentBranch(c.path);
  if (current && current !== c.branch) {
    warn(`Workspace is on branch '${current}', expected '${c.branch}'`);
    if (await ctx.prompter.confirm(`Switch to ${c.branch}?`, true)) {
      await ctx.git.checkoutBranch(c.path, c.branch);
      switchedBranch = true;
    }
  }

  let sessionCreated = false;
  if (!(await ctx.sessions.exists(c.session))) {
    info('Session does not exist, recreating it');
    await createSession(ctx, input, c);
    sessionCreated = true;
  }

  await ctx.sessions.attach(c.session);
  return { path: c.path, session: c.session, branch: c.branch, switchedBranch, sessionCreated };
}

export type CrewRemoveOutcome = 'removed' | 'session-only' | 'detached' | 'kept-directory';

export interface CrewRemoveResult {
  path: string;
  session: string;
  outcome: CrewRemoveOutcome;
  killedSession: boolean;
  deletedBranch: boolean;
  removedParent: boolean;
}

/**
 * Remove a crew workspace, reconciling whichever of worktree directory,
 * git registration and session still exist.
 */
export async function performCrewRemove(ctx: RigContext, input: WorkerInput): Promise<CrewRemoveResult> {
  validateName(input.worker);
  const c = coordinates(ctx, input);
  await requireRepository(ctx, c.repoPath);

  return ctx.lock.withLock(workerLockKey(input.repo, input.worker), async () => {
    const result: CrewRemoveResult = {
      path: c.path,
      session: c.session,
      outcome: 'removed',
      killedSession: false,
      deletedBranch: false,
      removedParent: false,
    };

    const dirExists = await pathExists(c.path);
    const registered = await ctx.git.worktreeIsRegistered(c.repoPath, c.path);

    if (!dirExists) {
      if (registered) {
        warn('Worktree is detached (registered with git but its directory is gone), pruning metadata');
        await bestEffort('Could not remove worktree', () => ctx.git.removeWorktree(c.repoPath, c.path));
        await bestEffort('Could not prune worktree metadata', () => ctx.git.pruneWorktrees(c.repoPath));
        result.outcome = 'detached';
      }

      if (await ctx.sessions.exists(c.session)) {
        await ctx.sessions.kill(c.session);
        result.killedSession = true;
        if (!registered) result.outcome = 'session-only';
        return result;
      }

      if (registered) return result;
      throw new NotFoundError(c.path);
    }

    const live = await ctx.sessions.exists(c.session);
    const current = await ctx.sessions.currentSessionName();
    if (live && current !== null && normalizeSessionName(current) === normalizeSessionName(c.session)) {
      warn(`You are currently in session '${c.session}' - removing it will disconnect you`);
    }

    // Asked before the session is killed so the prompts are seen even from inside it
    let deleteDirectory = registered;
    if (!registered) {
      warn(`${c.path} is not a registered worktree`);
      deleteDirectory = await ctx.prompter.confirm(`Delete unregistered directory ${c.path}?`, false);
    }
    const deleteBranch = await ctx.git.branchExists(c.repoPath, c.branch)
      && await ctx.prompter.confirm(`Delete branch ${c.branch}?`, true);

    if (live) {
      await ctx.sessions.kill(c.session);
      result.killedSession = true;
    }

    if (registered) {
      await ctx.git.removeWorktree(c.repoPath, c.path);
    } else if (deleteDirectory) {
      await fs.rm(c.path, { recursive: true, force: true });
    } else {
      info(`Keeping ${c.path}`);
      result.outcome = 'kept-directory';
    }

    await bestEffort('Could not prune worktree metadata', () => ctx.git.pruneWorktrees(c.repoPath));

    if (deleteBranch) {
      await ctx.git.deleteBranch(c.repoPath, c.branch);
      result.deletedBranch = true;
    }

    const parent = path.dirname(c.path);
    await bestEffort(`Could not remove ${parent}`, async () => {
      result.removedParent = await removeIfEmpty(parent);
    });

    return result;
  });
}

export interface PolecatPruneResult {
  found: WorkerDir[];
  removed: WorkerDir[];
  cancelled: boolean;
}

/** Remove every polecat workspace across all repositories after one confirmation. */
export async function performPolecatPrune(ctx: RigContext): Promise<PolecatPruneResult> {
  const found = await findPolecats(ctx.config.workersRoot);
  if (found.length === 0) {
    return { found, removed: [], cancelled: false };
  }

  info(`Found ${found.length} polecat(s):`);
  for (const p of found) {
    console.log(`  - 🐱 ${p.worker} (rig: ${p.repo})`);
  }

  if (!(await ctx.prompter.confirm('Remove these workspaces and worktrees?', false))) {
    return { found, removed: [], cancelled: true };
  }

  const removed: WorkerDir[] = [];
  for (const p of found) {
    const ok = await ctx.lock.withLock(workerLockKey(p.repo, p.worker), () => removePolecat(ctx, p));
    if (ok) removed.push(p);
  }
  return { found, removed, cancelled: false };
}

async function removePolecat(ctx: RigContext, p: WorkerDir): Promise<boolean> {
  const repo = repoPath(ctx.config.reposRoot, p.repo);
  const session = sessionName(p.repo, p.worker);
  info(`Removing 🐱 ${p.worker}`);

  let ok = true;
  if (await ctx.sessions.exists(session)) {
    ok = await bestEffort(`Could not kill session ${session}`, () => ctx.sessions.kill(session)) && ok;
  }
  if (await pathExists(p.path)) {
    ok = await bestEffort(`Could not remove worktree ${p.path}`,
      () => ctx.git.removeWorktree(repo, p.path)) && ok;
  }
  await bestEffort('Could not prune worktree metadata', () => ctx.git.pruneWorktrees(repo));
  await bestEffort('Could not remove empty directory', () => removeIfEmpty(path.dirname(p.path)));
  return ok;
}
