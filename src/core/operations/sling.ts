import fs from 'node:fs/promises';
import path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import type { RigContext } from '../backend.js';
import { bestEffort, rollbackWorktree } from '../cleanup.js';
import { resolveRepositoryFromCwd } from '../context.js';
import { workerLayout } from '../layout.js';
import { workerLockKey } from '../lock.js';
import { generatePolecatName, isPolecat } from '../polecat.js';
import { scanWorkerDirs } from '../status.js';
import { generateHook, listFormulas, type HookResult } from '../work.js';
import { resolveBaseBranch } from '../worktree.js';
import { findAssignment, type Assignment } from './work.js';
import {
  BranchNotFoundError,
  CancelledError,
  FormulaNotFoundError,
  InvalidWorkPathError,
  RigError,
  SessionCreationError,
  WorkItemNotFoundError,
  WorkspaceNotFoundError,
  WorktreeCreationError,
} from '../../lib/errors.js';
import { pathExists } from '../../lib/fs.js';
import { validateName } from '../../lib/name.js';
import { errorMessage, info, warn, workerEmoji } from '../../lib/output.js';
import {
  featureBranchName,
  sessionName,
  workDir,
  workPathspec,
  workerPath,
} from '../../lib/paths.js';

export const ASSIGNMENT_MESSAGE = "# YOUR WORK ASSIGNMENT: Run the command 'rig hook' to see your instructions";
export const HOOK_COMMAND = 'rig hook';

export interface SlingInput {
  workPath: string;
  to?: string;
  formula?: string;
  self?: boolean;
}

interface SlingBase {
  repo: string;
  work: string;
  branch: string;
  baseBranch: string;
  formula: string;
  hook: HookResult;
  /** Commit message when pending work files were committed. */
  commit: string | null;
}

export interface CrewAssignment {
  mode: 'crew';
  worker: string;
  path: string;
  switchedBranch: boolean;
}

export interface PolecatAssignment {
  mode: 'polecat';
  worker: string;
  path: string;
  session: string;
  /** Previous holder of the feature branch whose worktree was removed. */
  replaced: Assignment | null;
  instructionSent: boolean;
}

export type SlingResult = SlingBase & ({ mode: 'self' } | CrewAssignment | PolecatAssignment);

/** `work/<name>` (trailing slashes allowed) → `<name>`. */
export function parseWorkPath(workPath: string): string {
  const parts = workPath.replace(/\/+$/, '').split('/');
  if (parts.length !== 2 || parts[0] !== 'work' || parts[1] === '') {
    throw new InvalidWorkPathError(workPath);
  }
  validateName(parts[1], 'work name');
  return parts[1];
}

/**
 * Hand a work item to yourself, an existing crew member, or a new
 * polecat. The hook is generated and committed on the feature branch,
 * then the repository goes back to its base branch so a worktree can
 * take the feature branch.
 *
 * When a polecat takes over a branch another worktree already holds, the
 * hook and commit happen in that worktree and it is only removed once
 * nothing else can fail.
 */
export async function performSling(ctx: RigContext, input: SlingInput): Promise<SlingResult> {
  if (input.self && input.to) {
    throw new RigError('--self and --to cannot be used together', 'INVALID_ARGS');
  }

  const work = parseWorkPath(input.workPath);
  if (input.to) validateName(input.to);

  const { root, repo } = await resolveRepositoryFromCwd(ctx);
  const branch = featureBranchName(work);

  if (!(await pathExists(workDir(root, work)))) {
    throw new WorkItemNotFoundError(work);
  }
  if (!(await ctx.git.branchExists(root, branch))) {
    throw new BranchNotFoundError(branch, work);
  }

  let polecat: PolecatPlan | null = null;
  if (!input.self && !input.to) {
    const existing = (await scanWorkerDirs(ctx.config.workersRoot, repo)).map((w) => w.worker);
    polecat = { existing, replaced: await confirmReassignment(ctx, root, work, branch) };
  }

  // git will not check the feature branch out here while another worktree holds it
  const checkout = polecat?.replaced?.path ?? root;
  if (checkout === root && (await ctx.git.currentBranch(root)) !== branch) {
    info(`Switching to ${branch}`);
    await ctx.git.checkoutBranch(root, branch);
  }

  const formula = input.formula ?? ctx.config.defaultFormula;
  const formulas = await listFormulas(checkout);
  if (!formulas.includes(formula)) {
    throw new FormulaNotFoundError(formula, formulas);
  }

  const hook = await generateHook(checkout, work, formula);

  let commit: string | null = null;
  const pending = await ctx.git.pendingChanges(checkout, workPathspec(work));
  if (pending) {
    warn('Uncommitted changes in work directory:');
    console.log(pending);
    if (!(await ctx.prompter.confirm('Commit these changes before slinging?', true))) {
      throw new CancelledError('please commit your changes before slinging');
    }
    commit = `Update work files for ${work}`;
    await ctx.git.commit(checkout, [workPathspec(work)], commit);
  }

  if (polecat?.replaced) {
    await retireHolder(ctx, root, repo, polecat.replaced);
  }

  const baseBranch = await resolveBaseBranch(ctx.git, root, ctx.config.defaultBranch);
  info(`Switching to ${baseBranch}`);
  await ctx.git.checkoutBranch(root, baseBranch);

  const base: SlingBase = { repo, work, branch, baseBranch, formula, hook, commit };

  if (polecat) {
    return { ...base, ...(await assignToPolecat(ctx, root, repo, branch, polecat)) };
  }

  if (input.to) {
    return { ...base, ...(await assignToCrew(ctx, repo, input.to, branch)) };
  }

  return { ...base, mode: 'self' };
}

async function assignToCrew(
  ctx: RigContext,
  repo: string,
  worker: string,
  branch: string,
): Promise<CrewAssignment> {
  const wtPath = workerPath(ctx.config.workersRoot, repo, worker);
  if (!(await pathExists(wtPath))) {
    throw new WorkspaceNotFoundError(wtPath, `rig crew add ${worker} --rig=${repo}`);
  }

  let switchedBranch = false;
  const current = await ctx.git.currentBranch(wtPath);
  if (current !== branch) {
    warn(`${worker} is on branch '${current}', expected '${branch}'`);
    if (await ctx.prompter.confirm('Checkout feature branch?', true)) {
      await ctx.git.checkoutBranch(wtPath, branch);
      switchedBranch = true;
    }
  }

  return { mode: 'crew', worker, path: wtPath, switchedBranch };
}

interface PolecatPlan {
  /** Worker directory names before any reassignment, excluded from naming. */
  existing: string[];
  replaced: Assignment | null;
}

/** The worktree holding the feature branch, once the user agrees to take it over. */
async function confirmReassignment(
  ctx: RigContext,
  root: string,
  work: string,
  branch: string,
): Promise<Assignment | null> {
  const holder = findAssignment(await ctx.git.listWorktrees(root), branch, root, ctx.config.workersRoot);
  if (!holder) return null;

  warn(`work/${work} is already assigned to ${workerEmoji(isPolecat(holder.worker))} ${holder.worker}`);
  info(`Workspace: ${holder.path}`);
  if (!(await ctx.prompter.confirm('Reassign to new polecat?', false))) {
    throw new CancelledError();
  }
  return holder;
}

async function retireHolder(ctx: RigContext, root: string, repo: string, holder: Assignment): Promise<void> {
  const { git, sessions } = ctx;
  info(`Removing ${holder.worker}'s worktree`);
  await git.removeWorktree(root, holder.path);
  await bestEffort('Could not prune worktree metadata', () => git.pruneWorktrees(root));
  const oldSession = sessionName(repo, holder.worker);
  if (await sessions.exists(oldSession)) {
    warn(`Session ${oldSession} is still running; remove it with 'rig crew remove ${holder.worker} --rig=${repo}'`);
  }
}

async function assignToPolecat(
  ctx: RigContext,
  root: string,
  repo: string,
  branch: string,
  { existing, replaced }: PolecatPlan,
): Promise<PolecatAssignment> {
  const { config, git, sessions } = ctx;
  const worker = generatePolecatName(existing);
  const wtPath = workerPath(config.workersRoot, repo, worker);
  const session = sessionName(repo, worker);
  if (await pathExists(wtPath)) {
    throw new WorktreeCreationError(wtPath, 'a workspace with this polecat name already exists');
  }

  const pane = await ctx.lock.withLock(workerLockKey(repo, worker), async () => {
    await fs.mkdir(path.dirname(wtPath), { recursive: true });
    // The feature branch already exists and must survive a rollback
    const rollback = { repoPath: root, worktreePath: wtPath, createdBranch: null };

    try {
      await git.createWorktreeFromBranch(root, wtPath, branch);
    } catch (err) {
      await rollbackWorktree(git, rollback);
      throw new WorktreeCreationError(wtPath, errorMessage(err));
    }

    try {
      const handle = await sessions.create(session, workerLayout(repo, worker, branch, wtPath));
      return handle.assistantPane;
    } catch (err) {
      warn('Session creation failed, removing the new worktree');
      await rollbackWorktree(git, rollback);
      throw new SessionCreationError(session, errorMessage(err));
    }
  });

  info(`Created polecat 🐱 ${worker}`);
  const instructionSent = await sendAssignment(ctx, pane);
  return { mode: 'polecat', worker, path: wtPath, session, replaced, instructionSent };
}

/**
 * Type the assignment into the assistant pane once the assistant has had
 * time to start. Nothing confirms the keystrokes were received.
 */
async function sendAssignment(ctx: RigContext, pane: string): Promise<boolean> {
  const { startupDelayMs, keystrokeDelayMs } = ctx.config;
  await sleep(startupDelayMs);
  try {
    for (const text of [ASSIGNMENT_MESSAGE, HOOK_COMMAND]) {
      await ctx.sessions.sendKeystrokes(pane, text);
      await sleep(keystrokeDelayMs);
      await ctx.sessions.pressEnter(pane);
      await sleep(keystrokeDelayMs);
    }
    return true;
  } catch (err) {
    warn(`Could not send the assignment to the session: ${errorMessage(err)}`);
    return false;
  }
}
