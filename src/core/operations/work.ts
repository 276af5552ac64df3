import path from 'node:path';
import type { RigContext } from '../backend.js';
import { resolveRepositoryFromCwd } from '../context.js';
import { isPolecat } from '../polecat.js';
import { scanWorkerDirs } from '../status.js';
import { createWorkItem, currentTask, readHook, readProgress, type ScaffoldResult } from '../work.js';
import { resolveBaseBranch, type WorktreeInfo } from '../worktree.js';
import { HookNotFoundError, NotOnFeatureBranchError, RigError } from '../../lib/errors.js';
import { isMissingFileError, pathExists } from '../../lib/fs.js';
import { validateName } from '../../lib/name.js';
import { errorMessage, warn } from '../../lib/output.js';
import {
  featureBranchName,
  formulaPathspec,
  isDescendant,
  progressPath,
  workDir,
  workItemFromBranch,
  workPathspec,
} from '../../lib/paths.js';

export interface WorkCreateResult {
  repo: string;
  work: string;
  branch: string;
  baseBranch: string;
  scaffold: ScaffoldResult;
  workExisted: boolean;
  branchExisted: boolean;
  /** Commit message of the initial commit, or null when none was made. */
  commit: string | null;
}

/**
 * Scaffold `work/<name>/` in the repository the caller is in and put the
 * repository on `feat/<name>`.
 */
export async function performWorkCreate(ctx: RigContext, workName: string): Promise<WorkCreateResult> {
  validateName(workName, 'work name');
  const { root, repo } = await resolveRepositoryFromCwd(ctx);
  const branch = featureBranchName(workName);

  const workExisted = await pathExists(workDir(root, workName));
  if (workExisted) warn(`work/${workName}/ already exists`);
  const branchExisted = await ctx.git.branchExists(root, branch);
  if (branchExisted) warn(`Branch ${branch} already exists`);

  const scaffold = await createWorkItem(root, workName);
  const baseBranch = await resolveBaseBranch(ctx.git, root, ctx.config.defaultBranch);

  if (branchExisted) {
    await ctx.git.checkoutBranch(root, branch);
  } else {
    await ctx.git.createBranch(root, branch, baseBranch);
  }

  let commit: string | null = null;
  if (!workExisted) {
    const message = `Initialize work: ${workName}`;
    try {
      await ctx.git.commit(root, [workPathspec(workName), formulaPathspec()], message);
      commit = message;
    } catch (err) {
      warn(`Failed to create initial commit: ${errorMessage(err)}`);
    }
  }

  return { repo, work: workName, branch, baseBranch, scaffold, workExisted, branchExisted, commit };
}

export interface WorkStatusEntry {
  repo: string;
  work: string;
  /** Status line from progress.md, or 'Unknown' when it cannot be read. */
  status: string;
  assignee: string;
  branch: string;
  currentTask: string | null;
  polecat: boolean;
}

/**
 * Derive work status by scanning every worker directory for a checked-out
 * feature branch and reading that work item's progress document.
 */
export async function collectWorkStatus(ctx: RigContext): Promise<WorkStatusEntry[]> {
  const entries: WorkStatusEntry[] = [];

  for (const dir of await scanWorkerDirs(ctx.config.workersRoot)) {
    let branch: string;
    try {
      branch = await ctx.git.currentBranch(dir.path);
    } catch (err) {
      if (err instanceof RigError) continue;
      throw err;
    }

    const work = workItemFromBranch(branch);
    if (work === null) continue;

    const entry: WorkStatusEntry = {
      repo: dir.repo,
      work,
      status: 'Unknown',
      assignee: dir.worker,
      branch,
      currentTask: null,
      polecat: isPolecat(dir.worker),
    };

    try {
      const { progress, warnings } = await readProgress(progressPath(dir.path, work));
      for (const w of warnings) {
        warn(`${dir.repo}/${dir.worker} progress.md line ${w.line}: ${w.reason}`);
      }
      entry.status = progress.status || 'Unknown';
      entry.currentTask = currentTask(progress);
    } catch (err) {
      if (!isMissingFileError(err)) {
        warn(`Could not read progress for ${work}: ${errorMessage(err)}`);
      }
    }

    entries.push(entry);
  }

  return entries;
}

export interface Assignment {
  worker: string;
  path: string;
}

/**
 * Who has `branch` checked out, derived from the repository's worktree
 * list. Worktrees under the workers root are named by their worker
 * directory; any other checkout by its directory name.
 */
export function findAssignment(
  worktrees: WorktreeInfo[],
  branch: string,
  repoRoot: string,
  workersRoot: string,
): Assignment | null {
  for (const wt of worktrees) {
    if (wt.branch !== branch) continue;
    if (path.resolve(wt.path) === path.resolve(repoRoot)) continue;
    if (isDescendant(wt.path, workersRoot)) {
      const segments = path.relative(workersRoot, wt.path).split(path.sep);
      if (segments.length >= 2) return { worker: segments[1], path: wt.path };
    }
    return { worker: path.basename(wt.path), path: wt.path };
  }
  return null;
}

export interface HookView {
  work: string;
  content: string;
}

/** The hook for the feature branch checked out where the caller stands. */
export async function readCurrentHook(ctx: RigContext): Promise<HookView> {
  const { root } = await resolveRepositoryFromCwd(ctx);
  const branch = await ctx.git.currentBranch(root);
  const work = workItemFromBranch(branch);
  if (work === null) throw new NotOnFeatureBranchError(branch);

  const content = await readHook(root, work);
  if (content === null) throw new HookNotFoundError(work);
  return { work, content };
}
