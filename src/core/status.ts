import fs from 'node:fs/promises';
import path from 'node:path';
import { RigError } from '../lib/errors.js';
import { isMissingFileError, pathExists } from '../lib/fs.js';
import { parseSessionName, repoPath, sessionName, workerPath } from '../lib/paths.js';
import type { SessionState } from '../lib/output.js';
import type { RigContext } from './backend.js';
import { findRepositoryBySessionName } from './context.js';
import { isPolecat } from './polecat.js';
import { normalizeSessionName } from './tmux.js';
import type { WorktreeBackend } from './worktree.js';

export interface WorkerDir {
  repo: string;
  worker: string;
  path: string;
}

async function listSubdirectories(dir: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries
      .filter((e) => e.isDirectory() && !e.name.startsWith('.'))
      .map((e) => e.name)
      .sort();
  } catch (err) {
    if (isMissingFileError(err)) return [];
    throw err;
  }
}

/** Every `<workersRoot>/<repo>/<worker>` directory, optionally for one repo. */
export async function scanWorkerDirs(workersRoot: string, repo?: string): Promise<WorkerDir[]> {
  const repos = repo !== undefined ? [repo] : await listSubdirectories(workersRoot);
  const result: WorkerDir[] = [];
  for (const r of repos) {
    for (const worker of await listSubdirectories(path.join(workersRoot, r))) {
      result.push({ repo: r, worker, path: workerPath(workersRoot, r, worker) });
    }
  }
  return result;
}

export async function findPolecats(workersRoot: string): Promise<WorkerDir[]> {
  return (await scanWorkerDirs(workersRoot)).filter((w) => isPolecat(w.worker));
}

/** Current branch for display; 'unknown' when git cannot tell. */
export async function branchOrUnknown(git: WorktreeBackend, dir: string): Promise<string> {
  try {
    return (await git.currentBranch(dir)) || 'unknown';
  } catch (err) {
    if (err instanceof RigError) return 'unknown';
    throw err;
  }
}

export type SessionKind = 'rig' | 'crew' | 'other';

export interface ClassifiedSession {
  session: string;
  kind: SessionKind;
  repo: string;
  worker: string | null;
  /** Repository or worktree directory for rig and crew sessions. */
  path: string | null;
}

/**
 * A bare session name is a rig session when a repository of that name
 * exists; `<repo>@<worker>` is a crew session when its worktree exists.
 * tmux reports normalized names, so the repository part is mapped back first.
 */
export async function classifySession(
  ctx: Pick<RigContext, 'config' | 'git'>,
  session: string,
): Promise<ClassifiedSession> {
  const parsed = parseSessionName(session);
  const match = await findRepositoryBySessionName(ctx, parsed.repo);
  const repo = match ?? parsed.repo;
  const { worker } = parsed;
  if (worker === null) {
    const dir = repoPath(ctx.config.reposRoot, repo);
    const isRig = match !== null;
    return { session, kind: isRig ? 'rig' : 'other', repo, worker, path: isRig ? dir : null };
  }
  const dir = workerPath(ctx.config.workersRoot, repo, worker);
  const isCrew = await pathExists(dir);
  return { session, kind: isCrew ? 'crew' : 'other', repo, worker, path: isCrew ? dir : null };
}

export async function classifySessions(
  ctx: Pick<RigContext, 'config' | 'git' | 'sessions'>,
): Promise<ClassifiedSession[]> {
  const sessions = await ctx.sessions.list();
  return Promise.all(sessions.map((s) => classifySession(ctx, s)));
}

export interface RepositoryInfo {
  name: string;
  path: string;
  running: boolean;
}

export async function listRepositories(
  ctx: Pick<RigContext, 'config' | 'git' | 'sessions'>,
): Promise<RepositoryInfo[]> {
  const { reposRoot } = ctx.config;
  if (!(await pathExists(reposRoot))) {
    throw new RigError(`Base directory does not exist: ${reposRoot}`, 'NOT_FOUND');
  }

  const running = new Set(await ctx.sessions.list());
  const repos: RepositoryInfo[] = [];
  for (const name of await listSubdirectories(reposRoot)) {
    const dir = repoPath(reposRoot, name);
    if (!(await ctx.git.isRepository(dir))) continue;
    repos.push({ name, path: dir, running: running.has(normalizeSessionName(name)) });
  }
  return repos;
}

export interface WorkerInfo extends WorkerDir {
  branch: string;
  state: SessionState;
  polecat: boolean;
}

export async function listWorkers(
  ctx: Pick<RigContext, 'config' | 'git' | 'sessions'>,
  filter?: string,
): Promise<WorkerInfo[]> {
  const running = new Set(await ctx.sessions.list());
  const dirs = (await scanWorkerDirs(ctx.config.workersRoot))
    .filter((w) => !filter || w.worker === filter);

  const workers: WorkerInfo[] = [];
  for (const dir of dirs) {
    const session = normalizeSessionName(sessionName(dir.repo, dir.worker));
    workers.push({
      ...dir,
      branch: await branchOrUnknown(ctx.git, dir.path),
      state: running.has(session) ? 'running' : 'stopped',
      polecat: isPolecat(dir.worker),
    });
  }
  return workers;
}

export interface SessionStatus {
  session: string;
  repo: string;
  worker: string | null;
  path: string;
  branch: string;
  current: boolean;
  polecat: boolean;
}

export interface StatusReport {
  rigs: SessionStatus[];
  crew: SessionStatus[];
}

export async function collectSessionStatus(
  ctx: Pick<RigContext, 'config' | 'git' | 'sessions'>,
): Promise<StatusReport> {
  const current = await ctx.sessions.currentSessionName();
  const report: StatusReport = { rigs: [], crew: [] };

  for (const s of await classifySessions(ctx)) {
    if (s.kind === 'other' || s.path === null) continue;
    const entry: SessionStatus = {
      session: s.session,
      repo: s.repo,
      worker: s.worker,
      path: s.path,
      branch: await branchOrUnknown(ctx.git, s.path),
      current: current !== null && normalizeSessionName(current) === normalizeSessionName(s.session),
      polecat: s.worker !== null && isPolecat(s.worker),
    };
    (s.kind === 'rig' ? report.rigs : report.crew).push(entry);
  }
  return report;
}
