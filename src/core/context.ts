import fs from 'node:fs/promises';
import path from 'node:path';
import { AmbiguousContextError, NotGitRepoError } from '../lib/errors.js';
import { isMissingFileError } from '../lib/fs.js';
import { isDescendant, parseSessionName, repoPath } from '../lib/paths.js';
import type { RigContext } from './backend.js';
import { normalizeSessionName } from './tmux.js';

type ResolverContext = Pick<RigContext, 'config' | 'git' | 'sessions' | 'cwd'>;

/**
 * Infer which repository a command applies to. First match wins:
 * explicit name, cwd under the repos root, cwd under the workers root,
 * then the current tmux session. Reads only.
 */
export async function resolveRepository(ctx: ResolverContext, explicit?: string): Promise<string> {
  if (explicit) return explicit;

  const { reposRoot, workersRoot } = ctx.config;
  const cwd = path.resolve(ctx.cwd);

  if (isDescendant(cwd, reposRoot)) {
    try {
      return path.basename(await ctx.git.repositoryRoot(cwd));
    } catch (err) {
      if (!(err instanceof NotGitRepoError)) throw err;
    }
  }

  if (isDescendant(cwd, workersRoot)) {
    // Layout is <workersRoot>/<repo>/<worker>; the worktree's own git root
    // says nothing about which rig it belongs to.
    const [repo] = path.relative(workersRoot, cwd).split(path.sep);
    if (repo) return repo;
  }

  const session = await ctx.sessions.currentSessionName();
  if (session) {
    const { repo, worker } = parseSessionName(session);
    if (worker !== null) {
      return (await findRepositoryBySessionName(ctx, repo)) ?? repo;
    }
    const match = await findRepositoryBySessionName(ctx, repo);
    if (match) return match;
  }

  throw new AmbiguousContextError(reposRoot, workersRoot);
}

/**
 * tmux reports normalized names, so `my.app` comes back as `my_app`.
 * Map a session's repo part back to a real repository directory.
 */
export async function findRepositoryBySessionName(
  ctx: Pick<RigContext, 'config' | 'git'>,
  name: string,
): Promise<string | null> {
  const { reposRoot } = ctx.config;
  if (await ctx.git.isRepository(repoPath(reposRoot, name))) return name;

  let entries: string[];
  try {
    entries = await fs.readdir(reposRoot);
  } catch (err) {
    if (isMissingFileError(err)) return null;
    throw err;
  }

  for (const entry of entries.sort()) {
    if (normalizeSessionName(entry) !== name) continue;
    if (await ctx.git.isRepository(repoPath(reposRoot, entry))) return entry;
  }
  return null;
}

/**
 * The repository the caller is physically inside, for commands that never
 * look at flags or sessions (work, hook, sling).
 */
export async function resolveRepositoryFromCwd(
  ctx: Pick<RigContext, 'git' | 'cwd'>,
): Promise<{ root: string; repo: string }> {
  const root = await ctx.git.repositoryRoot(ctx.cwd);
  return { root, repo: path.basename(root) };
}
