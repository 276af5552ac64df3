import type { RigContext } from '../backend.js';
import { resolveRepository } from '../context.js';
import { rigLayout } from '../layout.js';
import { classifySessions, type ClassifiedSession } from '../status.js';
import { RepositoryNotFoundError, SessionCreationError, SessionNotFoundError } from '../../lib/errors.js';
import { errorMessage, warn } from '../../lib/output.js';
import { repoPath, sessionName } from '../../lib/paths.js';

export interface RigUpResult {
  name: string;
  path: string;
  inferred: boolean;
  created: boolean;
}

/** Attach to a repository's session, creating it first when needed. */
export async function performRigUp(ctx: RigContext, explicit?: string): Promise<RigUpResult> {
  const name = await resolveRepository(ctx, explicit);
  const dir = repoPath(ctx.config.reposRoot, name);
  if (!(await ctx.git.isRepository(dir))) {
    throw new RepositoryNotFoundError(dir);
  }

  const session = sessionName(name);
  let created = false;
  if (!(await ctx.sessions.exists(session))) {
    try {
      await ctx.sessions.create(session, rigLayout(name, dir));
    } catch (err) {
      throw new SessionCreationError(session, errorMessage(err));
    }
    created = true;
  }

  await ctx.sessions.attach(session);
  return { name, path: dir, inferred: !explicit, created };
}

export interface RigDownResult {
  name: string;
  inferred: boolean;
}

export async function performRigDown(ctx: RigContext, explicit?: string): Promise<RigDownResult> {
  const name = await resolveRepository(ctx, explicit);
  const session = sessionName(name);
  if (!(await ctx.sessions.exists(session))) {
    throw new SessionNotFoundError(session);
  }
  await ctx.sessions.kill(session);
  return { name, inferred: !explicit };
}

/** Attach to any named session, or to tmux's default one. */
export async function performAttach(ctx: RigContext, name?: string): Promise<void> {
  if (name === undefined) {
    await ctx.sessions.attachDefault();
    return;
  }
  if (!(await ctx.sessions.exists(name))) {
    throw new SessionNotFoundError(name);
  }
  await ctx.sessions.attach(name);
}

export type KillScope = 'rigs' | 'all' | 'crew';

export interface KillAllResult {
  killed: string[];
  failed: string[];
}

export function shouldKill(session: ClassifiedSession, scope: KillScope): boolean {
  switch (scope) {
    case 'rigs':
      return session.kind === 'rig';
    case 'crew':
      return session.kind === 'crew';
    case 'all':
      return session.kind !== 'other';
  }
}

/** Kill every rig session, every crew session, or both. Unrelated sessions are left alone. */
export async function performKillAll(ctx: RigContext, scope: KillScope): Promise<KillAllResult> {
  const result: KillAllResult = { killed: [], failed: [] };
  for (const session of await classifySessions(ctx)) {
    if (!shouldKill(session, scope)) continue;
    try {
      await ctx.sessions.kill(session.session);
      result.killed.push(session.session);
    } catch (err) {
      warn(`Could not kill ${session.session}: ${errorMessage(err)}`);
      result.failed.push(session.session);
    }
  }
  return result;
}
