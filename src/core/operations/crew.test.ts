import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, test, expect, vi } from 'vitest';
import {
  CancelledError,
  InvalidNameError,
  NotFoundError,
  RepositoryNotFoundError,
  SessionCreationError,
  WorkspaceNotFoundError,
  WorktreeCreationError,
} from '../../lib/errors.js';
import { pathExists } from '../../lib/fs.js';
import { makeTestRig, removeTestRig, type TestRig } from '../../test-fixtures.js';
import { performCrewAdd, performCrewRemove, performCrewStart, performPolecatPrune } from './crew.js';

vi.mock('../../lib/output.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../lib/output.js')>()),
  info: vi.fn(),
  warn: vi.fn(),
}));

import { warn } from '../../lib/output.js';

let rig: TestRig;
let repo: string;
let alice: string;
const input = { repo: 'webapp', worker: 'alice' };

beforeEach(async () => {
  vi.clearAllMocks();
  vi.spyOn(console, 'log').mockImplementation(() => {});
  rig = await makeTestRig();
  repo = path.join(rig.config.reposRoot, 'webapp');
  alice = path.join(rig.config.workersRoot, 'webapp', 'alice');
  await rig.git.addRepo(repo);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await removeTestRig(rig);
});

describe('performCrewAdd', () => {
  test('given a new crew member, should create worktree, branch and session then attach', async () => {
    const result = await performCrewAdd(rig.ctx, input);

    expect(result).toEqual({
      repo: 'webapp',
      worker: 'alice',
      path: alice,
      session: 'webapp@alice',
      branch: 'alice/work',
      baseBranch: 'main',
      outcome: 'created',
      reusedBranch: false,
    });
    expect(await pathExists(alice)).toBe(true);
    expect(rig.git.repo(repo).worktrees.get(alice)).toBe('alice/work');
    expect(rig.sessions.created.map((c) => c.layout)).toEqual([{
      workingDir: alice,
      title: '👤 webapp@alice',
      banner: '# alice on webapp (branch: alice/work)',
    }]);
    expect(rig.sessions.attached).toEqual(['webapp@alice']);
    expect(rig.lock.keys).toEqual(['webapp@alice']);
  });

  test('given the workspace and session already exist, should only attach', async () => {
    await performCrewAdd(rig.ctx, input);

    const again = await performCrewAdd(rig.ctx, input);

    expect(again.outcome).toBe('attached');
    expect(rig.git.calls.filter((c) => c.startsWith('createWorktree'))).toHaveLength(1);
    expect(rig.sessions.created).toHaveLength(1);
    expect(rig.sessions.attached).toEqual(['webapp@alice', 'webapp@alice']);
  });

  test('given the workspace exists without a session, should recreate the session', async () => {
    await performCrewAdd(rig.ctx, input);
    await rig.sessions.kill('webapp@alice');

    const again = await performCrewAdd(rig.ctx, input);

    expect(again.outcome).toBe('session-recreated');
    expect(await rig.sessions.exists('webapp@alice')).toBe(true);
  });

  test('given session creation fails, should roll back the worktree and branch', async () => {
    rig.sessions.failCreate = new Error('tmux exploded');

    await expect(performCrewAdd(rig.ctx, input)).rejects.toThrow(
      new SessionCreationError('webapp@alice', 'tmux exploded'),
    );

    expect(await pathExists(alice)).toBe(false);
    expect(await pathExists(path.dirname(alice))).toBe(false);
    expect(rig.git.repo(repo).worktrees.size).toBe(0);
    expect(rig.git.repo(repo).branches.has('alice/work')).toBe(false);
    expect(rig.sessions.attached).toEqual([]);
  });

  test('given worktree creation fails, should raise WorktreeCreationError and leave nothing behind', async () => {
    rig.git.failOn('createWorktree');

    await expect(performCrewAdd(rig.ctx, input)).rejects.toThrow(WorktreeCreationError);
    expect(await pathExists(alice)).toBe(false);
    expect(rig.sessions.sessions.size).toBe(0);
  });

  test('given the work branch exists and the user accepts, should reuse it', async () => {
    rig.git.repo(repo).branches.add('alice/work');
    rig.prompter.answer(true);

    const result = await performCrewAdd(rig.ctx, input);

    expect(result.reusedBranch).toBe(true);
    expect(rig.prompter.questions).toEqual(['Use existing branch?']);
    expect(rig.git.calls.some((c) => c.startsWith('createWorktreeFromBranch'))).toBe(true);
  });

  test('given the work branch exists and the user declines, should cancel', async () => {
    rig.git.repo(repo).branches.add('alice/work');
    rig.prompter.answer(false);

    await expect(performCrewAdd(rig.ctx, input)).rejects.toThrow(
      'Cancelled - delete the branch first or use a different crew name',
    );
    expect(await pathExists(alice)).toBe(false);
  });

  test('given a reused branch and a failing session, should keep the branch', async () => {
    rig.git.repo(repo).branches.add('alice/work');
    rig.prompter.answer(true);
    rig.sessions.failCreate = new Error('no server');

    await expect(performCrewAdd(rig.ctx, input)).rejects.toThrow(SessionCreationError);
    expect(rig.git.repo(repo).branches.has('alice/work')).toBe(true);
  });

  test('given an unknown repository, should fail before touching anything', async () => {
    await expect(performCrewAdd(rig.ctx, { repo: 'ghost', worker: 'alice' })).rejects.toThrow(RepositoryNotFoundError);
    expect(rig.lock.keys).toEqual([]);
  });

  test('given an invalid name, should reject it', async () => {
    await expect(performCrewAdd(rig.ctx, { repo: 'webapp', worker: 'a@b' })).rejects.toThrow(InvalidNameError);
  });
});

describe('performCrewStart', () => {
  test('given no workspace, should point at crew add', async () => {
    await expect(performCrewStart(rig.ctx, input)).rejects.toThrow(
      new WorkspaceNotFoundError(alice, 'rig crew add alice --rig=webapp'),
    );
  });

  test('given a stopped session, should recreate it and attach', async () => {
    await performCrewAdd(rig.ctx, input);
    await rig.sessions.kill('webapp@alice');

    const result = await performCrewStart(rig.ctx, input);

    expect(result).toEqual({
      path: alice,
      session: 'webapp@alice',
      branch: 'alice/work',
      switchedBranch: false,
      sessionCreated: true,
    });
    expect(rig.sessions.attached).toEqual(['webapp@alice', 'webapp@alice']);
  });

  test('given the workspace is on another branch, should offer to switch back', async () => {
    await performCrewAdd(rig.ctx, input);
    rig.git.repo(repo).branches.add('feat/api');
    await rig.git.checkoutBranch(alice, 'feat/api');
    rig.prompter.answer(true);

    const result = await performCrewStart(rig.ctx, input);

    expect(rig.prompter.questions).toEqual(['Switch to alice/work?']);
    expect(result.switchedBranch).toBe(true);
    expect(await rig.git.currentBranch(alice)).toBe('alice/work');
  });
});

describe('performCrewRemove', () => {
  test('given a full workspace, should kill the session, remove the worktree and delete the branch', async () => {
    await performCrewAdd(rig.ctx, input);
    rig.prompter.answer(true);

    const result = await performCrewRemove(rig.ctx, input);

    expect(result).toEqual({
      path: alice,
      session: 'webapp@alice',
      outcome: 'removed',
      killedSession: true,
      deletedBranch: true,
      removedParent: true,
    });
    expect(rig.prompter.questions).toEqual(['Delete branch alice/work?']);
    expect(rig.sessions.sessions.size).toBe(0);
    expect(rig.git.repo(repo).branches.has('alice/work')).toBe(false);
    expect(await pathExists(alice)).toBe(false);
  });

  test('given a removal, should allow adding the same member again', async () => {
    await performCrewAdd(rig.ctx, input);
    rig.prompter.answer(true);
    await performCrewRemove(rig.ctx, input);

    const again = await performCrewAdd(rig.ctx, input);

    expect(again.outcome).toBe('created');
    expect(again.reusedBranch).toBe(false);
  });

  test('given the user keeps the branch, should leave it', async () => {
    await performCrewAdd(rig.ctx, input);
    rig.prompter.answer(false);

    const result = await performCrewRemove(rig.ctx, input);

    expect(result.deletedBranch).toBe(false);
    expect(rig.git.repo(repo).branches.has('alice/work')).toBe(true);
  });

  test('given a registered worktree whose directory is gone, should prune it and kill the session', async () => {
    await performCrewAdd(rig.ctx, input);
    await fs.rm(alice, { recursive: true, force: true });

    const result = await performCrewRemove(rig.ctx, input);

    expect(result.outcome).toBe('detached');
    expect(result.killedSession).toBe(true);
    expect(rig.git.repo(repo).worktrees.size).toBe(0);
    expect(rig.prompter.questions).toEqual([]);
  });

  test('given a worktree directory deleted by hand, should allow adding the member again', async () => {
    await performCrewAdd(rig.ctx, input);
    await fs.rm(alice, { recursive: true, force: true });
    await performCrewRemove(rig.ctx, input);
    rig.prompter.answer(true);

    const again = await performCrewAdd(rig.ctx, input);

    expect(again.outcome).toBe('created');
    expect(again.reusedBranch).toBe(true);
    expect(rig.prompter.questions).toEqual(['Use existing branch?']);
    expect(await pathExists(alice)).toBe(true);
    expect(rig.git.repo(repo).worktrees.get(alice)).toBe('alice/work');
  });

  test('given only an orphan session, should kill it', async () => {
    rig.sessions.sessions.add('webapp@alice');

    const result = await performCrewRemove(rig.ctx, input);

    expect(result.outcome).toBe('session-only');
    expect(rig.sessions.sessions.size).toBe(0);
  });

  test('given nothing at all, should fail with NotFoundError', async () => {
    await expect(performCrewRemove(rig.ctx, input)).rejects.toThrow(NotFoundError);
  });

  test('given an unregistered directory the user agrees to delete, should delete it', async () => {
    await fs.mkdir(alice, { recursive: true });
    await fs.writeFile(path.join(alice, 'notes.txt'), 'left over');
    rig.prompter.answer(true);

    const result = await performCrewRemove(rig.ctx, input);

    expect(result.outcome).toBe('removed');
    expect(result.killedSession).toBe(false);
    expect(rig.prompter.questions).toEqual([`Delete unregistered directory ${alice}?`]);
    expect(await pathExists(alice)).toBe(false);
    expect(warn).toHaveBeenCalledWith(`${alice} is not a registered worktree`);
  });

  test('given an unregistered directory the user declines to delete, should leave it in place', async () => {
    await fs.mkdir(alice, { recursive: true });
    await fs.writeFile(path.join(alice, 'notes.txt'), 'left over');
    rig.prompter.answer(false);

    const result = await performCrewRemove(rig.ctx, input);

    expect(result.outcome).toBe('kept-directory');
    expect(result.removedParent).toBe(false);
    expect(await fs.readFile(path.join(alice, 'notes.txt'), 'utf-8')).toBe('left over');
  });

  test('given the caller sits in the session being removed, should warn first', async () => {
    await performCrewAdd(rig.ctx, input);
    rig.sessions.current = 'webapp@alice';
    rig.prompter.answer(true);

    await performCrewRemove(rig.ctx, input);

    expect(warn).toHaveBeenCalledWith("You are currently in session 'webapp@alice' - removing it will disconnect you");
  });
});

describe('performPolecatPrune', () => {
  beforeEach(() => {
    rig.git.repo(repo).branches.add('feat/api');
    rig.git.repo(repo).branches.add('feat/ui');
  });

  async function addPolecat(name: string, branch: string): Promise<string> {
    const dir = path.join(rig.config.workersRoot, 'webapp', name);
    await rig.git.createWorktreeFromBranch(repo, dir, branch);
    return dir;
  }

  test('given no polecats, should do nothing without asking', async () => {
    await performCrewAdd(rig.ctx, input);

    expect(await performPolecatPrune(rig.ctx)).toEqual({ found: [], removed: [], cancelled: false });
    expect(rig.prompter.questions).toEqual([]);
  });

  test('given the user declines, should keep every polecat', async () => {
    const emma = await addPolecat('polecat_emma', 'feat/api');
    rig.prompter.answer(false);

    const result = await performPolecatPrune(rig.ctx);

    expect(result.cancelled).toBe(true);
    expect(result.found.map((p) => p.worker)).toEqual(['polecat_emma']);
    expect(await pathExists(emma)).toBe(true);
  });

  test('given confirmation, should remove polecats and their sessions but not crew', async () => {
    await performCrewAdd(rig.ctx, input);
    const emma = await addPolecat('polecat_emma', 'feat/api');
    const nova = await addPolecat('polecat_nova', 'feat/ui');
    rig.sessions.sessions.add('webapp@polecat_emma');
    rig.prompter.answer(true);

    const result = await performPolecatPrune(rig.ctx);

    expect(rig.prompter.questions).toEqual(['Remove these workspaces and worktrees?']);
    expect(result.removed.map((p) => p.worker)).toEqual(['polecat_emma', 'polecat_nova']);
    expect(await pathExists(emma)).toBe(false);
    expect(await pathExists(nova)).toBe(false);
    expect(await pathExists(alice)).toBe(true);
    expect([...rig.sessions.sessions]).toEqual(['webapp@alice']);
    expect(rig.git.repo(repo).branches.has('feat/api')).toBe(true);
  });
});
