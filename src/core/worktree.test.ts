import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, test, expect } from 'vitest';
import { NoBaseBranchError } from '../lib/errors.js';
import { FakeWorktreeBackend } from '../test-fixtures.js';
import { parseWorktreeList, resolveBaseBranch } from './worktree.js';

describe('parseWorktreeList', () => {
  test('given porcelain output, should return paths and short branch names', () => {
    const porcelain = [
      'worktree /repos/webapp',
      'HEAD 1111111111111111111111111111111111111111',
      'branch refs/heads/main',
      '',
      'worktree /crew/webapp/alice',
      'HEAD 2222222222222222222222222222222222222222',
      'branch refs/heads/alice/work',
      '',
      'worktree /crew/webapp/scratch',
      'HEAD 3333333333333333333333333333333333333333',
      'detached',
      '',
    ].join('\n');

    expect(parseWorktreeList(porcelain)).toEqual([
      { path: '/repos/webapp', branch: 'main' },
      { path: '/crew/webapp/alice', branch: 'alice/work' },
      { path: '/crew/webapp/scratch', branch: null },
    ]);
  });

  test('given empty output, should return no worktrees', () => {
    expect(parseWorktreeList('')).toEqual([]);
  });
});

describe('resolveBaseBranch', () => {
  let tmp: string;
  let git: FakeWorktreeBackend;
  let repo: string;

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'rig-base-'));
    git = new FakeWorktreeBackend();
    repo = path.join(tmp, 'webapp');
  });

  afterEach(async () => {
    await fs.rm(tmp, { recursive: true, force: true });
  });

  test('given a remote default that exists locally, should prefer it', async () => {
    await git.addRepo(repo, { branches: ['main', 'trunk'], remoteHead: 'trunk' });
    expect(await resolveBaseBranch(git, repo, 'main')).toBe('trunk');
  });

  test('given a remote default missing locally, should fall back to the configured branch', async () => {
    await git.addRepo(repo, { branches: ['main', 'develop'], remoteHead: 'gone' });
    expect(await resolveBaseBranch(git, repo, 'develop')).toBe('develop');
  });

  test('given no remote default and a missing configured branch, should settle on main', async () => {
    await git.addRepo(repo, { branches: ['main'] });
    expect(await resolveBaseBranch(git, repo, 'develop')).toBe('main');
  });

  test('given only master, should find it among the common names', async () => {
    await git.addRepo(repo, { branches: ['master'] });
    expect(await resolveBaseBranch(git, repo, 'main')).toBe('master');
  });

  test('given no candidate, should list every name tried once', async () => {
    await git.addRepo(repo, { branches: ['feature'] });
    await expect(resolveBaseBranch(git, repo, 'main')).rejects.toThrow(NoBaseBranchError);
    await expect(resolveBaseBranch(git, repo, 'main')).rejects.toThrow(
      'Could not find base branch (tried: origin/HEAD, main, master, develop)',
    );
  });
});
