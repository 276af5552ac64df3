import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, test, expect } from 'vitest';
import { AmbiguousContextError } from '../lib/errors.js';
import { makeTestRig, removeTestRig, type TestRig } from '../test-fixtures.js';
import { resolveRepository, resolveRepositoryFromCwd } from './context.js';

let rig: TestRig;

beforeEach(async () => {
  rig = await makeTestRig();
});

afterEach(async () => {
  await removeTestRig(rig);
});

describe('resolveRepository', () => {
  test('given an explicit name, should use it without looking around', async () => {
    rig.sessions.current = 'other';
    expect(await resolveRepository(rig.ctx, 'webapp')).toBe('webapp');
  });

  test('given a cwd inside a repository, should use the repository directory name', async () => {
    const repo = path.join(rig.config.reposRoot, 'webapp');
    await rig.git.addRepo(repo);
    rig.ctx.cwd = path.join(repo, 'src', 'components');

    expect(await resolveRepository(rig.ctx)).toBe('webapp');
  });

  test('given a cwd two levels under the workers root, should use the first segment rather than the git root name', async () => {
    const repo = path.join(rig.config.reposRoot, 'upstream-mirror');
    await rig.git.addRepo(repo);
    const wt = path.join(rig.config.workersRoot, 'webapp', 'alice');
    await rig.git.createWorktree(repo, wt, 'alice/work', 'main');
    rig.ctx.cwd = path.join(wt, 'src');

    expect(path.basename(await rig.git.repositoryRoot(rig.ctx.cwd))).toBe('alice');
    expect(await resolveRepository(rig.ctx)).toBe('webapp');
  });

  test('given a non-repository directory under the repos root, should fall through to the session', async () => {
    const loose = path.join(rig.config.reposRoot, 'notes');
    await fs.mkdir(loose);
    await rig.git.addRepo(path.join(rig.config.reposRoot, 'api'));
    rig.ctx.cwd = loose;
    rig.sessions.current = 'api';

    expect(await resolveRepository(rig.ctx)).toBe('api');
  });

  test('given a normalized worker session, should map it back to the dotted repository', async () => {
    await rig.git.addRepo(path.join(rig.config.reposRoot, 'my.app'));
    rig.sessions.current = 'my_app@tracy';

    expect(await resolveRepository(rig.ctx)).toBe('my.app');
  });

  test('given a worker session for an unknown repository, should use the session prefix', async () => {
    rig.sessions.current = 'ghost@bob';

    expect(await resolveRepository(rig.ctx)).toBe('ghost');
  });

  test('given a bare session that is not a repository, should fail as ambiguous', async () => {
    rig.sessions.current = 'scratch';

    await expect(resolveRepository(rig.ctx)).rejects.toThrow(AmbiguousContextError);
  });

  test('given no hints at all, should fail as ambiguous', async () => {
    await expect(resolveRepository(rig.ctx)).rejects.toThrow(
      `Could not infer rig. Use --rig=<repo> or run from within a repo in ${rig.config.reposRoot} or ${rig.config.workersRoot}`,
    );
  });
});

describe('resolveRepositoryFromCwd', () => {
  test('given a cwd inside a repository, should return its root and name', async () => {
    const repo = path.join(rig.config.reposRoot, 'webapp');
    await rig.git.addRepo(repo);
    rig.ctx.cwd = path.join(repo, 'work');

    expect(await resolveRepositoryFromCwd(rig.ctx)).toEqual({ root: path.resolve(repo), repo: 'webapp' });
  });
});
