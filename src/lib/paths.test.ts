import path from 'node:path';
import { describe, test, expect } from 'vitest';
import {
  featureBranchName,
  formulaPath,
  formulaPathspec,
  hookPath,
  isDescendant,
  lockFilePath,
  parseSessionName,
  progressPath,
  sessionName,
  workBranchName,
  workItemFromBranch,
  workPathspec,
  workerPath,
} from './paths.js';

describe('sessionName', () => {
  test('given only a repository, should return the bare name', () => {
    expect(sessionName('webapp')).toBe('webapp');
  });

  test('given a worker, should join with @', () => {
    expect(sessionName('webapp', 'alice')).toBe('webapp@alice');
  });
});

describe('parseSessionName', () => {
  test('given a worker session, should split on the first @', () => {
    expect(parseSessionName('webapp@alice')).toEqual({ repo: 'webapp', worker: 'alice' });
  });

  test('given a bare session, should report no worker', () => {
    expect(parseSessionName('webapp')).toEqual({ repo: 'webapp', worker: null });
  });

  test('given a round trip, should recover both parts', () => {
    expect(parseSessionName(sessionName('my_app', 'polecat_emma'))).toEqual({
      repo: 'my_app',
      worker: 'polecat_emma',
    });
  });
});

describe('branch names', () => {
  test('given a crew name, should use <name>/work', () => {
    expect(workBranchName('alice')).toBe('alice/work');
  });

  test('given a work item, should use feat/<name>', () => {
    expect(featureBranchName('build-frontend')).toBe('feat/build-frontend');
  });

  test('given a feature branch, should recover the work item', () => {
    expect(workItemFromBranch('feat/build-frontend')).toBe('build-frontend');
  });

  test('given a non-feature branch, should return null', () => {
    expect(workItemFromBranch('main')).toBeNull();
    expect(workItemFromBranch('alice/work')).toBeNull();
    expect(workItemFromBranch('feat/')).toBeNull();
  });
});

describe('work paths', () => {
  const root = path.join('/', 'repos', 'webapp');

  test('given a work item, should place documents under work/<name>', () => {
    expect(progressPath(root, 'api')).toBe(path.join(root, 'work', 'api', 'progress.md'));
    expect(hookPath(root, 'api')).toBe(path.join(root, 'work', 'api', 'hook.md'));
  });

  test('given a formula, should place it under work/formula', () => {
    expect(formulaPath(root, 'build')).toBe(path.join(root, 'work', 'formula', 'build.md'));
  });

  test('given pathspecs, should use forward slashes', () => {
    expect(workPathspec('api')).toBe('work/api/');
    expect(formulaPathspec()).toBe('work/formula/');
  });

  test('given a worker, should nest it under its repository', () => {
    expect(workerPath('/crew', 'webapp', 'alice')).toBe(path.join('/crew', 'webapp', 'alice'));
  });
});

describe('lockFilePath', () => {
  test('given a session-style key, should encode it into a single file name', () => {
    expect(lockFilePath('/locks', 'webapp@alice')).toBe(path.join('/locks', 'webapp%40alice'));
  });
});

describe('isDescendant', () => {
  test('given a nested path, should return true', () => {
    expect(isDescendant('/a/b/c', '/a')).toBe(true);
  });

  test('given the same path, should return false', () => {
    expect(isDescendant('/a', '/a')).toBe(false);
  });

  test('given a sibling sharing a prefix, should return false', () => {
    expect(isDescendant('/ab', '/a')).toBe(false);
    expect(isDescendant('/a/../b', '/a')).toBe(false);
  });
});
