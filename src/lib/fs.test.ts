import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, test, expect } from 'vitest';
import { isMissingFileError, pathExists, removeIfEmpty } from './fs.js';

let tmp: string;

beforeEach(async () => {
  tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'rig-fs-'));
});

afterEach(async () => {
  await fs.rm(tmp, { recursive: true, force: true });
});

describe('pathExists', () => {
  test('given an existing directory, should return true', async () => {
    expect(await pathExists(tmp)).toBe(true);
  });

  test('given a missing path, should return false', async () => {
    expect(await pathExists(path.join(tmp, 'nope'))).toBe(false);
  });
});

describe('isMissingFileError', () => {
  test('given an ENOENT error, should return true', () => {
    expect(isMissingFileError(Object.assign(new Error('missing'), { code: 'ENOENT' }))).toBe(true);
  });

  test('given any other error, should return false', () => {
    expect(isMissingFileError(Object.assign(new Error('denied'), { code: 'EACCES' }))).toBe(false);
    expect(isMissingFileError('ENOENT')).toBe(false);
  });
});

describe('removeIfEmpty', () => {
  test('given an empty directory, should remove it', async () => {
    const dir = path.join(tmp, 'empty');
    await fs.mkdir(dir);
    expect(await removeIfEmpty(dir)).toBe(true);
    expect(await pathExists(dir)).toBe(false);
  });

  test('given a directory with entries, should keep it', async () => {
    const dir = path.join(tmp, 'full');
    await fs.mkdir(path.join(dir, 'alice'), { recursive: true });
    expect(await removeIfEmpty(dir)).toBe(false);
    expect(await pathExists(dir)).toBe(true);
  });

  test('given a missing directory, should return false', async () => {
    expect(await removeIfEmpty(path.join(tmp, 'gone'))).toBe(false);
  });
});
