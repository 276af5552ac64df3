import os from 'node:os';
import path from 'node:path';
import { describe, test, expect, vi, beforeEach } from 'vitest';
import { expandHome, loadConfig } from './config.js';

vi.mock('node:fs/promises', () => ({
  default: {
    readFile: vi.fn(),
  },
}));

import fs from 'node:fs/promises';

const mockedReadFile = vi.mocked(fs.readFile);
const env = { HOME: '/home/dev' };

function enoent(): Error {
  return Object.assign(new Error('ENOENT: no such file'), { code: 'ENOENT' });
}

beforeEach(() => {
  vi.clearAllMocks();
});

describe('loadConfig', () => {
  test('given no config file, should return defaults under HOME', async () => {
    mockedReadFile.mockRejectedValue(enoent());

    const config = await loadConfig(env);

    expect(config.reposRoot).toBe('/home/dev/git');
    expect(config.workersRoot).toBe('/home/dev/crew');
    expect(config.defaultBranch).toBe('main');
    expect(config.controlMode).toBe(false);
    expect(config.defaultFormula).toBe('build');
    expect(config.startupDelayMs).toBe(2000);
    expect(config.lockDir).toBe(path.resolve(os.tmpdir(), 'rig-locks'));
  });

  test('given valid YAML, should merge it over the defaults', async () => {
    mockedReadFile.mockResolvedValue(`
reposRoot: ~/src
controlMode: true
startupDelayMs: 500
`);

    const config = await loadConfig(env);

    expect(config.reposRoot).toBe('/home/dev/src');
    expect(config.controlMode).toBe(true);
    expect(config.startupDelayMs).toBe(500);
    expect(config.workersRoot).toBe('/home/dev/crew');
  });

  test('given environment variables, should let them win over the file', async () => {
    mockedReadFile.mockResolvedValue('controlMode: false\nreposRoot: /srv/file\n');

    const config = await loadConfig({
      ...env,
      RIGS_BASE: '/srv/repos',
      CREW_BASE: '~/workers',
      RIG_DEFAULT_BRANCH: 'trunk',
      RIG_USE_CC: 'true',
    });

    expect(config.reposRoot).toBe('/srv/repos');
    expect(config.workersRoot).toBe('/home/dev/workers');
    expect(config.defaultBranch).toBe('trunk');
    expect(config.controlMode).toBe(true);
  });

  test('given RIG_CONFIG, should read that file', async () => {
    mockedReadFile.mockResolvedValue('');

    await loadConfig({ ...env, RIG_CONFIG: '~/rig.yaml' });

    expect(mockedReadFile).toHaveBeenCalledWith('/home/dev/rig.yaml', 'utf-8');
  });

  test('given a value of the wrong type, should throw ConfigError', async () => {
    mockedReadFile.mockResolvedValue('startupDelayMs: soon\n');

    await expect(loadConfig(env)).rejects.toThrow('startupDelayMs must be a non-negative number');
  });

  test('given a list at the top level, should throw ConfigError', async () => {
    mockedReadFile.mockResolvedValue('- a\n- b\n');

    await expect(loadConfig(env)).rejects.toThrow('expected a mapping at the top level');
  });

  test('given non-ENOENT error, should throw', async () => {
    mockedReadFile.mockRejectedValue(Object.assign(new Error('EACCES'), { code: 'EACCES' }));

    await expect(loadConfig(env)).rejects.toThrow('EACCES');
  });

  test('given any load, should return a frozen config', async () => {
    mockedReadFile.mockRejectedValue(enoent());

    expect(Object.isFrozen(await loadConfig(env))).toBe(true);
  });
});

describe('expandHome', () => {
  test('given ~ forms, should expand them and leave other paths', () => {
    expect(expandHome('~', '/home/dev')).toBe('/home/dev');
    expect(expandHome('~/git', '/home/dev')).toBe('/home/dev/git');
    expect(expandHome('/opt/~/x', '/home/dev')).toBe('/opt/~/x');
  });
});
