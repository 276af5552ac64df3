import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import YAML from 'yaml';
import type { Config, ConfigFile } from '../types/config.js';
import { globalConfigPath } from '../lib/paths.js';
import { ConfigError } from '../lib/errors.js';
import { isMissingFileError } from '../lib/fs.js';

export function defaultConfig(home: string = os.homedir()): Config {
  return {
    reposRoot: path.join(home, 'git'),
    workersRoot: path.join(home, 'crew'),
    defaultBranch: 'main',
    controlMode: false,
    assistantCommand: 'claude',
    defaultFormula: 'build',
    startupDelayMs: 2000,
    keystrokeDelayMs: 100,
    lockDir: path.join(os.tmpdir(), 'rig-locks'),
  };
}

const STRING_KEYS = [
  'reposRoot',
  'workersRoot',
  'defaultBranch',
  'assistantCommand',
  'defaultFormula',
  'lockDir',
] as const;
const NUMBER_KEYS = ['startupDelayMs', 'keystrokeDelayMs'] as const;

function parseConfigFile(raw: string, file: string): ConfigFile {
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (err) {
    throw new ConfigError(file, err instanceof Error ? err.message : String(err));
  }
  if (parsed === null || parsed === undefined) return {};
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError(file, 'expected a mapping at the top level');
  }

  const source = new Map<string, unknown>(Object.entries(parsed));
  const result: ConfigFile = {};

  for (const key of STRING_KEYS) {
    const value = source.get(key);
    if (value === undefined) continue;
    if (typeof value !== 'string' || value === '') {
      throw new ConfigError(file, `${key} must be a non-empty string`);
    }
    result[key] = value;
  }

  for (const key of NUMBER_KEYS) {
    const value = source.get(key);
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      throw new ConfigError(file, `${key} must be a non-negative number`);
    }
    result[key] = value;
  }

  const controlMode = source.get('controlMode');
  if (controlMode !== undefined) {
    if (typeof controlMode !== 'boolean') {
      throw new ConfigError(file, 'controlMode must be true or false');
    }
    result.controlMode = controlMode;
  }

  return result;
}

function envOverrides(env: NodeJS.ProcessEnv): ConfigFile {
  const overrides: ConfigFile = {};
  if (env.RIGS_BASE) overrides.reposRoot = env.RIGS_BASE;
  if (env.CREW_BASE) overrides.workersRoot = env.CREW_BASE;
  if (env.RIG_DEFAULT_BRANCH) overrides.defaultBranch = env.RIG_DEFAULT_BRANCH;
  if (env.RIG_USE_CC !== undefined) overrides.controlMode = env.RIG_USE_CC === 'true';
  return overrides;
}

export function expandHome(p: string, home: string): string {
  if (p === '~') return home;
  if (p.startsWith('~/')) return path.join(home, p.slice(2));
  return p;
}

/**
 * Build the process-wide configuration: defaults, then the YAML config
 * file (if any), then environment variables. The result is frozen.
 */
export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<Readonly<Config>> {
  const home = env.HOME || os.homedir();
  const cfgPath = env.RIG_CONFIG ? expandHome(env.RIG_CONFIG, home) : globalConfigPath();

  let fromFile: ConfigFile = {};
  try {
    const raw = await fs.readFile(cfgPath, 'utf-8');
    fromFile = parseConfigFile(raw, cfgPath);
  } catch (err) {
    if (!isMissingFileError(err)) {
      throw err;
    }
  }

  const merged: Config = {
    ...defaultConfig(home),
    ...fromFile,
    ...envOverrides(env),
  };

  return Object.freeze({
    ...merged,
    reposRoot: path.resolve(expandHome(merged.reposRoot, home)),
    workersRoot: path.resolve(expandHome(merged.workersRoot, home)),
    lockDir: path.resolve(expandHome(merged.lockDir, home)),
  });
}
