import os from 'node:os';
import path from 'node:path';

const RIG_DIR = '.rig';
const WORK_DIR = 'work';
const FORMULA_DIR = 'formula';
const FEATURE_PREFIX = 'feat/';

/** Separates repository and worker in a worker session name (`<repo>@<worker>`). */
export const SESSION_SEPARATOR = '@';

export function globalRigDir(): string {
  return path.join(os.homedir(), RIG_DIR);
}

export function globalConfigPath(): string {
  return path.join(globalRigDir(), 'config.yaml');
}

export function repoPath(reposRoot: string, repo: string): string {
  return path.join(reposRoot, repo);
}

export function workerRepoDir(workersRoot: string, repo: string): string {
  return path.join(workersRoot, repo);
}

export function workerPath(workersRoot: string, repo: string, worker: string): string {
  return path.join(workerRepoDir(workersRoot, repo), worker);
}

export function sessionName(repo: string, worker?: string): string {
  return worker === undefined ? repo : `${repo}${SESSION_SEPARATOR}${worker}`;
}

/**
 * Split a session name into its repository and worker parts.
 * Bare names are repository sessions.
 */
export function parseSessionName(name: string): { repo: string; worker: string | null } {
  const idx = name.indexOf(SESSION_SEPARATOR);
  if (idx === -1) return { repo: name, worker: null };
  return { repo: name.slice(0, idx), worker: name.slice(idx + 1) };
}

export function workBranchName(worker: string): string {
  return `${worker}/work`;
}

export function featureBranchName(workItem: string): string {
  return `${FEATURE_PREFIX}${workItem}`;
}

/** `feat/build-frontend` → `build-frontend`; null for any other branch. */
export function workItemFromBranch(branch: string): string | null {
  if (!branch.startsWith(FEATURE_PREFIX)) return null;
  const name = branch.slice(FEATURE_PREFIX.length);
  return name || null;
}

export function workRoot(root: string): string {
  return path.join(root, WORK_DIR);
}

export function workDir(root: string, workItem: string): string {
  return path.join(workRoot(root), workItem);
}

export function workDocPath(root: string, workItem: string, doc: string): string {
  return path.join(workDir(root, workItem), doc);
}

export function progressPath(root: string, workItem: string): string {
  return workDocPath(root, workItem, 'progress.md');
}

export function hookPath(root: string, workItem: string): string {
  return workDocPath(root, workItem, 'hook.md');
}

export function formulaDir(root: string): string {
  return path.join(workRoot(root), FORMULA_DIR);
}

export function formulaPath(root: string, formula: string): string {
  return path.join(formulaDir(root), `${formula}.md`);
}

/** Repository-relative pathspecs, always with forward slashes for git. */
export function workPathspec(workItem: string): string {
  return `${WORK_DIR}/${workItem}/`;
}

export function formulaPathspec(): string {
  return `${WORK_DIR}/${FORMULA_DIR}/`;
}

export function lockFilePath(lockDir: string, key: string): string {
  return path.join(lockDir, encodeURIComponent(key));
}

/** True when `child` lies strictly below `parent`. */
export function isDescendant(child: string, parent: string): boolean {
  const rel = path.relative(path.resolve(parent), path.resolve(child));
  return rel !== '' && !rel.startsWith('..') && !path.isAbsolute(rel);
}
