import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { RigContext } from './core/backend.js';
import type { WorkerLock } from './core/lock.js';
import type { Prompter } from './core/prompt.js';
import { normalizeSessionName, type SessionBackend, type SessionHandle, type SessionLayout } from './core/tmux.js';
import type { WorktreeBackend, WorktreeInfo } from './core/worktree.js';
import { GitCommandError, NotGitRepoError, SessionNotFoundError } from './lib/errors.js';
import { pathExists } from './lib/fs.js';
import type { Config } from './types/config.js';

export function makeConfig(root: string, overrides?: Partial<Config>): Config {
  return {
    reposRoot: path.join(root, 'git'),
    workersRoot: path.join(root, 'crew'),
    defaultBranch: 'main',
    controlMode: false,
    assistantCommand: 'claude',
    defaultFormula: 'build',
    startupDelayMs: 0,
    keystrokeDelayMs: 0,
    lockDir: path.join(root, 'locks'),
    ...overrides,
  };
}

interface FakeRepo {
  branches: Set<string>;
  head: string;
  remoteHead: string | null;
  /** Linked worktrees: path → checked-out branch. */
  worktrees: Map<string, string>;
  /** Porcelain status returned by pendingChanges. */
  dirty: string;
  commits: string[];
}

export interface FakeRepoOptions {
  branches?: string[];
  head?: string;
  remoteHead?: string | null;
}

type GitMethod = keyof WorktreeBackend;

/**
 * In-memory git: branches and worktree registrations live in maps, while
 * worktree directories are created and deleted on disk so path checks
 * behave as they would against a real checkout.
 */
export class FakeWorktreeBackend implements WorktreeBackend {
  readonly repos = new Map<string, FakeRepo>();
  readonly calls: string[] = [];
  private readonly failures = new Map<GitMethod, Error>();

  async addRepo(dir: string, options: FakeRepoOptions = {}): Promise<FakeRepo> {
    const branches = options.branches ?? ['main'];
    const repo: FakeRepo = {
      branches: new Set(branches),
      head: options.head ?? branches[0] ?? 'main',
      remoteHead: options.remoteHead ?? null,
      worktrees: new Map(),
      dirty: '',
      commits: [],
    };
    await fs.mkdir(path.join(dir, '.git'), { recursive: true });
    this.repos.set(path.resolve(dir), repo);
    return repo;
  }

  repo(dir: string): FakeRepo {
    const repo = this.repos.get(path.resolve(dir));
    if (!repo) throw new Error(`no fake repo at ${dir}`);
    return repo;
  }

  /** Make every later call to `method` fail with `error`. */
  failOn(method: GitMethod, error: Error = new GitCommandError(method, 'injected failure')): void {
    this.failures.set(method, error);
  }

  private enter(method: GitMethod, ...args: string[]): void {
    this.calls.push([method, ...args].join(' '));
    const failure = this.failures.get(method);
    if (failure) throw failure;
  }

  /** Repository and worktree (or null for the main checkout) that own `dir`. */
  private owner(dir: string): { repoPath: string; repo: FakeRepo; worktree: string | null } | null {
    const target = path.resolve(dir);
    for (const [repoPath, repo] of this.repos) {
      for (const wt of repo.worktrees.keys()) {
        if (target === wt || target.startsWith(wt + path.sep)) return { repoPath, repo, worktree: wt };
      }
    }
    for (const [repoPath, repo] of this.repos) {
      if (target === repoPath || target.startsWith(repoPath + path.sep)) return { repoPath, repo, worktree: null };
    }
    return null;
  }

  private ownerRepo(dir: string): FakeRepo {
    const owner = this.owner(dir);
    if (!owner) throw new GitCommandError('status', 'not a git repository');
    return owner.repo;
  }

  private checkedOut(repo: FakeRepo, branch: string): boolean {
    return repo.head === branch || [...repo.worktrees.values()].includes(branch);
  }

  async branchExists(repoPath: string, branch: string): Promise<boolean> {
    this.enter('branchExists', repoPath, branch);
    return this.repo(repoPath).branches.has(branch);
  }

  async resolveDefaultRemoteBranch(repoPath: string): Promise<string | null> {
    this.enter('resolveDefaultRemoteBranch', repoPath);
    return this.repo(repoPath).remoteHead;
  }

  private async addWorktree(repoPath: string, worktreePath: string, branch: string): Promise<void> {
    const repo = this.repo(repoPath);
    const wt = path.resolve(worktreePath);
    if (repo.worktrees.has(wt)) {
      throw new GitCommandError('worktree add', `'${worktreePath}' already exists`);
    }
    await fs.mkdir(wt, { recursive: true });
    await fs.writeFile(path.join(wt, '.git'), `gitdir: ${repoPath}/.git/worktrees/${path.basename(wt)}\n`);
    // Tracked work files show up in the new checkout
    const work = path.join(repoPath, 'work');
    if (await pathExists(work)) {
      await fs.cp(work, path.join(wt, 'work'), { recursive: true });
    }
    repo.worktrees.set(wt, branch);
  }

  async createWorktree(repoPath: string, worktreePath: string, newBranch: string, fromBranch: string): Promise<void> {
    this.enter('createWorktree', repoPath, worktreePath, newBranch, fromBranch);
    const repo = this.repo(repoPath);
    if (repo.branches.has(newBranch)) {
      throw new GitCommandError('worktree add', `a branch named '${newBranch}' already exists`);
    }
    if (!repo.branches.has(fromBranch)) {
      throw new GitCommandError('worktree add', `invalid reference: ${fromBranch}`);
    }
    repo.branches.add(newBranch);
    await this.addWorktree(repoPath, worktreePath, newBranch);
  }

  async createWorktreeFromBranch(repoPath: string, worktreePath: string, branch: string): Promise<void> {
    this.enter('createWorktreeFromBranch', repoPath, worktreePath, branch);
    const repo = this.repo(repoPath);
    if (!repo.branches.has(branch)) {
      throw new GitCommandError('worktree add', `invalid reference: ${branch}`);
    }
    if (this.checkedOut(repo, branch)) {
      throw new GitCommandError('worktree add', `'${branch}' is already checked out`);
    }
    await this.addWorktree(repoPath, worktreePath, branch);
  }

  async removeWorktree(repoPath: string, worktreePath: string): Promise<void> {
    this.enter('removeWorktree', repoPath, worktreePath);
    const repo = this.repo(repoPath);
    const wt = path.resolve(worktreePath);
    if (!repo.worktrees.has(wt)) {
      throw new GitCommandError('worktree remove', `'${worktreePath}' is not a working tree`);
    }
    repo.worktrees.delete(wt);
    await fs.rm(wt, { recursive: true, force: true });
  }

  async pruneWorktrees(repoPath: string): Promise<void> {
    this.enter('pruneWorktrees', repoPath);
    const repo = this.repo(repoPath);
    for (const wt of [...repo.worktrees.keys()]) {
      try {
        await fs.access(wt);
      } catch {
        repo.worktrees.delete(wt);
      }
    }
  }

  async deleteBranch(repoPath: string, branch: string): Promise<void> {
    this.enter('deleteBranch', repoPath, branch);
    const repo = this.repo(repoPath);
    if (!repo.branches.has(branch)) {
      throw new GitCommandError('branch -D', `branch '${branch}' not found`);
    }
    if (this.checkedOut(repo, branch)) {
      throw new GitCommandError('branch -D', `cannot delete branch '${branch}' checked out`);
    }
    repo.branches.delete(branch);
  }

  async createBranch(repoPath: string, branch: string, fromBranch: string): Promise<void> {
    this.enter('createBranch', repoPath, branch, fromBranch);
    const repo = this.repo(repoPath);
    if (repo.branches.has(branch)) {
      throw new GitCommandError('checkout -b', `a branch named '${branch}' already exists`);
    }
    repo.branches.add(branch);
    repo.head = branch;
  }

  async currentBranch(dir: string): Promise<string> {
    this.enter('currentBranch', dir);
    const owner = this.owner(dir);
    if (!owner) throw new GitCommandError('branch --show-current', 'not a git repository');
    return owner.worktree === null ? owner.repo.head : owner.repo.worktrees.get(owner.worktree) ?? '';
  }

  async checkoutBranch(dir: string, branch: string): Promise<void> {
    this.enter('checkoutBranch', dir, branch);
    const owner = this.owner(dir);
    if (!owner) throw new GitCommandError('checkout', 'not a git repository');
    const { repo, worktree } = owner;
    if (!repo.branches.has(branch)) {
      throw new GitCommandError('checkout', `pathspec '${branch}' did not match`);
    }
    const current = worktree === null ? repo.head : repo.worktrees.get(worktree);
    if (current === branch) return;
    if (this.checkedOut(repo, branch)) {
      throw new GitCommandError('checkout', `'${branch}' is already checked out`);
    }
    if (worktree === null) {
      repo.head = branch;
    } else {
      repo.worktrees.set(worktree, branch);
    }
  }

  async repositoryRoot(dir: string): Promise<string> {
    this.enter('repositoryRoot', dir);
    const owner = this.owner(dir);
    if (!owner) throw new NotGitRepoError(dir);
    return owner.worktree ?? owner.repoPath;
  }

  async isRepository(dir: string): Promise<boolean> {
    this.enter('isRepository', dir);
    try {
      await fs.stat(path.join(dir, '.git'));
      return true;
    } catch {
      return false;
    }
  }

  async listWorktrees(repoPath: string): Promise<WorktreeInfo[]> {
    this.enter('listWorktrees', repoPath);
    const repo = this.repo(repoPath);
    return [
      { path: path.resolve(repoPath), branch: repo.head },
      ...[...repo.worktrees].map(([wt, branch]) => ({ path: wt, branch })),
    ];
  }

  async worktreeIsRegistered(repoPath: string, worktreePath: string): Promise<boolean> {
    this.enter('worktreeIsRegistered', repoPath, worktreePath);
    return this.repo(repoPath).worktrees.has(path.resolve(worktreePath));
  }

  /** Pending changes are tracked per repository, whichever checkout asks. */
  async pendingChanges(dir: string, pathspec: string): Promise<string> {
    this.enter('pendingChanges', dir, pathspec);
    return this.ownerRepo(dir).dirty;
  }

  async commit(dir: string, pathspecs: string[], message: string): Promise<void> {
    this.enter('commit', dir, ...pathspecs);
    const repo = this.ownerRepo(dir);
    repo.commits.push(message);
    repo.dirty = '';
  }
}

export interface SentKeys {
  target: string;
  text: string;
}

/** tmux stand-in; names are normalized the way tmux does it. */
export class FakeSessionBackend implements SessionBackend {
  readonly sessions = new Set<string>();
  readonly created: { name: string; layout: SessionLayout }[] = [];
  readonly attached: string[] = [];
  readonly keys: SentKeys[] = [];
  current: string | null = null;
  failCreate: Error | null = null;
  private paneCounter = 0;

  constructor(initial: string[] = []) {
    for (const name of initial) this.sessions.add(normalizeSessionName(name));
  }

  async checkAvailable(): Promise<void> {}

  async exists(name: string): Promise<boolean> {
    return this.sessions.has(normalizeSessionName(name));
  }

  async list(): Promise<string[]> {
    return [...this.sessions];
  }

  async create(name: string, layout: SessionLayout): Promise<SessionHandle> {
    if (this.failCreate) throw this.failCreate;
    const session = normalizeSessionName(name);
    if (this.sessions.has(session)) throw new Error(`duplicate session: ${session}`);
    this.sessions.add(session);
    this.created.push({ name: session, layout });
    this.paneCounter += 1;
    return { name: session, assistantPane: `%${this.paneCounter}` };
  }

  async kill(name: string): Promise<void> {
    this.sessions.delete(normalizeSessionName(name));
  }

  async attach(name: string): Promise<void> {
    const session = normalizeSessionName(name);
    if (!this.sessions.has(session)) throw new SessionNotFoundError(name);
    this.attached.push(session);
  }

  async attachDefault(): Promise<void> {
    this.attached.push('(default)');
  }

  async currentSessionName(): Promise<string | null> {
    return this.current;
  }

  async sendKeystrokes(target: string, text: string): Promise<void> {
    this.keys.push({ target, text });
  }

  async pressEnter(target: string): Promise<void> {
    this.keys.push({ target, text: 'Enter' });
  }
}

/** Answers confirmations from a fixed script, in order. */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];

  constructor(private readonly answers: boolean[] = []) {}

  answer(...answers: boolean[]): void {
    this.answers.push(...answers);
  }

  async confirm(question: string): Promise<boolean> {
    this.questions.push(question);
    const next = this.answers.shift();
    if (next === undefined) throw new Error(`unexpected prompt: ${question}`);
    return next;
  }
}

export class RecordingLock implements WorkerLock {
  readonly keys: string[] = [];

  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    this.keys.push(key);
    return fn();
  }
}

export interface TestRig {
  root: string;
  config: Config;
  git: FakeWorktreeBackend;
  sessions: FakeSessionBackend;
  prompter: ScriptedPrompter;
  lock: RecordingLock;
  ctx: RigContext;
}

/** A temp directory with `git/` and `crew/` roots and fake backends over it. */
export async function makeTestRig(overrides?: Partial<Config>): Promise<TestRig> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'rig-test-'));
  const config = makeConfig(root, overrides);
  await fs.mkdir(config.reposRoot, { recursive: true });
  await fs.mkdir(config.workersRoot, { recursive: true });

  const git = new FakeWorktreeBackend();
  const sessions = new FakeSessionBackend();
  const prompter = new ScriptedPrompter();
  const lock = new RecordingLock();
  const ctx: RigContext = { config, git, sessions, prompter, lock, cwd: root };
  return { root, config, git, sessions, prompter, lock, ctx };
}

export async function removeTestRig(rig: TestRig): Promise<void> {
  await fs.rm(rig.root, { recursive: true, force: true });
}
