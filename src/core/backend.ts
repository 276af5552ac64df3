import type { Config } from '../types/config.js';
import { loadConfig } from './config.js';
import { FileWorkerLock, type WorkerLock } from './lock.js';
import { ReadlinePrompter, type Prompter } from './prompt.js';
import { TmuxSessionBackend, type SessionBackend } from './tmux.js';
import { GitWorktreeBackend, type WorktreeBackend } from './worktree.js';

/**
 * Everything an operation touches outside its own arguments. Commands
 * build one per invocation; tests hand in fakes.
 */
export interface RigContext {
  config: Readonly<Config>;
  git: WorktreeBackend;
  sessions: SessionBackend;
  prompter: Prompter;
  lock: WorkerLock;
  cwd: string;
}

export async function createContext(): Promise<RigContext> {
  const config = await loadConfig();
  return {
    config,
    git: new GitWorktreeBackend(),
    sessions: new TmuxSessionBackend({
      controlMode: config.controlMode,
      assistantCommand: config.assistantCommand,
    }),
    prompter: new ReadlinePrompter(),
    lock: new FileWorkerLock(config.lockDir),
    cwd: process.cwd(),
  };
}
