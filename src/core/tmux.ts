import { execa, ExecaError } from 'execa';
import { RigError, TmuxNotFoundError } from '../lib/errors.js';
import { execaEnv } from '../lib/env.js';
import { echoCommand } from '../lib/shell.js';
import { warn } from '../lib/output.js';

export interface SessionLayout {
  workingDir: string;
  /** Window name in control mode, e.g. `👤 myapp@tracy`. */
  title: string;
  /** Line echoed at the top of the terminal pane. */
  banner: string;
}

export interface SessionHandle {
  name: string;
  /** Pane running the coding assistant; target for sendKeystrokes. */
  assistantPane: string;
}

/** Terminal session operations, addressed by (unnormalized) session name. */
export interface SessionBackend {
  checkAvailable(): Promise<void>;
  exists(name: string): Promise<boolean>;
  list(): Promise<string[]>;
  create(name: string, layout: SessionLayout): Promise<SessionHandle>;
  kill(name: string): Promise<void>;
  attach(name: string): Promise<void>;
  /** Attach to tmux's default session; fails when already inside tmux. */
  attachDefault(): Promise<void>;
  currentSessionName(): Promise<string | null>;
  /** Type `text` literally into `target` without pressing Enter. */
  sendKeystrokes(target: string, text: string): Promise<void>;
  pressEnter(target: string): Promise<void>;
}

/**
 * tmux silently turns `.` and `:` into `_` in session names, so every name
 * is normalized before it is passed to tmux or compared with tmux output.
 */
export function normalizeSessionName(name: string): string {
  return name.replace(/[.:]/g, '_');
}

export function isInsideTmux(env: NodeJS.ProcessEnv = process.env): boolean {
  return !!env.TMUX;
}

/**
 * Check if a tmux error is a benign "not found" error (target already gone).
 */
function isTmuxNotFoundError(err: unknown): boolean {
  if (!(err instanceof ExecaError)) return false;
  const msg = String(err.stderr ?? '').toLowerCase();
  return msg.includes("can't find") ||
    msg.includes('no server running') ||
    msg.includes('session not found') ||
    msg.includes('no such');
}

async function tmux(args: string[]): Promise<string> {
  const result = await execa('tmux', args, execaEnv);
  return result.stdout.trim();
}

async function cosmetic(args: string[]): Promise<void> {
  try {
    await tmux(args);
  } catch (err) {
    warn(`tmux ${args[0]} failed: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export interface TmuxOptions {
  controlMode: boolean;
  assistantCommand: string;
}

export class TmuxSessionBackend implements SessionBackend {
  constructor(private readonly options: TmuxOptions) {}

  async checkAvailable(): Promise<void> {
    try {
      await tmux(['-V']);
    } catch {
      throw new TmuxNotFoundError();
    }
  }

  async exists(name: string): Promise<boolean> {
    try {
      // '=' prefix for exact matching; tmux otherwise accepts name prefixes
      await tmux(['has-session', '-t', `=${normalizeSessionName(name)}`]);
      return true;
    } catch {
      return false;
    }
  }

  async list(): Promise<string[]> {
    try {
      const out = await tmux(['list-sessions', '-F', '#{session_name}']);
      return out.split('\n').filter(Boolean);
    } catch (err) {
      if (isTmuxNotFoundError(err)) return [];
      throw err;
    }
  }

  async create(name: string, layout: SessionLayout): Promise<SessionHandle> {
    const session = normalizeSessionName(name);
    const assistantPane = this.options.controlMode
      ? await this.createSplitLayout(session, layout)
      : await this.createWindowLayout(session, layout);
    return { name: session, assistantPane };
  }

  private async createWindowLayout(session: string, layout: SessionLayout): Promise<string> {
    const assistantPane = await tmux([
      'new-session', '-d',
      '-s', session,
      '-n', 'assistant',
      '-c', layout.workingDir,
      '-P', '-F', '#{pane_id}',
    ]);

    try {
      await this.sendLine(assistantPane, this.options.assistantCommand);
      const terminalPane = await tmux([
        'new-window',
        '-t', `=${session}`,
        '-n', 'terminal',
        '-c', layout.workingDir,
        '-P', '-F', '#{pane_id}',
      ]);
      await this.sendLine(terminalPane, echoCommand(layout.banner));
      await this.sendLine(terminalPane, 'git status');
      await tmux(['select-window', '-t', assistantPane]);
    } catch (err) {
      await this.discard(session);
      throw err;
    }

    return assistantPane;
  }

  private async createSplitLayout(session: string, layout: SessionLayout): Promise<string> {
    const assistantPane = await tmux([
      'new-session', '-d',
      '-s', session,
      '-n', layout.title,
      '-c', layout.workingDir,
      '-P', '-F', '#{pane_id}',
    ]);

    try {
      await tmux(['set-window-option', '-t', assistantPane, 'automatic-rename', 'off']);
      const terminalPane = await tmux([
        'split-window', '-h',
        '-t', assistantPane,
        '-c', layout.workingDir,
        '-P', '-F', '#{pane_id}',
      ]);

      await cosmetic(['select-pane', '-t', assistantPane, '-T', 'Assistant']);
      await cosmetic(['select-pane', '-t', terminalPane, '-T', 'Terminal']);
      await cosmetic(['resize-pane', '-t', assistantPane, '-x', '70%']);
      await cosmetic(['select-pane', '-t', assistantPane]);

      await this.sendLine(assistantPane, this.options.assistantCommand);
      await this.sendLine(terminalPane, echoCommand(layout.banner));
      await this.sendLine(terminalPane, 'git status');
    } catch (err) {
      await this.discard(session);
      throw err;
    }

    return assistantPane;
  }

  /** Remove a half-built session so a failed create leaves nothing behind. */
  private async discard(session: string): Promise<void> {
    try {
      await this.kill(session);
    } catch (err) {
      warn(`Could not remove partial session ${session}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  async kill(name: string): Promise<void> {
    try {
      await tmux(['kill-session', '-t', `=${normalizeSessionName(name)}`]);
    } catch (err) {
      if (isTmuxNotFoundError(err)) return;
      throw err;
    }
  }

  async attach(name: string): Promise<void> {
    const target = `=${normalizeSessionName(name)}`;
    if (isInsideTmux()) {
      await execa('tmux', ['switch-client', '-t', target], { ...execaEnv, stdio: 'inherit' });
      return;
    }
    const args = ['attach-session', '-t', target];
    if (this.options.controlMode) args.unshift('-CC');
    await execa('tmux', args, { ...execaEnv, stdio: 'inherit' });
  }

  async attachDefault(): Promise<void> {
    if (isInsideTmux()) {
      throw new RigError('Already in a tmux session', 'ALREADY_ATTACHED');
    }
    const args = ['attach-session'];
    if (this.options.controlMode) args.unshift('-CC');
    await execa('tmux', args, { ...execaEnv, stdio: 'inherit' });
  }

  async currentSessionName(): Promise<string | null> {
    if (!isInsideTmux()) return null;
    try {
      const name = await tmux(['display-message', '-p', '#S']);
      return name || null;
    } catch (err) {
      if (isTmuxNotFoundError(err)) return null;
      throw err;
    }
  }

  async sendKeystrokes(target: string, text: string): Promise<void> {
    await tmux(['send-keys', '-t', target, '-l', text]);
  }

  async pressEnter(target: string): Promise<void> {
    // Enter without -l sends CR, which submits in Ink-based TUIs
    await tmux(['send-keys', '-t', target, 'Enter']);
  }

  private async sendLine(target: string, line: string): Promise<void> {
    await this.sendKeystrokes(target, line);
    await this.pressEnter(target);
  }
}
