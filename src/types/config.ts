export interface Config {
  /** Directory holding the repositories ("rigs"). */
  reposRoot: string;
  /** Directory holding worker worktrees as `<repo>/<worker>`. */
  workersRoot: string;
  /** Base branch tried after the remote's default branch. */
  defaultBranch: string;
  /** tmux control mode (`tmux -CC`) with a single split window. */
  controlMode: boolean;
  /** Command started in the assistant pane of every session. */
  assistantCommand: string;
  defaultFormula: string;
  /** Wait before typing into a new polecat session. */
  startupDelayMs: number;
  keystrokeDelayMs: number;
  lockDir: string;
}

/** Shape accepted in config.yaml; every key is optional. */
export type ConfigFile = Partial<Config>;
