/**
 * Environment for the git and tmux child processes.
 *
 * Shells started from GUI apps miss the Homebrew and Nix bin directories,
 * so those are put in front of PATH. Output is forced to the C locale
 * because porcelain parsing and error matching expect English text.
 */
export function toolEnv(base: NodeJS.ProcessEnv = process.env): { env: Record<string, string> } {
  const extraDirs = ['/opt/homebrew/bin', '/opt/homebrew/sbin', '/usr/local/bin'];
  if (base.HOME) {
    extraDirs.push(`${base.HOME}/.nix-profile/bin`);
  }

  return {
    env: {
      PATH: [...extraDirs, base.PATH].filter(Boolean).join(':'),
      LC_ALL: 'C',
      GIT_TERMINAL_PROMPT: '0',
    },
  };
}

export const execaEnv = toolEnv();
