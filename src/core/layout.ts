import { sessionName } from '../lib/paths.js';
import { workerEmoji } from '../lib/output.js';
import { isPolecat } from './polecat.js';
import type { SessionLayout } from './tmux.js';

export function rigLayout(repo: string, dir: string): SessionLayout {
  return {
    workingDir: dir,
    title: `🏗️  ${repo}`,
    banner: `# ${repo} terminal`,
  };
}

export function workerLayout(repo: string, worker: string, branch: string, dir: string): SessionLayout {
  return {
    workingDir: dir,
    title: `${workerEmoji(isPolecat(worker))} ${sessionName(repo, worker)}`,
    banner: `# ${worker} on ${repo} (branch: ${branch})`,
  };
}
