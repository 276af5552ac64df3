import { createContext } from '../core/backend.js';
import { performKillAll, type KillScope } from '../core/operations/rig.js';
import { output, success } from '../lib/output.js';

export interface KillAllOptions {
  crew?: boolean;
  crewOnly?: boolean;
  json?: boolean;
}

export function killScope(options: KillAllOptions): KillScope {
  if (options.crewOnly) return 'crew';
  if (options.crew) return 'all';
  return 'rigs';
}

export async function killallCommand(options: KillAllOptions): Promise<void> {
  const ctx = await createContext();
  await ctx.sessions.checkAvailable();

  const result = await performKillAll(ctx, killScope(options));
  if (options.json) {
    output(result, true);
    return;
  }

  for (const session of result.killed) {
    console.log(`  Killed: ${session}`);
  }
  if (result.killed.length === 0) {
    console.log('No matching sessions to kill');
  } else {
    success(`Killed ${result.killed.length} session(s)`);
  }
}
