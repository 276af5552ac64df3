import { createContext } from '../core/backend.js';
import { performAttach } from '../core/operations/rig.js';

/** `switch <name>` and `at [name]`; without a name, tmux's default session. */
export async function switchCommand(name: string | undefined): Promise<void> {
  const ctx = await createContext();
  await ctx.sessions.checkAvailable();
  await performAttach(ctx, name);
}
