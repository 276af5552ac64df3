import { createContext } from '../core/backend.js';
import { performRigDown, performRigUp } from '../core/operations/rig.js';
import { info, output, success } from '../lib/output.js';

export interface RigCommandOptions {
  json?: boolean;
}

export async function upCommand(name: string | undefined, options: RigCommandOptions): Promise<void> {
  const ctx = await createContext();
  await ctx.sessions.checkAvailable();

  const result = await performRigUp(ctx, name);
  if (options.json) {
    output(result, true);
    return;
  }
  if (result.inferred) info(`Inferred rig: ${result.name}`);
  if (result.created) success(`Rig created: ${result.name}`);
}

export async function downCommand(name: string | undefined, options: RigCommandOptions): Promise<void> {
  const ctx = await createContext();
  await ctx.sessions.checkAvailable();

  const result = await performRigDown(ctx, name);
  if (options.json) {
    output(result, true);
    return;
  }
  if (result.inferred) info(`Inferred rig: ${result.name}`);
  success(`Rig shut down: ${result.name}`);
}
