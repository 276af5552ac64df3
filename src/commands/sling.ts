import { createContext } from '../core/backend.js';
import { performSling } from '../core/operations/sling.js';
import { output, success } from '../lib/output.js';

export interface SlingOptions {
  to?: string;
  formula?: string;
  self?: boolean;
  json?: boolean;
}

export async function slingCommand(workPath: string, options: SlingOptions): Promise<void> {
  const ctx = await createContext();
  if (!options.self && !options.to) {
    await ctx.sessions.checkAvailable();
  }

  const result = await performSling(ctx, {
    workPath,
    to: options.to,
    formula: options.formula,
    self: options.self,
  });

  if (options.json) {
    output(result, true);
    return;
  }

  success(result.hook === 'created'
    ? `Created hook: work/${result.work}/hook.md`
    : `Hook already exists: work/${result.work}/hook.md`);
  if (result.commit) success(`Committed changes: "${result.commit}"`);

  switch (result.mode) {
    case 'self':
      success('Hook ready in current workspace');
      console.log('\nTo start working, run this in your assistant session:');
      console.log('  rig hook');
      break;
    case 'crew':
      if (result.switchedBranch) success(`Checked out branch: ${result.branch}`);
      success(`Workspace ready: ${result.path}`);
      console.log(`\nTo start working, paste this into ${result.worker}'s assistant session:`);
      console.log('  rig hook');
      break;
    case 'polecat':
      success(`Workspace: ${result.path}`);
      success(`Session: ${result.session}`);
      success(`Branch: ${result.branch}`);
      if (result.instructionSent) {
        console.log(`\nSession started. Sent 'rig hook' to the assistant.`);
      } else {
        console.log(`\nSession started. Attach with 'rig switch ${result.session}' and run 'rig hook'.`);
      }
      break;
  }
}
