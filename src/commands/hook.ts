import { createContext } from '../core/backend.js';
import { readCurrentHook } from '../core/operations/work.js';
import { output } from '../lib/output.js';

export interface HookOptions {
  json?: boolean;
}

export async function hookCommand(options: HookOptions): Promise<void> {
  const ctx = await createContext();
  const hook = await readCurrentHook(ctx);

  if (options.json) {
    output(hook, true);
    return;
  }
  console.log(`🪝 Hook: ${hook.work}\n`);
  process.stdout.write(hook.content);
}
