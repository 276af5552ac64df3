import { createContext } from '../core/backend.js';
import { collectWorkStatus, performWorkCreate } from '../core/operations/work.js';
import { formatTable, output, success, workerEmoji, type Column } from '../lib/output.js';

export interface WorkOptions {
  json?: boolean;
}

export async function workCreateCommand(name: string, options: WorkOptions): Promise<void> {
  const ctx = await createContext();
  const result = await performWorkCreate(ctx, name);

  if (options.json) {
    output(result, true);
    return;
  }

  if (result.workExisted) {
    success('Skipped existing files, created missing ones');
  } else {
    success(`Created work directory: work/${name}/`);
  }
  success(result.branchExisted
    ? `Using existing branch: ${result.branch}`
    : `Created feature branch: ${result.branch}`);
  if (result.scaffold.formulaInstalled) success('Installed default formula: work/formula/build.md');
  if (result.commit) success(`Initial commit: "${result.commit}"`);

  console.log('\nNext steps:');
  console.log(`  1. Edit work/${name}/spec.md`);
  console.log(`  2. When ready: rig sling work/${name}`);
  console.log(`\nYou are now on branch: ${result.branch}`);
}

export async function workStatusCommand(options: WorkOptions): Promise<void> {
  const ctx = await createContext();
  const entries = await collectWorkStatus(ctx);

  if (options.json) {
    output({ work: entries }, true);
    return;
  }

  if (entries.length === 0) {
    console.log('No active work found\n');
    console.log('Create work with: rig work create <name>');
    console.log('Assign work with: rig sling work/<name>');
    return;
  }

  const columns: Column[] = [
    { header: 'Rig', key: 'repo' },
    { header: 'Work', key: 'work' },
    { header: 'Status', key: 'status' },
    { header: 'Assignee', key: 'assignee' },
    { header: 'Current Task', key: 'currentTask' },
  ];
  const rows = entries.map((e) => ({
    repo: e.repo,
    work: e.work,
    status: e.status,
    assignee: `${workerEmoji(e.polecat)} ${e.assignee}`,
    currentTask: e.currentTask ?? '',
  }));
  console.log(formatTable(rows, columns));
}
