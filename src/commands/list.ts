import { createContext } from '../core/backend.js';
import { listRepositories } from '../core/status.js';
import { formatState, formatTable, output, type Column } from '../lib/output.js';

export interface ListOptions {
  json?: boolean;
}

export async function listCommand(options: ListOptions): Promise<void> {
  const ctx = await createContext();
  const repos = await listRepositories(ctx);

  if (options.json) {
    output({ repos }, true);
    return;
  }

  if (repos.length === 0) {
    console.log(`No git repos found in ${ctx.config.reposRoot}`);
    return;
  }

  const rows = repos.map((r) => ({ name: r.name, state: r.running ? 'running' : 'stopped' }));
  const columns: Column[] = [
    { header: 'Repo', key: 'name' },
    {
      header: 'Session',
      key: 'state',
      format: (v) => formatState(v === 'running' ? 'running' : 'stopped'),
    },
  ];
  console.log(formatTable(rows, columns));
  console.log(`\nTotal: ${repos.length} repos`);
}
