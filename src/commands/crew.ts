import { createContext } from '../core/backend.js';
import { resolveRepository } from '../core/context.js';
import {
  performCrewAdd,
  performCrewRemove,
  performCrewStart,
  performPolecatPrune,
} from '../core/operations/crew.js';
import { collectSessionStatus, listWorkers } from '../core/status.js';
import {
  condensePath,
  formatState,
  formatTable,
  info,
  output,
  success,
  workerEmoji,
  type Column,
} from '../lib/output.js';

export interface CrewOptions {
  rig?: string;
  json?: boolean;
}

export async function crewAddCommand(name: string, options: CrewOptions): Promise<void> {
  const ctx = await createContext();
  await ctx.sessions.checkAvailable();
  const repo = await resolveRepository(ctx, options.rig);

  const result = await performCrewAdd(ctx, { repo, worker: name });
  if (options.json) {
    output(result, true);
    return;
  }
  if (result.outcome === 'created') {
    success(`Crew workspace created: ${result.path}`);
    success(`Session created: ${result.session}`);
  } else if (result.outcome === 'session-recreated') {
    success(`Session recreated: ${result.session}`);
  }
}

export async function crewStartCommand(name: string, options: CrewOptions): Promise<void> {
  const ctx = await createContext();
  await ctx.sessions.checkAvailable();
  const repo = await resolveRepository(ctx, options.rig);

  const result = await performCrewStart(ctx, { repo, worker: name });
  if (options.json) {
    output(result, true);
    return;
  }
  if (result.switchedBranch) success(`Switched to branch ${result.branch}`);
  if (result.sessionCreated) success(`Session created: ${result.session}`);
}

export async function crewRemoveCommand(name: string, options: CrewOptions): Promise<void> {
  const ctx = await createContext();
  await ctx.sessions.checkAvailable();
  const repo = await resolveRepository(ctx, options.rig);

  const result = await performCrewRemove(ctx, { repo, worker: name });
  if (options.json) {
    output(result, true);
    return;
  }
  if (result.killedSession) success(`Session killed: ${result.session}`);
  if (result.outcome === 'session-only') return;
  if (result.deletedBranch) success('Branch deleted');
  if (result.outcome === 'kept-directory') {
    info(`Left ${result.path} in place`);
    return;
  }
  if (result.removedParent) info(`Removed empty directory for ${repo}`);
  success(`Crew workspace removed: ${name} on ${repo}`);
}

export interface CrewListOptions {
  json?: boolean;
}

export async function crewListCommand(name: string | undefined, options: CrewListOptions): Promise<void> {
  const ctx = await createContext();
  const workers = await listWorkers(ctx, name);

  if (options.json) {
    output({ workers }, true);
    return;
  }

  if (workers.length === 0) {
    console.log(name ? `No workspaces found for: ${name}` : 'No crew workspaces found');
    console.log('\nCreate one with: rig crew add <name>');
    return;
  }

  const columns: Column[] = [
    { header: 'Rig', key: 'repo' },
    { header: 'Name', key: 'name' },
    { header: 'Branch', key: 'branch' },
    { header: 'Session', key: 'state', format: (v) => formatState(v === 'running' ? 'running' : 'stopped') },
  ];
  const rows = workers.map((w) => ({
    repo: w.repo,
    name: `${workerEmoji(w.polecat)} ${w.worker}`,
    branch: w.branch,
    state: w.state,
  }));
  console.log(formatTable(rows, columns));
}

export async function crewStatusCommand(options: CrewListOptions): Promise<void> {
  const ctx = await createContext();
  const { crew } = await collectSessionStatus(ctx);

  if (options.json) {
    output({ crew }, true);
    return;
  }

  console.log('👥 Active Crew Sessions\n');
  if (crew.length === 0) {
    console.log('  No active crew sessions');
    return;
  }
  for (const member of crew) {
    console.log(`  ${workerEmoji(member.polecat)} ${member.session}`);
    console.log(`      ${condensePath(member.path)}`);
    console.log(`      ${member.branch}`);
  }
}

export async function crewPruneCommand(options: CrewListOptions): Promise<void> {
  const ctx = await createContext();
  const result = await performPolecatPrune(ctx);

  if (options.json) {
    output(result, true);
    return;
  }
  if (result.found.length === 0) {
    console.log('No polecats found');
  } else if (result.cancelled) {
    console.log('Cancelled');
  } else {
    success(`Removed ${result.removed.length} polecat(s)`);
  }
}
