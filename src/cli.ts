#!/usr/bin/env node
import { Command, CommanderError } from 'commander';
import { RigError } from './lib/errors.js';
import { outputError } from './lib/output.js';

interface JsonOption {
  json?: boolean;
}

const program = new Command();

program
  .name('rig')
  .description('Repository sessions, crew worktrees and work assignment on top of tmux and git')
  .version('0.1.0');

program
  .command('up')
  .description('Bring up a rig (creates the session or switches to it)')
  .argument('[name]', 'Repository name (inferred when omitted)')
  .option('--json', 'Output as JSON')
  .action(async (name: string | undefined, options: JsonOption) => {
    const { upCommand } = await import('./commands/up.js');
    await upCommand(name, options);
  });

program
  .command('down')
  .description('Shut down a rig session')
  .argument('[name]', 'Repository name (inferred when omitted)')
  .option('--json', 'Output as JSON')
  .action(async (name: string | undefined, options: JsonOption) => {
    const { downCommand } = await import('./commands/up.js');
    await downCommand(name, options);
  });

program
  .command('status')
  .alias('ls')
  .description('Show active rigs and crew')
  .option('--json', 'Output as JSON')
  .action(async (options: JsonOption) => {
    const { statusCommand } = await import('./commands/status.js');
    await statusCommand(options);
  });

program
  .command('list')
  .description('List repositories under the repos root')
  .option('--json', 'Output as JSON')
  .action(async (options: JsonOption) => {
    const { listCommand } = await import('./commands/list.js');
    await listCommand(options);
  });

program
  .command('switch')
  .description('Switch to a rig or crew session')
  .argument('<name>', 'Session name')
  .action(async (name: string) => {
    const { switchCommand } = await import('./commands/switch.js');
    await switchCommand(name);
  });

program
  .command('at')
  .description('Attach to a tmux session (the default session when no name is given)')
  .argument('[name]', 'Session name')
  .action(async (name: string | undefined) => {
    const { switchCommand } = await import('./commands/switch.js');
    await switchCommand(name);
  });

program
  .command('killall')
  .description('Shut down all rigs (add --crew to include crew)')
  .option('--crew', 'Kill rig and crew sessions')
  .option('--crew-only', 'Kill only crew sessions')
  .option('--json', 'Output as JSON')
  .action(async (options: { crew?: boolean; crewOnly?: boolean; json?: boolean }) => {
    const { killallCommand } = await import('./commands/killall.js');
    await killallCommand(options);
  });

const crew = program
  .command('crew')
  .description('Manage crew workspaces');

crew
  .command('add')
  .description('Create a crew workspace and session')
  .argument('<name>', 'Crew member name')
  .option('--rig <repo>', 'Repository (inferred when omitted)')
  .option('--json', 'Output as JSON')
  .action(async (name: string, options: { rig?: string; json?: boolean }) => {
    const { crewAddCommand } = await import('./commands/crew.js');
    await crewAddCommand(name, options);
  });

crew
  .command('start')
  .description('Attach to an existing crew workspace')
  .argument('<name>', 'Crew member name')
  .option('--rig <repo>', 'Repository (inferred when omitted)')
  .option('--json', 'Output as JSON')
  .action(async (name: string, options: { rig?: string; json?: boolean }) => {
    const { crewStartCommand } = await import('./commands/crew.js');
    await crewStartCommand(name, options);
  });

crew
  .command('remove')
  .alias('rm')
  .description('Remove a crew workspace, its session and optionally its branch')
  .argument('<name>', 'Crew member name')
  .option('--rig <repo>', 'Repository (inferred when omitted)')
  .option('--json', 'Output as JSON')
  .action(async (name: string, options: { rig?: string; json?: boolean }) => {
    const { crewRemoveCommand } = await import('./commands/crew.js');
    await crewRemoveCommand(name, options);
  });

crew
  .command('ls')
  .alias('list')
  .description('List crew workspaces')
  .argument('[name]', 'Only show workspaces with this name')
  .option('--json', 'Output as JSON')
  .action(async (name: string | undefined, options: JsonOption) => {
    const { crewListCommand } = await import('./commands/crew.js');
    await crewListCommand(name, options);
  });

crew
  .command('status')
  .description('Show active crew sessions')
  .option('--json', 'Output as JSON')
  .action(async (options: JsonOption) => {
    const { crewStatusCommand } = await import('./commands/crew.js');
    await crewStatusCommand(options);
  });

crew
  .command('prune')
  .description('Remove all polecat workspaces')
  .option('--json', 'Output as JSON')
  .action(async (options: JsonOption) => {
    const { crewPruneCommand } = await import('./commands/crew.js');
    await crewPruneCommand(options);
  });

const work = program
  .command('work')
  .description('Manage work items');

work
  .command('create')
  .description('Create a work directory and feature branch')
  .argument('<name>', 'Work item name')
  .option('--json', 'Output as JSON')
  .action(async (name: string, options: JsonOption) => {
    const { workCreateCommand } = await import('./commands/work.js');
    await workCreateCommand(name, options);
  });

work
  .command('status')
  .description('Show work in progress across all rigs')
  .option('--json', 'Output as JSON')
  .action(async (options: JsonOption) => {
    const { workStatusCommand } = await import('./commands/work.js');
    await workStatusCommand(options);
  });

program
  .command('hook')
  .description('Show the hook for the current work')
  .option('--json', 'Output as JSON')
  .action(async (options: JsonOption) => {
    const { hookCommand } = await import('./commands/hook.js');
    await hookCommand(options);
  });

program
  .command('sling')
  .description('Assign work to a crew member, a new polecat, or yourself')
  .argument('<work-path>', 'Work item, e.g. work/build-frontend')
  .option('--to <name>', 'Assign to an existing crew member')
  .option('--formula <name>', 'Formula to use')
  .option('--self', 'Work on it yourself in the current session')
  .option('--json', 'Output as JSON')
  .action(async (workPath: string, options: { to?: string; formula?: string; self?: boolean; json?: boolean }) => {
    const { slingCommand } = await import('./commands/sling.js');
    await slingCommand(workPath, options);
  });

// Error handling
program.exitOverride();

async function main(): Promise<void> {
  const json = process.argv.includes('--json');
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof RigError) {
      outputError(err, json);
      process.exit(err.exitCode);
    }
    if (err instanceof CommanderError) {
      // commander has already printed help, version or usage errors
      process.exit(err.exitCode);
    }
    outputError(err, json);
    process.exit(1);
  }
}

await main();
