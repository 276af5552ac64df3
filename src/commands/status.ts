import { createContext } from '../core/backend.js';
import { collectSessionStatus, type SessionStatus } from '../core/status.js';
import { condensePath, output, workerEmoji } from '../lib/output.js';

export interface StatusOptions {
  json?: boolean;
}

function printEntry(entry: SessionStatus, emoji: string | null): void {
  const marker = entry.current ? '✓' : ' ';
  const label = emoji ? `${emoji} ${entry.session}` : entry.session;
  console.log(`  ${marker} ${label}`);
  console.log(`      ${condensePath(entry.path).padEnd(50)} 🌿 ${entry.branch}`);
}

export async function statusCommand(options: StatusOptions): Promise<void> {
  const ctx = await createContext();
  const report = await collectSessionStatus(ctx);

  if (options.json) {
    output(report, true);
    return;
  }

  console.log('🏗️  Active Rigs\n');
  if (report.rigs.length === 0) console.log('  No active rigs');
  for (const rig of report.rigs) printEntry(rig, null);

  console.log('\n👥 Crew\n');
  if (report.crew.length === 0) console.log('  No active crew');
  for (const member of report.crew) printEntry(member, workerEmoji(member.polecat));

  if (report.rigs.length === 0 && report.crew.length === 0) {
    console.log('\nStart a rig with: rig up <name>');
    console.log('Start crew with: rig crew add <name>');
  }
}
