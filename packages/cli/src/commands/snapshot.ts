import { Command } from 'commander';
import { withEngine } from '../context.js';
import { formatSnapshot } from '../output/formatter.js';

export const snapshotCommand = new Command('snapshot')
  .description('Capture collections, links and per-layer vector counts')
  .option('--json', 'Output as JSON')
  .action(async (options: { json?: boolean }, command: Command) => {
    await withEngine(command, async (engine) => {
      const snapshot = await engine.layers.createSnapshot();
      console.log(options.json ? JSON.stringify(snapshot, null, 2) : formatSnapshot(snapshot));
    });
  });
