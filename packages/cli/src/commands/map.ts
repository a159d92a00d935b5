import { Command } from 'commander';
import { withEngine } from '../context.js';

export const mapCommand = new Command('map')
  .description('Print the memory map: collections by role and their links')
  .action(async (_options: object, command: Command) => {
    await withEngine(command, async (engine) => {
      console.log(await engine.layers.getMemoryMap());
    });
  });
