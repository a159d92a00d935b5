#!/usr/bin/env node
import { Command } from 'commander';
import { getErrorMessage } from '@synaptic/shared';
import { collectionsCommand } from '../src/commands/collections.js';
import { healthCommand } from '../src/commands/health.js';
import { mapCommand } from '../src/commands/map.js';
import { snapshotCommand } from '../src/commands/snapshot.js';
import { layersCommand } from '../src/commands/layers.js';
import { thoughtsCommand } from '../src/commands/thoughts.js';
import { configCommand } from '../src/commands/config.js';

const program = new Command();

program
  .name('synaptic')
  .description('Synaptic - neuro-symbolic thought memory over vector collections')
  .version('0.1.0')
  .option('-c, --config <path>', 'Config file (skips the upward search)');

program.addCommand(collectionsCommand);
program.addCommand(healthCommand);
program.addCommand(mapCommand);
program.addCommand(snapshotCommand);
program.addCommand(layersCommand);
program.addCommand(thoughtsCommand);
program.addCommand(configCommand);

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${getErrorMessage(err)}`);
  process.exitCode = 1;
});
