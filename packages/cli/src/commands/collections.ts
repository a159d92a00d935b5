import { Command } from 'commander';
import type { DistanceMetric } from '@synaptic/shared';
import { parseDistance, parsePositiveInt, withEngine } from '../context.js';
import { formatCollectionTable } from '../output/formatter.js';

export const collectionsCommand = new Command('collections')
  .description('Inspect and manage vector collections');

collectionsCommand
  .command('list')
  .description('List collections with their dimension and size')
  .option('--json', 'Output as JSON')
  .action(async (options: { json?: boolean }, command: Command) => {
    await withEngine(command, async (engine) => {
      const collections = await engine.admin.getAllCollections();
      console.log(options.json ? JSON.stringify(collections, null, 2) : formatCollectionTable(collections));
    });
  });

collectionsCommand
  .command('create')
  .description('Create an empty collection')
  .argument('<name>', 'Collection name')
  .option('-d, --dimension <n>', 'Vector size (defaults to collections.vectorSize)', parsePositiveInt)
  .option('--distance <metric>', 'cosine, euclid, dot or manhattan', parseDistance)
  .option('--purpose <text>', 'What the collection stores')
  .action(
    async (
      name: string,
      options: { dimension?: number; distance?: DistanceMetric; purpose?: string },
      command: Command,
    ) => {
      await withEngine(command, async (engine) => {
        const created = await engine.admin.createCollection(name, {
          ...(options.dimension ? { vectorSize: options.dimension } : {}),
          ...(options.distance ? { distance: options.distance } : {}),
          ...(options.purpose ? { purpose: options.purpose } : {}),
        });
        console.log(created ? `Created ${name}` : `${name} already exists`);
      });
    },
  );

collectionsCommand
  .command('delete')
  .description('Delete a collection and every point in it')
  .argument('<name>', 'Collection name')
  .option('-y, --yes', 'Confirm the deletion')
  .action(async (name: string, options: { yes?: boolean }, command: Command) => {
    if (!options.yes) {
      console.error(`Refusing to delete ${name} without --yes`);
      process.exitCode = 1;
      return;
    }
    await withEngine(command, async (engine) => {
      const deleted = await engine.admin.deleteCollection(name);
      console.log(deleted ? `Deleted ${name}` : `${name} does not exist`);
    });
  });
