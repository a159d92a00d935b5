import { Command } from 'commander';
import { MEMORY_LAYERS, type MemoryLayer } from '@synaptic/shared';
import { parseLayer, withEngine } from '../context.js';
import { formatLayers, formatMemoryHealth } from '../output/formatter.js';

export const layersCommand = new Command('layers')
  .description('Work with the cognitive memory layers');

layersCommand
  .command('list')
  .description('Show each layer, its collections and vector count')
  .action(async (_options: object, command: Command) => {
    await withEngine(command, async (engine) => {
      const counts: Record<string, number> = {};
      for (const layer of MEMORY_LAYERS) {
        counts[layer] = await engine.layers.getLayerVectorCount(layer);
      }
      console.log(formatLayers(engine.layers.getLayerMappings(), counts));
    });
  });

layersCommand
  .command('init')
  .description('Create every collection the layers expect')
  .action(async (_options: object, command: Command) => {
    await withEngine(command, async (engine) => {
      await engine.initialize();
      console.log(formatMemoryHealth(await engine.layers.performHealthCheck()));
    });
  });

layersCommand
  .command('clear')
  .description('Empty every collection of a layer')
  .argument('<layer>', 'working, episodic, semantic, procedural or autobiographical', parseLayer)
  .option('-y, --yes', 'Confirm; every point in the layer is lost')
  .action(async (layer: MemoryLayer, options: { yes?: boolean }, command: Command) => {
    if (!options.yes) {
      console.error(`Refusing to clear ${layer} without --yes`);
      process.exitCode = 1;
      return;
    }
    await withEngine(command, async (engine) => {
      const cleared = await engine.layers.clearMemoryLayer(layer, { confirm: true });
      console.log(cleared ? `Cleared ${layer}` : `Cleared ${layer} with failures; see the log`);
      if (!cleared) process.exitCode = 1;
    });
  });
