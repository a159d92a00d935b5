import { Command } from 'commander';
import { parsePositiveInt, withEngine } from '../context.js';
import { formatAutoHeal, formatHealthReports } from '../output/formatter.js';

export const healthCommand = new Command('health')
  .description('Check collection dimensions against the expected vector size')
  .option('-d, --dimension <n>', 'Expected vector size (defaults to collections.vectorSize)', parsePositiveInt)
  .option('--heal', 'Recreate mismatched collections empty at the expected size')
  .option('-y, --yes', 'Confirm --heal; the contents of healed collections are lost')
  .action(async (options: { dimension?: number; heal?: boolean; yes?: boolean }, command: Command) => {
    if (options.heal && !options.yes) {
      console.error('Refusing to heal without --yes: healed collections lose all their points');
      process.exitCode = 1;
      return;
    }
    await withEngine(command, async (engine) => {
      const expected = options.dimension ?? engine.config.collections.vectorSize;
      const reports = await engine.admin.healthCheck(expected);
      console.log(formatHealthReports(reports));

      if (options.heal) {
        console.log('');
        console.log(formatAutoHeal(await engine.admin.autoHeal(expected, { confirm: true })));
      } else if (reports.some((r) => !r.isHealthy)) {
        process.exitCode = 1;
      }
    });
  });
