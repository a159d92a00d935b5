import { Command } from 'commander';
import { parsePositiveInt, withEngine } from '../context.js';
import { formatChain, formatNeuroStats, formatThoughtLine } from '../output/formatter.js';

export const thoughtsCommand = new Command('thoughts')
  .description('Read the thoughts of a session');

thoughtsCommand
  .command('list')
  .description('List the most recent thoughts, newest first')
  .argument('<session>', 'Session id')
  .option('-n, --limit <n>', 'How many', parsePositiveInt, 10)
  .action(async (session: string, options: { limit: number }, command: Command) => {
    await withEngine(command, async (engine) => {
      const thoughts = await engine.store.getRecentThoughts(session, options.limit);
      if (thoughts.length === 0) console.log(`No thoughts in session ${session}.`);
      for (const t of thoughts) console.log(formatThoughtLine(t));
    });
  });

thoughtsCommand
  .command('search')
  .description('Semantic search, or substring match without embeddings')
  .argument('<session>', 'Session id')
  .argument('<query>', 'Search text')
  .option('-n, --limit <n>', 'Maximum results', parsePositiveInt, 20)
  .action(async (session: string, query: string, options: { limit: number }, command: Command) => {
    await withEngine(command, async (engine) => {
      const thoughts = await engine.store.searchThoughts(session, query, options.limit);
      if (thoughts.length === 0) console.log('No matches.');
      for (const t of thoughts) console.log(formatThoughtLine(t));
    });
  });

thoughtsCommand
  .command('chains')
  .description('Causal chains starting at a thought')
  .argument('<session>', 'Session id')
  .argument('<thought-id>', 'Start thought')
  .option('-d, --depth <n>', 'Maximum thoughts per chain (1-10)', parsePositiveInt)
  .action(async (session: string, thoughtId: string, options: { depth?: number }, command: Command) => {
    await withEngine(command, async (engine) => {
      const depth = options.depth ?? engine.config.causal.defaultMaxDepth;
      const chains = await engine.chains.findCausalChains(session, thoughtId, depth);
      if (chains.length === 0) console.log('No chains.');
      chains.forEach((chain, i) => console.log(`${i + 1}. ${formatChain(chain)}`));
    });
  });

thoughtsCommand
  .command('stats')
  .description('Counts by type and causal chain statistics')
  .argument('<session>', 'Session id')
  .option('--json', 'Output as JSON')
  .action(async (session: string, options: { json?: boolean }, command: Command) => {
    await withEngine(command, async (engine) => {
      const stats = await engine.analyzer.getStats(session, {
        sampleSize: engine.config.causal.statsSampleSize,
      });
      console.log(options.json ? JSON.stringify(stats, null, 2) : formatNeuroStats(stats));
    });
  });
