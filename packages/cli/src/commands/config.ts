import { Command } from 'commander';
import { CONFIG_FILE_NAMES, ConfigManager } from '@synaptic/core';
import type { GlobalOptions } from '../context.js';

export const configCommand = new Command('config')
  .description('Inspect configuration');

configCommand
  .command('show')
  .description('Show the effective configuration')
  .action(async (_options: object, command: Command) => {
    const { config } = command.optsWithGlobals<GlobalOptions>();
    const mgr = new ConfigManager();
    const loaded = await mgr.load(config ? { configPath: config } : {});
    const { apiKey, ...embedding } = loaded.embedding;
    console.log(`# source: ${mgr.getSourcePath() ?? '(defaults and environment)'}`);
    console.log(JSON.stringify({ ...loaded, embedding: { ...embedding, ...(apiKey ? { apiKey: '***' } : {}) } }, null, 2));
  });

configCommand
  .command('path')
  .description('Show config file names and environment variables')
  .action(() => {
    console.log('Config files searched upward from the working directory (first found wins):');
    CONFIG_FILE_NAMES.forEach((name, i) => console.log(`  ${i + 1}. ${name}`));
    console.log('');
    console.log('Environment variables:');
    console.log('  SYNAPTIC_BACKEND');
    console.log('  SYNAPTIC_LANCEDB_PATH');
    console.log('  SYNAPTIC_VECTOR_SIZE');
    console.log('  SYNAPTIC_EMBEDDING_PROVIDER');
    console.log('  SYNAPTIC_OLLAMA_URL');
    console.log('  SYNAPTIC_OPENAI_API_KEY');
    console.log('  SYNAPTIC_LOG_LEVEL');
    console.log('  SYNAPTIC_ADMIN_DB');
  });
