/**
 * Synaptic Quick Start
 *
 * Minimal example: an in-memory engine with a toy embedder, a short reasoning
 * trace with inferred relations, its causal chains and session statistics.
 */

import { MemoryEngine } from '@synaptic/core';
import { generateId, isoNow, synapticConfigSchema, type EmbeddingFunction } from '@synaptic/shared';

// Stands in for a real embedding model: one axis per keyword.
const keywords = ['deploy', 'rollback', 'latency'];
const embed: EmbeddingFunction = async (text) => {
  const lower = text.toLowerCase();
  const vector = keywords.map((k) => (lower.includes(k) ? 1 : 0));
  return [...vector, vector.some((v) => v > 0) ? 0 : 1];
};

async function main() {
  // 1. Create and initialize the engine
  const engine = await MemoryEngine.create({
    config: synapticConfigSchema.parse({
      embedding: { provider: 'none' },
      collections: { vectorSize: keywords.length + 1 },
    }),
    embed,
  });
  await engine.initialize();

  // 2. Record a short reasoning trace
  const session = 'quick-start';
  const steps = [
    { type: 'Observation', content: 'Latency doubled right after the deploy' },
    { type: 'Analytical', content: 'The deploy changed the connection pool size' },
    { type: 'Decision', content: 'Rollback the deploy and restore the old pool size' },
  ];
  const ids: string[] = [];
  for (const step of steps) {
    const { thought, relations } = await engine.inference.saveWithRelations(session, {
      id: generateId(),
      origin: 'Reactive',
      confidence: 0.9,
      relevance: 0.8,
      timestamp: isoNow(),
      ...step,
    });
    ids.push(thought.id);
    console.log(`[${thought.type}] ${thought.content}`);
    for (const r of relations) console.log(`    ${r.type} from ${r.sourceThoughtId} (${r.strength.toFixed(2)})`);
  }
  console.log('');

  // 3. Follow the causal chains from the first observation
  console.log('--- Causal Chains ---');
  for (const chain of await engine.chains.findCausalChains(session, ids[0])) {
    console.log('  ' + chain.map((t) => t.type).join(' -> '));
  }
  console.log('');

  // 4. Session statistics and the memory map
  console.log('--- Statistics ---');
  console.log(JSON.stringify(await engine.analyzer.getStats(session), null, 2));
  console.log('');
  console.log(await engine.layers.getMemoryMap());

  await engine.close();
}

main().catch(console.error);
