import { InvalidArgumentError, type Command } from 'commander';
import { MemoryEngine } from '@synaptic/core';
import { isDistanceMetric, isMemoryLayer, type DistanceMetric, type MemoryLayer } from '@synaptic/shared';

export type GlobalOptions = {
  config?: string;
};

/**
 * Builds an engine from the `--config` file (or the upward search), loads the
 * collection links and closes everything once `fn` settles.
 */
export async function withEngine<T>(command: Command, fn: (engine: MemoryEngine) => Promise<T>): Promise<T> {
  const { config } = command.optsWithGlobals<GlobalOptions>();
  const engine = await MemoryEngine.create(config ? { configPath: config } : {});
  try {
    await engine.admin.initialize();
    return await fn(engine);
  } finally {
    await engine.close();
  }
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('expected a positive integer');
  }
  return n;
}

export function parseDistance(value: string): DistanceMetric {
  if (!isDistanceMetric(value)) {
    throw new InvalidArgumentError('expected cosine, euclid, dot or manhattan');
  }
  return value;
}

export function parseLayer(value: string): MemoryLayer {
  if (!isMemoryLayer(value)) {
    throw new InvalidArgumentError('expected working, episodic, semantic, procedural or autobiographical');
  }
  return value;
}
