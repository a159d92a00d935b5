import { describe, it, expect, beforeEach } from 'vitest';
import { ValidationError } from '@synaptic/shared';
import { InMemoryVectorBackend, ThoughtStore } from '@synaptic/store';
import { CausalChainFinder, clampDepth } from '../src/causal-chain-finder.js';
import { link, makeThought, uuid } from './helpers.js';

let store: ThoughtStore;
let finder: CausalChainFinder;

beforeEach(async () => {
  store = new ThoughtStore({ backend: new InMemoryVectorBackend(), vectorSize: 2 });
  finder = new CausalChainFinder(store);
  await store.saveThoughts('s1', [1, 2, 3, 4].map((n) => makeThought(n)));
});

async function chainIds(startId: string, maxDepth?: number): Promise<string[][]> {
  const chains = await finder.findCausalChains('s1', startId, maxDepth);
  return chains.map((chain) => chain.map((t) => t.id));
}

describe('CausalChainFinder', () => {
  it('follows a linear chain to its end', async () => {
    await store.saveRelation('s1', link(1, 1, 2));
    await store.saveRelation('s1', link(2, 2, 3));

    expect(await chainIds(uuid(1))).toEqual([[uuid(1), uuid(2), uuid(3)]]);
  });

  it('reports one chain per branch, in relation creation order', async () => {
    await store.saveRelation('s1', link(2, 1, 3));
    await store.saveRelation('s1', link(1, 1, 2));

    expect(await chainIds(uuid(1))).toEqual([
      [uuid(1), uuid(2)],
      [uuid(1), uuid(3)],
    ]);
  });

  it('stops at a cycle', async () => {
    await store.saveRelation('s1', link(1, 1, 2));
    await store.saveRelation('s1', link(2, 2, 1));

    expect(await chainIds(uuid(1))).toEqual([[uuid(1), uuid(2)]]);
  });

  it('truncates chains at maxDepth thoughts', async () => {
    await store.saveRelation('s1', link(1, 1, 2));
    await store.saveRelation('s1', link(2, 2, 3));
    await store.saveRelation('s1', link(3, 3, 4));

    expect(await chainIds(uuid(1), 2)).toEqual([[uuid(1), uuid(2)]]);
  });

  it('walks a diamond through both branches', async () => {
    await store.saveRelation('s1', link(1, 1, 2));
    await store.saveRelation('s1', link(2, 1, 3));
    await store.saveRelation('s1', link(3, 2, 4));
    await store.saveRelation('s1', link(4, 3, 4));

    expect(await chainIds(uuid(1))).toEqual([
      [uuid(1), uuid(2), uuid(4)],
      [uuid(1), uuid(3), uuid(4)],
    ]);
  });

  it('returns nothing for an isolated or unknown start', async () => {
    expect(await chainIds(uuid(4))).toEqual([]);
    expect(await chainIds(uuid(77))).toEqual([]);
  });

  it('rejects a start id that is not a UUID', async () => {
    await expect(finder.findCausalChains('s1', 'not-a-uuid')).rejects.toBeInstanceOf(ValidationError);
  });

  it('ignores relations pointing outside the session thoughts', async () => {
    await store.saveRelation('s1', link(1, 1, 2));
    await store.saveRelation('s1', link(2, 2, 99));

    expect(await chainIds(uuid(1))).toEqual([[uuid(1), uuid(2)]]);
  });
});

describe('clampDepth', () => {
  it('keeps depth within 1..10', () => {
    expect(clampDepth(0)).toBe(1);
    expect(clampDepth(3.7)).toBe(3);
    expect(clampDepth(50)).toBe(10);
    expect(clampDepth(Number.POSITIVE_INFINITY)).toBe(10);
  });
});
