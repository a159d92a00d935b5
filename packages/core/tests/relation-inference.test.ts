import { describe, it, expect } from 'vitest';
import { InMemoryVectorBackend, ThoughtStore } from '@synaptic/store';
import { RelationInferenceEngine, inferRelationType } from '../src/relation-inference.js';
import { keywordEmbedder, makeThought, uuid } from './helpers.js';

function setup(withEmbedder = true) {
  const store = new ThoughtStore({
    backend: new InMemoryVectorBackend(),
    vectorSize: 3,
    ...(withEmbedder ? { embed: keywordEmbedder(['deploy', 'cats']) } : {}),
  });
  return { store, engine: new RelationInferenceEngine(store) };
}

describe('inferRelationType', () => {
  it('applies the first matching rule', () => {
    expect(inferRelationType('Observation', 'Analytical')).toBe('leads_to');
    expect(inferRelationType('Emotional', 'SelfReflection')).toBe('triggers');
    expect(inferRelationType('MemoryRecall', 'Decision')).toBe('supports');
    expect(inferRelationType('Creative', 'Synthesis')).toBe('elaborates');
    expect(inferRelationType('Observation', 'Synthesis')).toBe('part_of');
    expect(inferRelationType('Emotional', 'Decision')).toBe('leads_to');
  });

  it('falls back to similar_to', () => {
    expect(inferRelationType('Observation', 'Observation')).toBe('similar_to');
    expect(inferRelationType('Dreaming', 'Observation')).toBe('similar_to');
  });

  it('accepts a custom rule table', () => {
    expect(inferRelationType('Observation', 'Observation', [
      { from: 'Observation', to: '*', relation: 'contradicts' },
    ])).toBe('contradicts');
  });
});

describe('RelationInferenceEngine', () => {
  it('links similar thoughts with the rule-derived type', async () => {
    const { store, engine } = setup();
    await engine.saveWithRelations('s1', makeThought(1, { type: 'Analytical', content: 'deploy is failing' }));
    const { relations } = await engine.saveWithRelations(
      's1',
      makeThought(2, { type: 'Decision', content: 'roll back the deploy' }),
    );

    expect(relations).toHaveLength(1);
    expect(relations[0]).toMatchObject({
      sourceThoughtId: uuid(1),
      targetThoughtId: uuid(2),
      type: 'leads_to',
      strength: 1,
      metadata: { inferred: true, similarity: 1 },
    });
    expect(await store.getRelations('s1')).toHaveLength(1);
  });

  it('skips pairs at or below the threshold', async () => {
    const { engine } = setup();
    await engine.saveWithRelations('s1', makeThought(1, { content: 'deploy is failing' }));
    const { relations } = await engine.saveWithRelations('s1', makeThought(2, { content: 'cats are asleep' }));
    expect(relations).toEqual([]);
  });

  it('marks a correction of its parent as refines regardless of similarity', async () => {
    const { engine } = setup();
    await engine.saveWithRelations('s1', makeThought(1, { type: 'Observation', content: 'deploy is failing' }));
    const { relations } = await engine.saveWithRelations(
      's1',
      makeThought(2, { type: 'Analytical', content: 'cats knocked the cable', parentThoughtId: uuid(1) }),
    );

    expect(relations).toHaveLength(1);
    expect(relations[0]).toMatchObject({
      sourceThoughtId: uuid(1),
      targetThoughtId: uuid(2),
      type: 'refines',
      strength: 0,
    });
  });

  it('infers nothing without an embedder', async () => {
    const { store, engine } = setup(false);
    await engine.saveWithRelations('s1', makeThought(1, { content: 'deploy' }));
    const { thought, relations } = await engine.saveWithRelations('s1', makeThought(2, { content: 'deploy' }));

    expect(thought.id).toBe(uuid(2));
    expect(relations).toEqual([]);
    expect(await store.getThoughts('s1')).toHaveLength(2);
  });

  it('honours autoInfer: false', async () => {
    const { engine } = setup();
    await engine.saveWithRelations('s1', makeThought(1, { content: 'deploy' }));
    const { relations } = await engine.saveWithRelations('s1', makeThought(2, { content: 'deploy' }), {
      autoInfer: false,
    });
    expect(relations).toEqual([]);
  });

  it('compares only with the recent window', async () => {
    const store = new ThoughtStore({
      backend: new InMemoryVectorBackend(),
      vectorSize: 3,
      embed: keywordEmbedder(['deploy', 'cats']),
    });
    const engine = new RelationInferenceEngine(store, { recentWindow: 1 });
    await store.saveThought('s1', makeThought(1, { content: 'deploy one' }));
    await store.saveThought('s1', makeThought(2, { content: 'cats' }));
    const { relations } = await engine.saveWithRelations('s1', makeThought(3, { content: 'deploy two' }));
    expect(relations).toEqual([]);
  });

  it('keeps relations within the session', async () => {
    const { engine } = setup();
    await engine.saveWithRelations('other', makeThought(1, { content: 'deploy' }));
    const { relations } = await engine.saveWithRelations('s1', makeThought(2, { content: 'deploy' }));
    expect(relations).toEqual([]);
  });
});
