import type { EmbeddingFunction, RelationType, ThoughtInput, ThoughtRelation } from '@synaptic/shared';

/** uuid(1) → 00000000-0000-4000-8000-000000000001 */
export function uuid(n: number): string {
  return `00000000-0000-4000-8000-${n.toString().padStart(12, '0')}`;
}

export function at(minute: number): string {
  return new Date(Date.UTC(2024, 0, 1, 0, minute)).toISOString();
}

export function makeThought(n: number, overrides: Partial<ThoughtInput> = {}): ThoughtInput {
  return {
    id: uuid(n),
    type: 'Observation',
    origin: 'Reactive',
    content: `thought ${n}`,
    confidence: 0.8,
    relevance: 0.5,
    timestamp: at(n),
    ...overrides,
  };
}

/** Relation ids start at 1000 so they never collide with thought ids. */
export function link(n: number, from: number, to: number, type: RelationType = 'leads_to'): ThoughtRelation {
  return {
    id: uuid(1000 + n),
    sourceThoughtId: uuid(from),
    targetThoughtId: uuid(to),
    type,
    strength: 0.9,
    createdAt: at(n),
  };
}

/** One axis per keyword; text matching none lands on the trailing axis. */
export function keywordEmbedder(keywords: string[]): EmbeddingFunction {
  return async (text) => {
    const lower = text.toLowerCase();
    const vector = keywords.map((k) => (lower.includes(k) ? 1 : 0));
    return [...vector, vector.some((v) => v > 0) ? 0 : 1];
  };
}
