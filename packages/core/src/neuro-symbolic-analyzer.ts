import {
  MAX_CHAIN_DEPTH,
  type NeuroSymbolicStats,
  type RelationType,
  type Thought,
  type ThoughtRelation,
  type ThoughtType,
} from '@synaptic/shared';
import type { ThoughtStore } from '@synaptic/store';
import { clampDepth, indexOutgoing, walkChains } from './causal-chain-finder.js';

export interface StatsOptions {
  /** Chain starts examined for the average chain length. */
  sampleSize?: number;
  maxDepth?: number;
  signal?: AbortSignal;
}

export interface SymbolicMatch {
  /** Source of the relation. */
  thought: Thought;
  relation: ThoughtRelation;
}

/**
 * Read-side view joining the neural layer (thoughts) with the symbolic layer
 * (typed relations and results).
 */
export class NeuroSymbolicAnalyzer {
  constructor(private store: ThoughtStore) {}

  /**
   * Counts by type, plus chain statistics. Chain starts are thoughts without
   * an incoming relation; the average length is the mean of the longest chain
   * of the first `sampleSize` starts, not of every start.
   */
  async getStats(sessionId: string, options: StatsOptions = {}): Promise<NeuroSymbolicStats> {
    const call = { signal: options.signal };
    const thoughts = await this.store.getThoughts(sessionId, call);
    const relations = await this.store.getRelations(sessionId, call);
    const results = await this.store.getResults(sessionId, call);

    const targets = new Set(relations.map((r) => r.targetThoughtId));
    const starts = thoughts.filter((t) => !targets.has(t.id));

    const sampleSize = Math.max(1, options.sampleSize ?? 10);
    const maxDepth = clampDepth(options.maxDepth ?? MAX_CHAIN_DEPTH);
    const byId = new Map(thoughts.map((t) => [t.id, t]));
    const outgoing = indexOutgoing(relations);

    const sample = starts.slice(0, sampleSize);
    let totalLength = 0;
    for (const start of sample) {
      const chains = walkChains(start.id, byId, outgoing, maxDepth);
      totalLength += chains.reduce((longest, c) => Math.max(longest, c.length), 0);
    }

    return {
      totalThoughts: thoughts.length,
      totalRelations: relations.length,
      totalResults: results.length,
      thoughtsByType: countBy(thoughts, (t) => t.type),
      relationsByType: countBy(relations, (r) => r.type),
      resultsByType: countBy(results, (r) => r.resultType),
      causalChainCount: starts.length,
      averageChainLength: sample.length > 0 ? totalLength / sample.length : 0,
      sampledChainStarts: sample.length,
      ...(thoughts.length > 0
        ? { oldest: thoughts[0].timestamp, newest: thoughts[thoughts.length - 1].timestamp }
        : {}),
    };
  }

  /**
   * Relations of `relationType` whose source is a thought of the session,
   * optionally limited to targets of `targetType`. Reads like the pattern
   * `?x <relationType> <targetType>`.
   */
  async querySymbolic(
    sessionId: string,
    relationType: RelationType,
    targetType?: ThoughtType,
    options: { signal?: AbortSignal } = {},
  ): Promise<SymbolicMatch[]> {
    const relations = await this.store.getRelationsByType(sessionId, relationType, options);
    const byId = new Map((await this.store.getThoughts(sessionId, options)).map((t) => [t.id, t]));

    const matches: SymbolicMatch[] = [];
    for (const relation of relations) {
      const source = byId.get(relation.sourceThoughtId);
      if (!source) continue;
      if (targetType !== undefined) {
        const target = byId.get(relation.targetThoughtId);
        if (!target || target.type !== targetType) continue;
      }
      matches.push({ thought: source, relation });
    }
    return matches;
  }
}

function countBy<T>(items: T[], key: (item: T) => string): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const item of items) {
    const k = key(item);
    counts[k] = (counts[k] ?? 0) + 1;
  }
  return counts;
}
