import {
  DEFAULT_CHAIN_DEPTH,
  MAX_CHAIN_DEPTH,
  ValidationError,
  thoughtIdSchema,
  type Thought,
  type ThoughtRelation,
} from '@synaptic/shared';
import type { ThoughtStore } from '@synaptic/store';

export interface CausalChainOptions {
  signal?: AbortSignal;
}

/**
 * Reconstructs reasoning traces by following outgoing relations from a
 * start thought.
 */
export class CausalChainFinder {
  constructor(private store: ThoughtStore) {}

  /**
   * Every maximal chain from `startId`, in discovery order. A chain ends when
   * it holds `maxDepth` thoughts or its last thought has no unvisited
   * successor. A thought appears at most once per chain, so cycles terminate.
   * Chains of a single thought are not reported.
   */
  async findCausalChains(
    sessionId: string,
    startId: string,
    maxDepth = DEFAULT_CHAIN_DEPTH,
    options: CausalChainOptions = {},
  ): Promise<Thought[][]> {
    if (!thoughtIdSchema.safeParse(startId).success) {
      throw new ValidationError(`start thought id is not a UUID: ${startId}`);
    }
    const thoughts = await this.store.getThoughts(sessionId, options);
    const byId = new Map(thoughts.map((t) => [t.id, t]));
    if (!byId.has(startId)) return [];

    const relations = await this.store.getRelations(sessionId, options);
    return walkChains(startId, byId, indexOutgoing(relations), clampDepth(maxDepth));
  }
}

export function clampDepth(maxDepth: number): number {
  if (!Number.isFinite(maxDepth)) return MAX_CHAIN_DEPTH;
  return Math.min(MAX_CHAIN_DEPTH, Math.max(1, Math.floor(maxDepth)));
}

/** Outgoing targets per source, in relation creation order. */
export function indexOutgoing(relations: ThoughtRelation[]): Map<string, string[]> {
  const ordered = [...relations].sort(
    (a, b) => a.createdAt.localeCompare(b.createdAt) || a.id.localeCompare(b.id),
  );
  const index = new Map<string, string[]>();
  for (const r of ordered) {
    const targets = index.get(r.sourceThoughtId) ?? [];
    targets.push(r.targetThoughtId);
    index.set(r.sourceThoughtId, targets);
  }
  return index;
}

interface Frame {
  id: string;
  /** Next index into this node's successor list. */
  next: number;
  successors: string[];
}

/**
 * Depth-first walk with an explicit stack. `onPath` holds the thoughts of the
 * current branch only, so a thought reached again through another branch is
 * walked again there.
 */
export function walkChains(
  startId: string,
  thoughts: Map<string, Thought>,
  outgoing: Map<string, string[]>,
  maxDepth: number,
): Thought[][] {
  const successorsOf = (id: string) => (outgoing.get(id) ?? []).filter((t) => thoughts.has(t));
  const chains: Thought[][] = [];
  const stack: Frame[] = [{ id: startId, next: 0, successors: successorsOf(startId) }];
  const onPath = new Set<string>([startId]);
  const record = () => {
    if (stack.length > 1) {
      chains.push(stack.map((f) => thoughts.get(f.id)).filter((t): t is Thought => t !== undefined));
    }
  };

  let extended = false;
  while (stack.length > 0) {
    const top = stack[stack.length - 1];

    if (stack.length >= maxDepth) {
      record();
      onPath.delete(top.id);
      stack.pop();
      extended = false;
      continue;
    }

    let child: string | undefined;
    while (top.next < top.successors.length) {
      const candidate = top.successors[top.next++];
      if (!onPath.has(candidate)) {
        child = candidate;
        break;
      }
    }

    if (child !== undefined) {
      onPath.add(child);
      stack.push({ id: child, next: 0, successors: successorsOf(child) });
      extended = true;
      continue;
    }

    // A leaf of this branch: record it once, on the way back up from a push.
    if (extended) record();
    onPath.delete(top.id);
    stack.pop();
    extended = false;
  }

  return chains;
}
