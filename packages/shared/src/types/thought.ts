import type { RelationType, ResultType, ThoughtOrigin, ThoughtType } from '../vocabulary.js';

// --- Thoughts ---

export interface Thought {
  id: string;                 // caller-assigned UUID, doubles as the backend point id
  sessionId: string;
  type: ThoughtType;
  origin: ThoughtOrigin;
  content: string;
  confidence: number;         // 0-1
  relevance: number;          // 0-1
  timestamp: string;          // ISO-8601, UTC
  parentThoughtId?: string;   // correction / continuation of an earlier thought
  topic?: string;
  tags?: string[];
  metadata?: Record<string, unknown>;
}

/** A thought as handed to the store; the session comes from the call. */
export type ThoughtInput = Omit<Thought, 'sessionId'> & { sessionId?: string };

// --- Relations (symbolic layer) ---

export interface ThoughtRelation {
  id: string;
  sourceThoughtId: string;
  targetThoughtId: string;
  type: RelationType;
  strength: number;           // 0-1
  createdAt: string;
  metadata?: Record<string, unknown>;
}

// --- Results ---

export interface ThoughtResult {
  id: string;
  thoughtId: string;
  resultType: ResultType;
  content: string;
  success: boolean;
  confidence: number;
  createdAt: string;
  executionTimeMs?: number;
  metadata?: Record<string, unknown>;
}

// --- Statistics ---

export interface ThoughtStatistics {
  totalCount: number;
  countByType: Record<string, number>;
  countByOrigin: Record<string, number>;
  averageConfidence: number;
  averageRelevance: number;
  earliest?: string;
  latest?: string;
}

export interface NeuroSymbolicStats {
  totalThoughts: number;
  totalRelations: number;
  totalResults: number;
  thoughtsByType: Record<string, number>;
  relationsByType: Record<string, number>;
  resultsByType: Record<string, number>;
  /** Thoughts with no incoming relation. */
  causalChainCount: number;
  /** Mean of the longest chain per sampled start; see `sampledChainStarts`. */
  averageChainLength: number;
  sampledChainStarts: number;
  oldest?: string;
  newest?: string;
}

export type RecordKind = 'thought' | 'relation' | 'result';

export type ParseFailureCounters = Record<RecordKind, number>;
