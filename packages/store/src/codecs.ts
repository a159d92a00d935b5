import {
  getErrorMessage,
  relationPayloadSchema,
  resultPayloadSchema,
  thoughtPayloadSchema,
  type RelationPayload,
  type ResultPayload,
  type Thought,
  type ThoughtPayload,
  type ThoughtRelation,
  type ThoughtResult,
} from '@synaptic/shared';
import type { z } from 'zod';

// ── Point payload codecs (snake_case on the wire) ───────────────

export type DecodeResult<T> = { ok: true; value: T } | { ok: false; error: string };

export function encodeThought(sessionId: string, thought: Thought): ThoughtPayload {
  return {
    id: thought.id,
    session_id: sessionId,
    type: thought.type,
    origin: thought.origin,
    content: thought.content,
    confidence: thought.confidence,
    relevance: thought.relevance,
    timestamp: thought.timestamp,
    topic: thought.topic ?? '',
    ...(thought.parentThoughtId ? { parent_thought_id: thought.parentThoughtId } : {}),
    ...(thought.tags && thought.tags.length > 0 ? { tags: [...thought.tags] } : {}),
    ...encodeMetadata(thought.metadata),
  };
}

export function decodeThought(raw: unknown): DecodeResult<Thought> {
  return decode(thoughtPayloadSchema, raw, (p, metadata) => ({
    id: p.id,
    sessionId: p.session_id,
    type: p.type,
    origin: p.origin,
    content: p.content,
    confidence: p.confidence,
    relevance: p.relevance,
    timestamp: p.timestamp,
    ...(p.parent_thought_id ? { parentThoughtId: p.parent_thought_id } : {}),
    ...(p.topic ? { topic: p.topic } : {}),
    ...(p.tags ? { tags: p.tags } : {}),
    ...(metadata ? { metadata } : {}),
  }));
}

export function encodeRelation(sessionId: string, relation: ThoughtRelation): RelationPayload {
  return {
    id: relation.id,
    session_id: sessionId,
    source_thought_id: relation.sourceThoughtId,
    target_thought_id: relation.targetThoughtId,
    relation_type: relation.type,
    strength: relation.strength,
    created_at: relation.createdAt,
    ...encodeMetadata(relation.metadata),
  };
}

export function decodeRelation(raw: unknown): DecodeResult<ThoughtRelation> {
  return decode(relationPayloadSchema, raw, (p, metadata) => ({
    id: p.id,
    sourceThoughtId: p.source_thought_id,
    targetThoughtId: p.target_thought_id,
    type: p.relation_type,
    strength: p.strength,
    createdAt: p.created_at,
    ...(metadata ? { metadata } : {}),
  }));
}

export function encodeResult(sessionId: string, result: ThoughtResult): ResultPayload {
  return {
    id: result.id,
    session_id: sessionId,
    thought_id: result.thoughtId,
    result_type: result.resultType,
    content: result.content,
    success: result.success,
    confidence: result.confidence,
    created_at: result.createdAt,
    ...(result.executionTimeMs !== undefined ? { execution_time_ms: result.executionTimeMs } : {}),
    ...encodeMetadata(result.metadata),
  };
}

export function decodeResult(raw: unknown): DecodeResult<ThoughtResult> {
  return decode(resultPayloadSchema, raw, (p, metadata) => ({
    id: p.id,
    thoughtId: p.thought_id,
    resultType: p.result_type,
    content: p.content,
    success: p.success,
    confidence: p.confidence,
    createdAt: p.created_at,
    ...(p.execution_time_ms !== undefined ? { executionTimeMs: p.execution_time_ms } : {}),
    ...(metadata ? { metadata } : {}),
  }));
}

// ── Helpers ──────────────────────────────────────────────────────

function encodeMetadata(metadata: Record<string, unknown> | undefined): { metadata_json?: string } {
  return metadata && Object.keys(metadata).length > 0 ? { metadata_json: JSON.stringify(metadata) } : {};
}

function decode<S extends z.ZodTypeAny, T>(
  schema: S,
  raw: unknown,
  build: (payload: z.infer<S>, metadata: Record<string, unknown> | undefined) => T,
): DecodeResult<T> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ') };
  }

  const metadataJson: unknown =
    typeof raw === 'object' && raw !== null && 'metadata_json' in raw ? raw.metadata_json : undefined;
  let metadata: Record<string, unknown> | undefined;
  if (typeof metadataJson === 'string' && metadataJson !== '') {
    try {
      const value: unknown = JSON.parse(metadataJson);
      if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        return { ok: false, error: 'metadata_json: not a JSON object' };
      }
      metadata = Object.fromEntries(Object.entries(value));
    } catch (err) {
      return { ok: false, error: `metadata_json: ${getErrorMessage(err)}` };
    }
  }

  return { ok: true, value: build(parsed.data, metadata) };
}
