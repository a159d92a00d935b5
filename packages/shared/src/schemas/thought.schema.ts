import { z } from 'zod';
import { RELATION_TYPES, RESULT_TYPES } from '../vocabulary.js';

const unitInterval = z.number().min(0).max(1);
const isoTimestamp = z.string().datetime({ offset: true });
const metadataSchema = z.record(z.unknown());

export const thoughtIdSchema = z.string().uuid();

export const thoughtInputSchema = z.object({
  id: thoughtIdSchema,
  sessionId: z.string().min(1).optional(),
  type: z.string().min(1),
  origin: z.string().min(1),
  content: z.string(),
  confidence: unitInterval,
  relevance: unitInterval,
  timestamp: isoTimestamp,
  parentThoughtId: thoughtIdSchema.optional(),
  topic: z.string().optional(),
  tags: z.array(z.string()).optional(),
  metadata: metadataSchema.optional(),
});

export const relationSchema = z.object({
  id: thoughtIdSchema,
  sourceThoughtId: thoughtIdSchema,
  targetThoughtId: thoughtIdSchema,
  type: z.enum(RELATION_TYPES),
  strength: unitInterval,
  createdAt: isoTimestamp,
  metadata: metadataSchema.optional(),
});

export const resultSchema = z.object({
  id: thoughtIdSchema,
  thoughtId: thoughtIdSchema,
  resultType: z.enum(RESULT_TYPES),
  content: z.string(),
  success: z.boolean(),
  confidence: unitInterval,
  createdAt: isoTimestamp,
  executionTimeMs: z.number().nonnegative().optional(),
  metadata: metadataSchema.optional(),
});

// ── Stored point payloads (snake_case wire format) ───────────────

export const thoughtPayloadSchema = z.object({
  id: thoughtIdSchema,
  session_id: z.string().min(1),
  type: z.string().min(1),
  origin: z.string().min(1),
  content: z.string(),
  confidence: z.number(),
  relevance: z.number(),
  timestamp: isoTimestamp,
  topic: z.string().optional(),
  parent_thought_id: thoughtIdSchema.optional(),
  tags: z.array(z.string()).optional(),
  metadata_json: z.string().optional(),
});

export const relationPayloadSchema = z.object({
  id: thoughtIdSchema,
  session_id: z.string().min(1),
  source_thought_id: thoughtIdSchema,
  target_thought_id: thoughtIdSchema,
  relation_type: z.enum(RELATION_TYPES),
  strength: z.number(),
  created_at: isoTimestamp,
  metadata_json: z.string().optional(),
});

export const resultPayloadSchema = z.object({
  id: thoughtIdSchema,
  session_id: z.string().min(1),
  thought_id: thoughtIdSchema,
  result_type: z.enum(RESULT_TYPES),
  content: z.string(),
  success: z.boolean(),
  confidence: z.number(),
  created_at: isoTimestamp,
  execution_time_ms: z.number().optional(),
  metadata_json: z.string().optional(),
});

export type ThoughtPayload = z.infer<typeof thoughtPayloadSchema>;
export type RelationPayload = z.infer<typeof relationPayloadSchema>;
export type ResultPayload = z.infer<typeof resultPayloadSchema>;
