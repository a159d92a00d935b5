import { z } from 'zod';
import { collectionNameSchema, distanceMetricSchema } from './collection.schema.js';

export const backendConfigSchema = z.object({
  kind: z.enum(['memory', 'lancedb']).default('memory'),
  lancedbPath: z.string().default('.synaptic/lancedb'),
  /** Payload keys the LanceDB backend stores as filterable columns. */
  indexedFields: z.array(z.string().min(1)).default([
    'session_id',
    'type',
    'thought_id',
    'source_thought_id',
    'target_thought_id',
    'relation_type',
  ]),
});

export const embeddingConfigSchema = z.object({
  provider: z.enum(['none', 'ollama', 'openai']).default('ollama'),
  model: z.string().optional(),
  baseUrl: z.string().url().default('http://localhost:11434'),
  apiKey: z.string().min(1).optional(),
  timeoutMs: z.number().int().min(100).default(30_000),
});

export const collectionsConfigSchema = z.object({
  thoughts: collectionNameSchema.default('synaptic_thoughts'),
  relations: collectionNameSchema.default('synaptic_thought_relations'),
  results: collectionNameSchema.default('synaptic_thought_results'),
  vectorSize: z.number().int().positive().default(768),
  distance: distanceMetricSchema.default('cosine'),
  batchSize: z.number().int().min(1).max(1000).default(100),
});

export const inferenceConfigSchema = z.object({
  recentWindow: z.number().int().min(1).max(100).default(10),
  similarityThreshold: z.number().min(0).max(1).default(0.7),
});

export const causalConfigSchema = z.object({
  defaultMaxDepth: z.number().int().min(1).max(10).default(5),
  statsSampleSize: z.number().int().min(1).max(100).default(10),
});

export const loggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export const adminConfigSchema = z.object({
  /** SQLite file for collection links and the audit log; unset keeps both in memory. */
  dbPath: z.string().optional(),
});

export const synapticConfigSchema = z.object({
  backend: backendConfigSchema.default({}),
  embedding: embeddingConfigSchema.default({}),
  collections: collectionsConfigSchema.default({}),
  inference: inferenceConfigSchema.default({}),
  causal: causalConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
  admin: adminConfigSchema.default({}),
});

export type BackendConfig = z.infer<typeof backendConfigSchema>;
export type EmbeddingConfig = z.infer<typeof embeddingConfigSchema>;
export type CollectionsConfig = z.infer<typeof collectionsConfigSchema>;
export type InferenceConfig = z.infer<typeof inferenceConfigSchema>;
export type CausalConfig = z.infer<typeof causalConfigSchema>;
export type LoggingConfig = z.infer<typeof loggingConfigSchema>;
export type SynapticConfig = z.infer<typeof synapticConfigSchema>;
