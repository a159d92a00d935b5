import { z } from 'zod';
import { COLLECTION_LINK_TYPES, DISTANCE_METRICS, MEMORY_LAYERS } from '../vocabulary.js';

export const collectionNameSchema = z
  .string()
  .min(1)
  .max(255)
  .regex(/^[A-Za-z0-9_-]+$/, 'collection names may only contain letters, digits, "_" and "-"');

export const collectionLinkSchema = z.object({
  source: collectionNameSchema,
  target: collectionNameSchema,
  relationType: z.enum(COLLECTION_LINK_TYPES),
  strength: z.number().min(0).max(1).default(1),
  description: z.string().optional(),
});

export const distanceMetricSchema = z.enum(DISTANCE_METRICS);

export const memoryLayerMappingSchema = z.object({
  layer: z.enum(MEMORY_LAYERS),
  collections: z.array(collectionNameSchema),
  description: z.string(),
  retentionPriority: z.number().min(0).max(1),
});
