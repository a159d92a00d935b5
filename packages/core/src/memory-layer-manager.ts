import {
  COLLECTION_PURPOSES,
  ConfigError,
  ConfirmationRequiredError,
  DEFAULT_DISTANCE,
  DEFAULT_LAYER_MAPPINGS,
  MEMORY_LAYERS,
  createLogger,
  getErrorMessage,
  isoNow,
  memoryLayerMappingSchema,
  type CollectionLink,
  type CollectionLinkType,
  type MemoryHealthReport,
  type MemoryLayer,
  type MemoryLayerMapping,
  type MemorySnapshot,
} from '@synaptic/shared';
import type { AdminCallOptions, CollectionAdmin, DestructiveCallOptions } from './collection-admin.js';

const log = createLogger('layers');

export interface MemoryLayerManagerOptions {
  /** Replaces the default mapping of each layer it names. */
  mappings?: MemoryLayerMapping[];
}

export interface HealthCheckOptions extends AdminCallOptions {
  autoHeal?: boolean;
  /** Required with `autoHeal`. */
  confirm?: boolean;
  expectedDimension?: number;
}

/**
 * Groups collections into the five cognitive memory layers and runs the
 * layer-level operations (initialize, clear, health, snapshot) through the
 * collection admin.
 */
export class MemoryLayerManager {
  private admin: CollectionAdmin;
  private mappings: Map<MemoryLayer, MemoryLayerMapping>;
  private initialized = false;

  constructor(admin: CollectionAdmin, options: MemoryLayerManagerOptions = {}) {
    this.admin = admin;
    this.mappings = buildMappings(options.mappings ?? []);
  }

  /** Creates every mapped collection that does not exist yet. Idempotent. */
  async initialize(options: AdminCallOptions = {}): Promise<void> {
    if (this.initialized) return;
    await this.admin.initialize(options);

    for (const mapping of this.mappings.values()) {
      for (const name of mapping.collections) {
        const info = await this.admin.getCollectionInfo(name, options);
        if (info) continue;
        await this.admin.createCollection(name, {
          purpose: COLLECTION_PURPOSES[name] ?? mapping.description,
          ...(options.signal ? { signal: options.signal } : {}),
        });
      }
    }

    this.initialized = true;
    log.info(`Memory layers ready (${this.mappings.size} layers)`);
  }

  getCollectionsForLayer(layer: MemoryLayer): string[] {
    return [...(this.mappings.get(layer)?.collections ?? [])];
  }

  /** Null when no layer maps the collection. */
  getLayerForCollection(name: string): MemoryLayer | null {
    for (const [layer, mapping] of this.mappings) {
      if (mapping.collections.includes(name)) return layer;
    }
    return null;
  }

  getLayerMappings(): MemoryLayerMapping[] {
    return MEMORY_LAYERS.flatMap((layer) => {
      const mapping = this.mappings.get(layer);
      return mapping ? [{ ...mapping, collections: [...mapping.collections] }] : [];
    });
  }

  /** Points across the layer's existing collections. */
  async getLayerVectorCount(layer: MemoryLayer, options: AdminCallOptions = {}): Promise<number> {
    let total = 0;
    for (const name of this.getCollectionsForLayer(layer)) {
      const info = await this.admin.getCollectionInfo(name, options);
      if (info) total += info.pointsCount;
    }
    return total;
  }

  /** Points across every collection, mapped or not. */
  async getTotalMemoryVectors(options: AdminCallOptions = {}): Promise<number> {
    const stats = await this.admin.getMemoryStatistics(options);
    return stats.totalVectors;
  }

  /**
   * Empties every collection of the layer by recreating it at its previous
   * dimension and distance (the defaults for a collection that was absent).
   * Resolves true when every collection was recreated.
   */
  async clearMemoryLayer(layer: MemoryLayer, options: DestructiveCallOptions = {}): Promise<boolean> {
    if (options.confirm !== true) {
      throw new ConfirmationRequiredError(`clearMemoryLayer(${layer})`);
    }

    let success = true;
    for (const name of this.getCollectionsForLayer(layer)) {
      try {
        const previous = await this.admin.getCollectionInfo(name, options);
        if (previous) await this.admin.deleteCollection(name, options);
        await this.admin.createCollection(name, {
          vectorSize: previous && previous.vectorSize > 0 ? previous.vectorSize : this.admin.defaultVectorSize,
          distance: previous?.distanceMetric ?? DEFAULT_DISTANCE,
          purpose: this.admin.purposeOf(name) ?? COLLECTION_PURPOSES[name] ?? this.mappings.get(layer)?.description ?? '',
          ...(options.signal ? { signal: options.signal } : {}),
        });
      } catch (err) {
        success = false;
        log.error(`Failed to clear ${name} in layer ${layer}: ${getErrorMessage(err)}`);
      }
    }

    this.admin.recordAudit({
      operation: 'clear_layer',
      target: layer,
      details: { collections: this.getCollectionsForLayer(layer) },
      success,
    });
    log.warn(`Cleared memory layer ${layer}${success ? '' : ' (with failures)'}`);
    return success;
  }

  async performHealthCheck(options: HealthCheckOptions = {}): Promise<MemoryHealthReport> {
    const expected = options.expectedDimension ?? this.admin.defaultVectorSize;
    const call = options.signal ? { signal: options.signal } : {};
    const reports = await this.admin.healthCheck(expected, call);
    const unhealthy = reports.filter((r) => !r.isHealthy);

    let healed: string[] = [];
    if (options.autoHeal && unhealthy.some((r) => r.dimensionMismatch)) {
      const result = await this.admin.autoHeal(expected, { ...call, confirm: options.confirm === true });
      healed = result.healed;
    }

    const statistics = await this.admin.getMemoryStatistics(call);
    return {
      healthyCollections: reports.length - unhealthy.length,
      unhealthyCollections: unhealthy.length,
      healedCollections: healed,
      issues: unhealthy,
      statistics,
    };
  }

  async createSnapshot(options: AdminCallOptions = {}): Promise<MemorySnapshot> {
    const collections = await this.admin.getAllCollections(options);
    const statistics = await this.admin.getMemoryStatistics(options);

    const layerVectorCounts: Record<MemoryLayer, number> = {
      working: 0,
      episodic: 0,
      semantic: 0,
      procedural: 0,
      autobiographical: 0,
    };
    for (const layer of MEMORY_LAYERS) {
      layerVectorCounts[layer] = await this.getLayerVectorCount(layer, options);
    }

    return {
      createdAt: isoNow(),
      collections,
      links: [...this.admin.collectionLinks],
      layerVectorCounts,
      statistics,
    };
  }

  async getMemoryMap(options: AdminCallOptions = {}): Promise<string> {
    return this.admin.generateMemoryMap(options);
  }

  async linkCollections(
    source: string,
    target: string,
    relationType: CollectionLinkType,
    description?: string,
  ): Promise<boolean> {
    return this.admin.addCollectionLink({
      source,
      target,
      relationType,
      strength: 1,
      ...(description ? { description } : {}),
    });
  }

  getRelatedCollections(name: string): CollectionLink[] {
    return this.admin.getLinkedCollections(name);
  }
}

function buildMappings(overrides: MemoryLayerMapping[]): Map<MemoryLayer, MemoryLayerMapping> {
  const mappings = new Map<MemoryLayer, MemoryLayerMapping>();
  for (const mapping of DEFAULT_LAYER_MAPPINGS) mappings.set(mapping.layer, mapping);
  for (const override of overrides) {
    const parsed = memoryLayerMappingSchema.safeParse(override);
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid mapping for layer ${override.layer}: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
      );
    }
    mappings.set(parsed.data.layer, parsed.data);
  }

  const owner = new Map<string, MemoryLayer>();
  for (const [layer, mapping] of mappings) {
    for (const name of mapping.collections) {
      const existing = owner.get(name);
      if (existing && existing !== layer) {
        throw new ConfigError(`Collection "${name}" is mapped to both ${existing} and ${layer}`);
      }
      owner.set(name, layer);
    }
  }
  return mappings;
}
