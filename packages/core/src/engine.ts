import {
  COLLECTIONS,
  COLLECTION_PURPOSES,
  createLogger,
  setLogLevel,
  type EmbeddingFunction,
  type MemoryLayerMapping,
  type SynapticConfig,
} from '@synaptic/shared';
import {
  EmbeddingProviderRegistry,
  createEmbeddingProvider,
  toEmbeddingFunction,
  type EmbeddingProvider,
} from '@synaptic/models';
import {
  ThoughtStore,
  createVectorBackend,
  initializeAdminStore,
  type AdminStore,
  type VectorBackendClient,
} from '@synaptic/store';
import { ConfigManager, type ConfigLoadOptions } from './config-manager.js';
import { RelationInferenceEngine } from './relation-inference.js';
import { CausalChainFinder } from './causal-chain-finder.js';
import { NeuroSymbolicAnalyzer } from './neuro-symbolic-analyzer.js';
import { CollectionAdmin } from './collection-admin.js';
import { MemoryLayerManager } from './memory-layer-manager.js';

const log = createLogger('engine');

export interface MemoryEngineOptions extends ConfigLoadOptions {
  /** Already-loaded configuration; skips file and environment lookup. */
  config?: SynapticConfig;
  /** Replaces the backend named by `backend.kind`. */
  backend?: VectorBackendClient;
  /** Replaces the configured embedding provider; `null` disables embeddings. */
  embed?: EmbeddingFunction | null;
  layerMappings?: MemoryLayerMapping[];
}

interface EngineParts {
  config: SynapticConfig;
  backend: VectorBackendClient;
  adminStore: AdminStore;
  provider: EmbeddingProvider | undefined;
  embed: EmbeddingFunction | undefined;
  layerMappings: MemoryLayerMapping[] | undefined;
}

/**
 * The thought store, its analyses and the collection administration, wired
 * from one configuration over one backend.
 */
export class MemoryEngine {
  readonly config: SynapticConfig;
  readonly backend: VectorBackendClient;
  readonly providers = new EmbeddingProviderRegistry();
  readonly store: ThoughtStore;
  readonly inference: RelationInferenceEngine;
  readonly chains: CausalChainFinder;
  readonly analyzer: NeuroSymbolicAnalyzer;
  readonly admin: CollectionAdmin;
  readonly layers: MemoryLayerManager;

  private adminStore: AdminStore;
  private initialized = false;

  static async create(options: MemoryEngineOptions = {}): Promise<MemoryEngine> {
    const config = options.config ?? (await new ConfigManager().load(options));
    setLogLevel(config.logging.level);

    const provider = options.embed === undefined ? createEmbeddingProvider(config) : undefined;
    const embed = options.embed === undefined
      ? (provider ? toEmbeddingFunction(provider) : undefined)
      : (options.embed ?? undefined);

    return new MemoryEngine({
      config,
      backend: options.backend ?? createVectorBackend(config.backend),
      adminStore: initializeAdminStore(config.admin.dbPath),
      provider,
      embed,
      layerMappings: options.layerMappings,
    });
  }

  private constructor(parts: EngineParts) {
    const { config, backend } = parts;
    this.config = config;
    this.backend = backend;
    this.adminStore = parts.adminStore;
    if (parts.provider) this.providers.register(parts.provider);

    this.store = new ThoughtStore({
      backend,
      ...(parts.embed ? { embed: parts.embed } : {}),
      collections: {
        thoughts: config.collections.thoughts,
        relations: config.collections.relations,
        results: config.collections.results,
      },
      vectorSize: config.collections.vectorSize,
      distance: config.collections.distance,
      batchSize: config.collections.batchSize,
    });

    this.inference = new RelationInferenceEngine(this.store, {
      recentWindow: config.inference.recentWindow,
      similarityThreshold: config.inference.similarityThreshold,
    });
    this.chains = new CausalChainFinder(this.store);
    this.analyzer = new NeuroSymbolicAnalyzer(this.store);

    this.admin = new CollectionAdmin({
      backend,
      links: this.adminStore.links,
      audit: this.adminStore.audit,
      defaultVectorSize: config.collections.vectorSize,
      purposes: {
        [config.collections.thoughts]: COLLECTION_PURPOSES[COLLECTIONS.thoughts],
        [config.collections.relations]: COLLECTION_PURPOSES[COLLECTIONS.relations],
        [config.collections.results]: COLLECTION_PURPOSES[COLLECTIONS.results],
      },
    });
    this.layers = new MemoryLayerManager(this.admin, {
      ...(parts.layerMappings ? { mappings: parts.layerMappings } : {}),
    });
  }

  /** Loads links and creates the collections every memory layer expects. */
  async initialize(signal?: AbortSignal): Promise<void> {
    if (this.initialized) return;
    await this.layers.initialize(signal ? { signal } : {});
    this.initialized = true;
    log.info(
      `Engine ready: backend=${this.config.backend.kind} embeddings=${this.store.hasEmbedder ? this.config.embedding.provider : 'none'}`,
    );
  }

  async close(): Promise<void> {
    await this.backend.close?.();
    this.adminStore.db.close();
  }
}
