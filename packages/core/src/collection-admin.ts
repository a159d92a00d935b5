import {
  COLLECTION_PURPOSES,
  DEFAULT_COLLECTION_LINKS,
  DEFAULT_DISTANCE,
  DEFAULT_VECTOR_SIZE,
  MEMORY_MAP_LINK_LIMIT,
  ConfirmationRequiredError,
  ValidationError,
  collectionLinkSchema,
  collectionNameSchema,
  createLogger,
  getErrorMessage,
  throwIfAborted,
  type AutoHealResult,
  type CollectionHealthReport,
  type CollectionInfo,
  type CollectionLink,
  type CollectionLinkType,
  type DistanceMetric,
  type MemoryStatistics,
} from '@synaptic/shared';
import {
  KeyedMutex,
  type AdminAuditInput,
  type AdminAuditRepository,
  type CollectionLinkRepository,
  type VectorBackendClient,
} from '@synaptic/store';

const log = createLogger('admin');

const STATE_LOCK = 'admin-state';

export interface CollectionAdminOptions {
  backend: VectorBackendClient;
  /** Persists links added at runtime. */
  links?: CollectionLinkRepository;
  /** Records destructive operations. */
  audit?: AdminAuditRepository;
  defaultVectorSize?: number;
  defaultLinks?: CollectionLink[];
  purposes?: Record<string, string>;
}

export interface AdminCallOptions {
  signal?: AbortSignal;
}

export interface CreateCollectionRequest extends AdminCallOptions {
  vectorSize?: number;
  distance?: DistanceMetric;
  purpose?: string;
}

export interface DestructiveCallOptions extends AdminCallOptions {
  /** Must be `true`; destructive calls throw ConfirmationRequiredError otherwise. */
  confirm?: boolean;
}

interface MapSection {
  title: string;
  matches: (name: string) => boolean;
}

const MAP_SECTIONS: MapSection[] = [
  { title: 'Thought system', matches: (n) => n.includes('thought') },
  { title: 'Skills & tools', matches: (n) => n.includes('skill') || n.includes('tool') },
  { title: 'Knowledge base', matches: (n) => n.includes('core') || n.includes('code') },
  { title: 'Personality & self', matches: (n) => n.includes('person') || n.includes('self') },
  { title: 'Other', matches: () => true },
];

/**
 * Administration of the vector collections behind the agent's memory:
 * metadata, dimensional health, auto-heal and the declared collection-link
 * graph. Cached metadata and links are only touched under one async lock.
 */
export class CollectionAdmin {
  readonly defaultVectorSize: number;

  private backend: VectorBackendClient;
  private linkRepo: CollectionLinkRepository | undefined;
  private auditRepo: AdminAuditRepository | undefined;
  private defaultLinks: CollectionLink[];
  private purposes: Map<string, string>;

  private lock = new KeyedMutex();
  private cache = new Map<string, CollectionInfo>();
  private links: CollectionLink[] = [];
  private initialized = false;

  constructor(options: CollectionAdminOptions) {
    this.backend = options.backend;
    this.linkRepo = options.links;
    this.auditRepo = options.audit;
    this.defaultVectorSize = options.defaultVectorSize ?? DEFAULT_VECTOR_SIZE;
    this.defaultLinks = options.defaultLinks ?? DEFAULT_COLLECTION_LINKS;
    this.purposes = new Map(Object.entries({ ...COLLECTION_PURPOSES, ...options.purposes }));
  }

  /** Seeds default and persisted links, then scans the backend. Idempotent. */
  async initialize(options: AdminCallOptions = {}): Promise<void> {
    await this.lock.runExclusive(STATE_LOCK, async () => {
      if (!this.initialized) {
        for (const link of this.defaultLinks) this.pushLink(link);
        for (const link of this.linkRepo?.list() ?? []) this.pushLink(link);
        this.initialized = true;
      }
      await this.refreshUnlocked(options.signal);
    });
  }

  // ── Collections ────────────────────────────────────────────────

  async getAllCollections(options: AdminCallOptions = {}): Promise<CollectionInfo[]> {
    return this.lock.runExclusive(STATE_LOCK, async () => {
      await this.refreshUnlocked(options.signal);
      return [...this.cache.values()];
    });
  }

  /** Null when the collection does not exist. */
  async getCollectionInfo(name: string, options: AdminCallOptions = {}): Promise<CollectionInfo | null> {
    return this.lock.runExclusive(STATE_LOCK, async () => {
      const info = await this.loadInfo(name, options.signal);
      if (info) this.cache.set(name, info);
      else this.cache.delete(name);
      return info;
    });
  }

  /** False when the collection already exists. */
  async createCollection(name: string, request: CreateCollectionRequest = {}): Promise<boolean> {
    assertCollectionName(name);
    const vectorSize = request.vectorSize ?? this.defaultVectorSize;
    const distance = request.distance ?? DEFAULT_DISTANCE;

    return this.lock.runExclusive(STATE_LOCK, async () => {
      throwIfAborted(request.signal, `create ${name}`);
      if (await this.backend.collectionExists(name)) return false;

      throwIfAborted(request.signal, `create ${name}`);
      await this.backend.createCollection(name, { vectorSize, distance });
      if (request.purpose) this.purposes.set(name, request.purpose);

      this.cache.set(name, {
        name,
        vectorSize,
        pointsCount: 0,
        distanceMetric: distance,
        status: 'green',
        ...this.purposeField(name),
        linkedCollections: this.linkedNames(name),
      });
      this.recordAudit({ operation: 'create_collection', target: name, details: { vectorSize, distance }, success: true });
      log.info(`Created collection ${name} (${vectorSize}d, ${distance})`);
      return true;
    });
  }

  /** False when the collection does not exist. Links touching it go too. */
  async deleteCollection(name: string, options: AdminCallOptions = {}): Promise<boolean> {
    return this.lock.runExclusive(STATE_LOCK, async () => {
      throwIfAborted(options.signal, `delete ${name}`);
      const deleted = await this.backend.deleteCollection(name);
      if (!deleted) return false;

      this.cache.delete(name);
      this.links = this.links.filter((l) => l.source !== name && l.target !== name);
      this.linkRepo?.removeTouching(name);
      this.recordAudit({ operation: 'delete_collection', target: name, success: true });
      log.warn(`Deleted collection ${name}`);
      return true;
    });
  }

  // ── Health ─────────────────────────────────────────────────────

  /**
   * A collection is mismatched when its vector size is known (> 0) and differs
   * from `expectedDimension`; healthy when it is not mismatched and green.
   */
  async healthCheck(
    expectedDimension = this.defaultVectorSize,
    options: AdminCallOptions = {},
  ): Promise<CollectionHealthReport[]> {
    const collections = await this.getAllCollections(options);
    return collections.map((info) => toHealthReport(info, expectedDimension));
  }

  /**
   * Deletes and recreates, empty, every collection whose dimension differs
   * from `targetDimension`, keeping its distance metric. All stored vectors
   * of those collections are lost, hence the required confirmation.
   */
  async autoHeal(targetDimension: number, options: DestructiveCallOptions = {}): Promise<AutoHealResult> {
    if (options.confirm !== true) {
      throw new ConfirmationRequiredError('autoHeal');
    }

    const reports = await this.healthCheck(targetDimension, options);
    const result: AutoHealResult = { healed: [], failed: [] };

    await this.lock.runExclusive(STATE_LOCK, async () => {
      for (const report of reports.filter((r) => r.dimensionMismatch)) {
        const name = report.collectionName;
        const distance = this.cache.get(name)?.distanceMetric ?? DEFAULT_DISTANCE;
        try {
          throwIfAborted(options.signal, `heal ${name}`);
          await this.backend.deleteCollection(name);
          throwIfAborted(options.signal, `heal ${name}`);
          await this.backend.createCollection(name, { vectorSize: targetDimension, distance });
          result.healed.push(name);
          log.warn(`Healed ${name}: ${report.actualDimension}d -> ${targetDimension}d, contents dropped`);
          this.recordAudit({
            operation: 'auto_heal',
            target: name,
            details: { from: report.actualDimension, to: targetDimension, distance },
            success: true,
          });
        } catch (err) {
          const message = getErrorMessage(err);
          result.failed.push({ collection: name, error: message });
          log.error(`Failed to heal ${name}: ${message}`);
          this.recordAudit({
            operation: 'auto_heal',
            target: name,
            details: { from: report.actualDimension, to: targetDimension, error: message },
            success: false,
          });
        }
      }
      await this.refreshUnlocked(options.signal);
    });

    return result;
  }

  // ── Links ──────────────────────────────────────────────────────

  get collectionLinks(): readonly CollectionLink[] {
    return [...this.links];
  }

  /** False when an identical source/target/type link exists already. */
  async addCollectionLink(link: CollectionLink): Promise<boolean> {
    const parsed = collectionLinkSchema.safeParse(link);
    if (!parsed.success) {
      throw new ValidationError(parsed.error.issues.map((i) => i.message).join('; '));
    }
    return this.lock.runExclusive(STATE_LOCK, async () => {
      const added = this.pushLink(parsed.data);
      if (added) this.linkRepo?.save(parsed.data);
      return added;
    });
  }

  async removeCollectionLink(source: string, target: string, relationType: CollectionLinkType): Promise<boolean> {
    return this.lock.runExclusive(STATE_LOCK, async () => {
      const before = this.links.length;
      this.links = this.links.filter(
        (l) => !(l.source === source && l.target === target && l.relationType === relationType),
      );
      this.linkRepo?.remove(source, target, relationType);
      return this.links.length < before;
    });
  }

  /** Links with `name` at either end. */
  getLinkedCollections(name: string): CollectionLink[] {
    return this.links.filter((l) => l.source === name || l.target === name);
  }

  /** Collections on the other end of a `relationType` link with `name`. */
  getCollectionsByRelation(name: string, relationType: CollectionLinkType): string[] {
    const names = [
      ...this.links.filter((l) => l.source === name && l.relationType === relationType).map((l) => l.target),
      ...this.links.filter((l) => l.target === name && l.relationType === relationType).map((l) => l.source),
    ];
    return [...new Set(names)];
  }

  purposeOf(name: string): string | undefined {
    return this.purposes.get(name);
  }

  // ── Reporting ──────────────────────────────────────────────────

  async getMemoryStatistics(options: AdminCallOptions = {}): Promise<MemoryStatistics> {
    const collections = await this.getAllCollections(options);
    return computeStatistics(collections, this.links.length);
  }

  /** Text map of collections grouped by role, followed by the link graph. */
  async generateMemoryMap(options: AdminCallOptions = {}): Promise<string> {
    const collections = await this.getAllCollections(options);
    const lines = ['SYNAPTIC MEMORY MAP', '==================='];

    const remaining = new Set(collections.map((c) => c.name));
    for (const section of MAP_SECTIONS) {
      const members = collections.filter((c) => remaining.has(c.name) && section.matches(c.name));
      if (members.length === 0) continue;
      lines.push('', section.title);
      for (const info of members) {
        remaining.delete(info.name);
        const mark = info.status === 'green' ? '✓' : '⚠';
        lines.push(`  ${mark} ${info.name} [${info.vectorSize}d] ${info.pointsCount} pts`);
      }
    }

    lines.push('', 'Collection links');
    for (const link of this.links.slice(0, MEMORY_MAP_LINK_LIMIT)) {
      lines.push(`  ${link.source} --${link.relationType}--> ${link.target}`);
    }
    if (this.links.length > MEMORY_MAP_LINK_LIMIT) {
      lines.push(`  ... and ${this.links.length - MEMORY_MAP_LINK_LIMIT} more links`);
    }

    return lines.join('\n');
  }

  /** Appends to the audit log when one is configured. */
  recordAudit(entry: AdminAuditInput): void {
    this.auditRepo?.record(entry);
  }

  // ── Internals (callers hold the state lock) ────────────────────

  private async refreshUnlocked(signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal, 'list collections');
    const names = await this.backend.listCollections();
    const fresh = new Map<string, CollectionInfo>();
    for (const name of names) {
      const info = await this.loadInfo(name, signal);
      if (info) fresh.set(name, info);
    }
    this.cache = fresh;
  }

  private async loadInfo(name: string, signal?: AbortSignal): Promise<CollectionInfo | null> {
    throwIfAborted(signal, `inspect ${name}`);
    const info = await this.backend.getCollectionInfo(name);
    if (!info) return null;
    return {
      name,
      vectorSize: info.vectorSize,
      pointsCount: info.pointsCount,
      distanceMetric: info.distance,
      status: info.status,
      ...this.purposeField(name),
      linkedCollections: this.linkedNames(name),
    };
  }

  private purposeField(name: string): { purpose?: string } {
    const purpose = this.purposes.get(name);
    return purpose ? { purpose } : {};
  }

  private linkedNames(name: string): string[] {
    const names = this.getLinkedCollections(name).map((l) => (l.source === name ? l.target : l.source));
    return [...new Set(names)];
  }

  private pushLink(link: CollectionLink): boolean {
    const exists = this.links.some(
      (l) => l.source === link.source && l.target === link.target && l.relationType === link.relationType,
    );
    if (!exists) this.links.push(link);
    return !exists;
  }
}

function assertCollectionName(name: string): void {
  const parsed = collectionNameSchema.safeParse(name);
  if (!parsed.success) {
    throw new ValidationError(`collection name "${name}": ${parsed.error.issues.map((i) => i.message).join('; ')}`);
  }
}

export function toHealthReport(info: CollectionInfo, expectedDimension: number): CollectionHealthReport {
  const mismatch = info.vectorSize !== expectedDimension && info.vectorSize > 0;
  return {
    collectionName: info.name,
    isHealthy: !mismatch && info.status === 'green',
    expectedDimension,
    actualDimension: info.vectorSize,
    dimensionMismatch: mismatch,
    ...(mismatch
      ? {
          issue: `Dimension mismatch: expected ${expectedDimension}, got ${info.vectorSize}`,
          recommendation: `Delete and recreate the collection, or migrate its vectors to ${expectedDimension} dimensions`,
        }
      : {}),
  };
}

export function computeStatistics(collections: CollectionInfo[], linkCount: number): MemoryStatistics {
  const dimensionDistribution: Record<number, number> = {};
  let totalVectors = 0;
  let healthy = 0;
  for (const c of collections) {
    totalVectors += c.pointsCount;
    if (c.status === 'green') healthy++;
    dimensionDistribution[c.vectorSize] = (dimensionDistribution[c.vectorSize] ?? 0) + 1;
  }
  return {
    totalCollections: collections.length,
    totalVectors,
    healthyCollections: healthy,
    unhealthyCollections: collections.length - healthy,
    collectionLinks: linkCount,
    dimensionDistribution,
  };
}
