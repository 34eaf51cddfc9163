/**
 * JSON Memory Store
 *
 * Keeps every entity and edge in memory and persists one document per
 * entity type (plus one for edges) through the Storage interface.
 * DeferredStorage is the usual backing store; strict durability uses
 * JSONStorage directly so a write completes before insert() returns.
 */

import type { Storage } from '../storage/storage.js';
import type { Logger } from '../types/logger.js';
import type { Edge, Entity, EntityOf, EntityType, Impression, Relation } from '../types/entities.js';
import type { HealthMonitor } from '../core/system-health.js';
import type { Durability, InsertOptions, InsertResult, MemoryStore, RecallHit } from './memory-store.js';
import { IntegrityError, StoreError, errorMessage } from '../core/errors.js';
import { entityDocumentSchema, edgeDocumentSchema } from './entity-schema.js';
import { rankImpressions, sensationDedupKey } from './recall.js';

const ENTITY_TYPES: readonly EntityType[] = [
  'sensation',
  'impression',
  'intention',
  'motor_call',
  'completion',
  'interruption',
  'lifecycle',
];

const EDGES_KEY = 'edges';

function entitiesKey(type: EntityType): string {
  return `entities-${type}`;
}

function edgeKey(edge: Edge): string {
  return `${edge.from}|${edge.relation}|${edge.to}`;
}

function isOfType<K extends EntityType>(entity: Entity, kind: K): entity is EntityOf<K> {
  return entity.type === kind;
}

export interface JsonMemoryStoreConfig {
  storage: Storage;
  durability: Durability;
  /** Unit name for logs and health records */
  unit?: string | undefined;
  health?: HealthMonitor | undefined;
}

/**
 * State shared by every handle of one store.
 */
export interface MemoryState {
  entities: Map<string, Entity>;
  /** Insertion-ordered; also the live body of each per-type document */
  byType: Map<EntityType, Entity[]>;
  dedup: Map<string, string>;
  edges: Edge[];
  edgeKeys: Set<string>;
  outgoing: Map<string, Edge[]>;
  incoming: Map<string, Edge[]>;
  locks: Map<string, Promise<void>>;
  loading: Promise<void> | null;
}

function createState(): MemoryState {
  return {
    entities: new Map(),
    byType: new Map(),
    dedup: new Map(),
    edges: [],
    edgeKeys: new Set(),
    outgoing: new Map(),
    incoming: new Map(),
    locks: new Map(),
    loading: null,
  };
}

export class JsonMemoryStore implements MemoryStore {
  private readonly config: JsonMemoryStoreConfig;
  private readonly rootLogger: Logger;
  private readonly logger: Logger;
  private readonly state: MemoryState;
  private readonly unit: string;

  constructor(logger: Logger, config: JsonMemoryStoreConfig, state: MemoryState = createState()) {
    this.config = config;
    this.rootLogger = logger;
    this.unit = config.unit ?? 'memory';
    this.logger = logger.child({ component: 'memory', unit: this.unit });
    this.state = state;
  }

  handle(unit: string): MemoryStore {
    return new JsonMemoryStore(this.rootLogger, { ...this.config, unit }, this.state);
  }

  async find(kind: EntityType, dedupKey: string): Promise<string | null> {
    await this.ensureLoaded();
    if (kind === 'sensation') {
      const id = this.state.dedup.get(dedupKey);
      if (id !== undefined) return id;
    }
    const entity = this.state.entities.get(dedupKey);
    return entity?.type === kind ? entity.id : null;
  }

  async insert(entity: Entity, options: InsertOptions = {}): Promise<InsertResult> {
    await this.ensureLoaded();

    const sources = options.sources ?? [];
    if (entity.type === 'impression' && sources.length === 0) {
      throw new IntegrityError(`Impression ${entity.id} has no sources to summarize`);
    }

    const dedupKey = entity.type === 'sensation' ? sensationDedupKey(entity) : undefined;
    const lockKey = dedupKey !== undefined ? `dedup:${dedupKey}` : `id:${entity.id}`;

    return this.serialize(lockKey, async () => {
      const existing = (dedupKey !== undefined ? this.state.dedup.get(dedupKey) : undefined) ??
        (this.state.entities.has(entity.id) ? entity.id : undefined);
      if (existing !== undefined) {
        this.logger.debug({ id: existing, type: entity.type }, 'Entity already stored');
        return { id: existing, created: false };
      }

      const missing = sources.filter((id) => !this.state.entities.has(id));
      if (missing.length > 0) {
        throw new IntegrityError(`Impression ${entity.id} summarizes unknown entities: ${missing.join(', ')}`);
      }

      this.addEntity(entity, dedupKey);
      const added = sources
        .map((to) => ({ from: entity.id, relation: 'SUMMARIZES' as const, to }))
        .filter((edge) => this.addEdge(edge));

      const keys = added.length > 0 ? [entitiesKey(entity.type), EDGES_KEY] : [entitiesKey(entity.type)];
      try {
        await this.persist(keys);
      } catch (error) {
        for (const edge of added) this.removeEdge(edge);
        this.removeEntity(entity, dedupKey);
        throw error;
      }

      return { id: entity.id, created: true };
    });
  }

  async link(from: string, relation: Relation, to: string): Promise<void> {
    await this.ensureLoaded();

    for (const id of [from, to]) {
      if (!this.state.entities.has(id)) {
        throw new IntegrityError(`Cannot link ${relation}: unknown entity ${id}`);
      }
    }

    const edge: Edge = { from, relation, to };
    if (!this.addEdge(edge)) {
      return;
    }
    try {
      await this.persist([EDGES_KEY]);
    } catch (error) {
      this.removeEdge(edge);
      throw error;
    }
  }

  async get(id: string): Promise<Entity | null> {
    await this.ensureLoaded();
    return this.state.entities.get(id) ?? null;
  }

  async list<K extends EntityType>(kind: K): Promise<EntityOf<K>[]> {
    await this.ensureLoaded();
    return this.collect(kind, this.state.byType.get(kind) ?? []);
  }

  async recent<K extends EntityType>(kind: K, limit: number): Promise<EntityOf<K>[]> {
    await this.ensureLoaded();
    if (limit <= 0) return [];
    const entities = this.state.byType.get(kind) ?? [];
    return this.collect(kind, entities.slice(-limit));
  }

  async edgesFrom(id: string, relation?: Relation): Promise<Edge[]> {
    await this.ensureLoaded();
    const edges = this.state.outgoing.get(id) ?? [];
    return relation ? edges.filter((e) => e.relation === relation) : [...edges];
  }

  async edgesTo(id: string, relation?: Relation): Promise<Edge[]> {
    await this.ensureLoaded();
    const edges = this.state.incoming.get(id) ?? [];
    return relation ? edges.filter((e) => e.relation === relation) : [...edges];
  }

  async lineage(id: string): Promise<Entity[]> {
    await this.ensureLoaded();

    const result: Entity[] = [];
    const visited = new Set<string>([id]);
    const queue = [id];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      for (const edge of this.state.outgoing.get(current) ?? []) {
        if (edge.relation !== 'SUMMARIZES' && edge.relation !== 'FEEDBACK_OF') continue;
        if (visited.has(edge.to)) continue;
        visited.add(edge.to);
        const entity = this.state.entities.get(edge.to);
        if (entity) {
          result.push(entity);
          queue.push(edge.to);
        }
      }
    }
    return result;
  }

  async recall(query: string, limit: number): Promise<RecallHit[]> {
    const impressions: Impression[] = await this.list('impression');
    const hits = rankImpressions(impressions, query, limit);
    this.logger.debug({ query, results: hits.length, limit }, 'Recall completed');
    return hits;
  }

  private collect<K extends EntityType>(kind: K, entities: readonly Entity[]): EntityOf<K>[] {
    const result: EntityOf<K>[] = [];
    for (const entity of entities) {
      if (isOfType(entity, kind)) {
        result.push(entity);
      }
    }
    return result;
  }

  private addEntity(entity: Entity, dedupKey: string | undefined): void {
    this.state.entities.set(entity.id, entity);
    const list = this.state.byType.get(entity.type);
    if (list) {
      list.push(entity);
    } else {
      this.state.byType.set(entity.type, [entity]);
    }
    if (dedupKey !== undefined) {
      this.state.dedup.set(dedupKey, entity.id);
    }
  }

  private removeEntity(entity: Entity, dedupKey: string | undefined): void {
    this.state.entities.delete(entity.id);
    // Rolled-back inserts are almost always the newest entry
    const list = this.state.byType.get(entity.type);
    const index = list ? list.lastIndexOf(entity) : -1;
    if (list && index >= 0) {
      list.splice(index, 1);
    }
    if (dedupKey !== undefined) {
      this.state.dedup.delete(dedupKey);
    }
  }

  /**
   * @returns false when the edge already existed
   */
  private addEdge(edge: Edge): boolean {
    const key = edgeKey(edge);
    if (this.state.edgeKeys.has(key)) {
      return false;
    }
    this.state.edgeKeys.add(key);
    this.state.edges.push(edge);
    const out = this.state.outgoing.get(edge.from) ?? [];
    out.push(edge);
    this.state.outgoing.set(edge.from, out);
    const inc = this.state.incoming.get(edge.to) ?? [];
    inc.push(edge);
    this.state.incoming.set(edge.to, inc);
    return true;
  }

  private removeEdge(edge: Edge): void {
    this.state.edgeKeys.delete(edgeKey(edge));
    const index = this.state.edges.lastIndexOf(edge);
    if (index >= 0) {
      this.state.edges.splice(index, 1);
    }
    this.state.outgoing.set(
      edge.from,
      (this.state.outgoing.get(edge.from) ?? []).filter((e) => e !== edge)
    );
    this.state.incoming.set(
      edge.to,
      (this.state.incoming.get(edge.to) ?? []).filter((e) => e !== edge)
    );
  }

  /**
   * Run `fn` after every earlier task under the same key has settled.
   */
  private async serialize<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const locks = this.state.locks;
    const previous = locks.get(key) ?? Promise.resolve();
    const run = previous.then(fn);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    locks.set(key, tail);
    try {
      return await run;
    } finally {
      if (locks.get(key) === tail) {
        locks.delete(key);
      }
    }
  }

  /**
   * A new wrapper around the live array on every call; DeferredStorage
   * compares by identity to tell a newer save from the one it wrote.
   */
  private document(key: string): unknown {
    if (key === EDGES_KEY) {
      return { version: 1, edges: this.state.edges };
    }
    const type = ENTITY_TYPES.find((t) => entitiesKey(t) === key);
    const entities = type ? this.state.byType.get(type) : undefined;
    return { version: 1, entities: entities ?? [] };
  }

  /**
   * Write the documents for `keys`. In best-effort mode a failure is logged
   * and recorded as a health failure; in strict mode it is thrown.
   */
  private async persist(keys: readonly string[]): Promise<void> {
    for (const key of keys) {
      try {
        await this.serialize(`storage:${key}`, () => this.config.storage.save(key, this.document(key)));
        this.config.health?.recordSuccess(this.unit, 'store');
      } catch (error) {
        this.logger.error({ key, error: errorMessage(error), durability: this.config.durability }, 'Memory write failed');
        this.config.health?.recordFailure(this.unit, 'store', errorMessage(error));
        if (this.config.durability === 'strict') {
          throw new StoreError(`Failed to persist ${key}`, { cause: error });
        }
      }
    }
  }

  private ensureLoaded(): Promise<void> {
    this.state.loading ??= this.load();
    return this.state.loading;
  }

  private async load(): Promise<void> {
    let loaded = 0;
    for (const type of ENTITY_TYPES) {
      const data = await this.loadDocument(entitiesKey(type));
      if (data === null) continue;
      const parsed = entityDocumentSchema.safeParse(data);
      if (!parsed.success) {
        this.handleCorrupt(entitiesKey(type), parsed.error.message);
        continue;
      }
      for (const entity of parsed.data.entities) {
        this.addEntity(entity, entity.type === 'sensation' ? sensationDedupKey(entity) : undefined);
        loaded++;
      }
    }

    const edgeData = await this.loadDocument(EDGES_KEY);
    if (edgeData !== null) {
      const parsed = edgeDocumentSchema.safeParse(edgeData);
      if (parsed.success) {
        for (const edge of parsed.data.edges) this.addEdge(edge);
      } else {
        this.handleCorrupt(EDGES_KEY, parsed.error.message);
      }
    }

    if (loaded > 0) {
      this.logger.info({ entities: loaded, edges: this.state.edges.length }, 'Memory loaded from storage');
    } else {
      this.logger.info('No existing memory, starting fresh');
    }
  }

  private async loadDocument(key: string): Promise<unknown> {
    try {
      return await this.config.storage.load(key);
    } catch (error) {
      this.handleCorrupt(key, errorMessage(error));
      return null;
    }
  }

  private handleCorrupt(key: string, detail: string): void {
    this.logger.error({ key, error: detail }, 'Failed to load memory document');
    if (this.config.durability === 'strict') {
      throw new StoreError(`Memory document ${key} is unreadable: ${detail}`);
    }
  }
}

export function createJsonMemoryStore(logger: Logger, config: JsonMemoryStoreConfig): JsonMemoryStore {
  return new JsonMemoryStore(logger, config);
}
