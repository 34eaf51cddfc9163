import type {
  Edge,
  Entity,
  EntityOf,
  EntityType,
  Impression,
  Relation,
} from '../types/entities.js';

/**
 * How hard a failed write is taken.
 * - best-effort: log, record a health failure, keep the in-memory effect
 * - strict: the write error reaches the caller
 */
export type Durability = 'best-effort' | 'strict';

export interface InsertOptions {
  /**
   * Ids the entity summarizes. Required (non-empty) for impressions; one
   * SUMMARIZES edge is recorded per id.
   */
  sources?: readonly string[] | undefined;
}

export interface InsertResult {
  id: string;
  /** False when an identical entity was already stored (the existing id is returned) */
  created: boolean;
}

export interface RecallHit {
  impression: Impression;
  /** Text trimmed for prompts */
  excerpt: string;
  score: number;
}

/**
 * Memory layer port.
 *
 * Every unit talks to memory only through this interface. Writes to the
 * same entity (or the same sensation dedup key) are serialized; writes to
 * distinct ids never wait on each other.
 */
export interface MemoryStore {
  /**
   * Id of an entity of `kind` stored under `dedupKey`, or null.
   * Sensations are keyed by {@link sensationDedupKey}; other kinds by id.
   */
  find(kind: EntityType, dedupKey: string): Promise<string | null>;

  /**
   * Insert if absent. Sensations with the same dedup key, and entities with
   * an id already stored, return the stored id with `created: false`.
   *
   * @throws IntegrityError for an impression without sources
   */
  insert(entity: Entity, options?: InsertOptions): Promise<InsertResult>;

  /**
   * Record a relationship. Both ends must exist; repeated links are no-ops.
   */
  link(from: string, relation: Relation, to: string): Promise<void>;

  get(id: string): Promise<Entity | null>;

  list<K extends EntityType>(kind: K): Promise<EntityOf<K>[]>;

  /** Newest `limit` entities of `kind`, oldest first */
  recent<K extends EntityType>(kind: K, limit: number): Promise<EntityOf<K>[]>;

  edgesFrom(id: string, relation?: Relation): Promise<Edge[]>;

  edgesTo(id: string, relation?: Relation): Promise<Edge[]>;

  /**
   * Every entity reachable from `id` through SUMMARIZES and FEEDBACK_OF,
   * nearest first. The entity itself is not included.
   */
  lineage(id: string): Promise<Entity[]>;

  /**
   * Impressions related to `query`, most relevant first.
   */
  recall(query: string, limit: number): Promise<RecallHit[]>;

  /**
   * A view of the same memory whose logs and health records carry `unit`.
   */
  handle(unit: string): MemoryStore;
}
