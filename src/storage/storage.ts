/**
 * Abstract Storage interface.
 *
 * Document persistence under the memory layer: one JSON-serializable
 * document per key. Implementations can use JSON files, SQLite, Redis, etc.
 */
export interface Storage {
  /**
   * Load data by key.
   * @returns The data if found, null otherwise
   */
  load(key: string): Promise<unknown>;

  /**
   * Save data under a key, replacing what was there.
   */
  save(key: string, data: unknown): Promise<void>;
}
