/**
 * Abstract Storage interface.
 *
 * Key/value persistence of JSON-serializable documents. The bot keeps two
 * documents (`communities`, `post-log`); implementations decide the encoding.
 */
export interface Storage {
  /**
   * Load data by key.
   * @returns The data if found, null otherwise
   */
  load(key: string): Promise<unknown>;

  /**
   * Save data with a key. Resolves only once the data is durable.
   */
  save(key: string, data: unknown): Promise<void>;

  /**
   * Delete data by key.
   * @returns true if deleted, false if key didn't exist
   */
  delete(key: string): Promise<boolean>;

  /**
   * Check if a key exists.
   */
  exists(key: string): Promise<boolean>;
}
