/**
 * Key/value persistence for pipeline state.
 *
 * Keys in use: `delivery-queue`, `delivery-dead-letter`, `encounters`.
 * Values are plain JSON; callers validate what they load.
 */
export interface Storage {
  /**
   * Load data by key.
   * @returns The data if found, null otherwise
   */
  load(key: string): Promise<unknown>;

  /** Save data under a key, replacing any previous value. */
  save(key: string, data: unknown): Promise<void>;

  /**
   * Delete data by key.
   * @returns true if deleted, false if the key didn't exist
   */
  delete(key: string): Promise<boolean>;

  exists(key: string): Promise<boolean>;
}
