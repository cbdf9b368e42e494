/**
 * The primitive operations the queue needs from a shared cache.
 * Atomicity is only required within a single call.
 */
export interface KeyValueStore {
  /** Retrieves a raw string, or null if the key is absent */
  get(key: string): Promise<string | null>

  /** Unconditional write. Rejects if the cache cannot be reached. */
  set(key: string, value: string): Promise<void>

  /**
   * Atomically creates the key (SET NX / memcached ADD).
   * Returns false if the key already exists.
   */
  add(key: string, value: string): Promise<boolean>

  /**
   * Atomically appends to an existing value.
   * Returns false, and writes nothing, if the key is absent.
   */
  append(key: string, suffix: string): Promise<boolean>

  /** Returns true if a key was removed */
  delete(key: string): Promise<boolean>

  /** Releases the underlying connection */
  close(): Promise<void>
}
