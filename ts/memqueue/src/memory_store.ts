import type { KeyValueStore } from "./store"

interface StoreEntry {
  value: string
  expiresAt: number | null // null = no expiration
}

export type MemoryKeyValueStoreOptions = {
  /** Expire every written key after this many seconds, the way a cache evicts buckets */
  keyTtlSeconds?: number
}

/**
 * In-memory implementation of KeyValueStore for local development and testing.
 * Uses lazy expiration (checks TTL on access). `append` keeps the key's expiry,
 * as memcached and Redis do.
 */
export class MemoryKeyValueStore implements KeyValueStore {
  private store = new Map<string, StoreEntry>()
  private readonly ttlMs: number | null

  constructor(options: MemoryKeyValueStoreOptions = {}) {
    this.ttlMs = options.keyTtlSeconds === undefined ? null : options.keyTtlSeconds * 1000
  }

  async get(key: string): Promise<string | null> {
    return this.read(key)?.value ?? null
  }

  async set(key: string, value: string): Promise<void> {
    this.store.set(key, { value, expiresAt: this.nextExpiry() })
  }

  async add(key: string, value: string): Promise<boolean> {
    if (this.read(key)) {
      return false
    }
    this.store.set(key, { value, expiresAt: this.nextExpiry() })
    return true
  }

  async append(key: string, suffix: string): Promise<boolean> {
    const entry = this.read(key)
    if (!entry) {
      return false
    }
    entry.value += suffix
    return true
  }

  async delete(key: string): Promise<boolean> {
    const existed = this.read(key) !== undefined
    this.store.delete(key)
    return existed
  }

  async close(): Promise<void> {
    return
  }

  private read(key: string): StoreEntry | undefined {
    const entry = this.store.get(key)
    if (!entry) return undefined

    // Lazy expiration check
    if (entry.expiresAt !== null && Date.now() > entry.expiresAt) {
      this.store.delete(key)
      return undefined
    }

    return entry
  }

  private nextExpiry(): number | null {
    return this.ttlMs === null ? null : Date.now() + this.ttlMs
  }

  // --- Test Helpers ---

  /** Clear all data (useful for test cleanup) */
  clear(): void {
    this.store.clear()
  }

  /** Get raw store size, expired entries included */
  size(): number {
    return this.store.size
  }

  /** Live keys, in insertion order */
  keys(): string[] {
    return [...this.store.keys()].filter((k) => this.read(k) !== undefined)
  }
}
