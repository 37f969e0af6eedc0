import type { CacheEntry } from '@shared/interfaces/common'

export interface TtlCacheOptions {
  maxSize?: number
  now?: () => number
}

export interface TtlCacheStats {
  hits: number
  misses: number
  evictions: number
  size: number
}

const DEFAULT_MAX_SIZE = 10_000

export class TtlCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>()
  private readonly maxSize: number
  private readonly now: () => number
  private hits = 0
  private misses = 0
  private evictions = 0

  constructor(options: TtlCacheOptions = {}) {
    this.maxSize = options.maxSize ?? DEFAULT_MAX_SIZE
    this.now = options.now ?? Date.now
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key)
    if (!entry) {
      this.misses += 1
      return undefined
    }

    if (this.isExpired(entry)) {
      this.entries.delete(key)
      this.misses += 1
      return undefined
    }

    this.hits += 1
    return entry.value
  }

  set(key: string, value: T, ttlMs: number): void {
    // Re-inserting moves the key to the back of the eviction order
    this.entries.delete(key)

    while (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next()
      if (oldest.done) break
      this.entries.delete(oldest.value)
      this.evictions += 1
    }

    this.entries.set(key, { value, insertedAt: this.now(), ttlMs })
  }

  delete(key: string): boolean {
    return this.entries.delete(key)
  }

  clear(): void {
    this.entries.clear()
  }

  cleanupExpired(): number {
    let removed = 0
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(key)
        removed += 1
      }
    }
    return removed
  }

  get size(): number {
    return this.entries.size
  }

  getStats(): TtlCacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      size: this.entries.size
    }
  }

  private isExpired(entry: CacheEntry<T>): boolean {
    return this.now() - entry.insertedAt >= entry.ttlMs
  }
}
