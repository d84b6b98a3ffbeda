/**
 * Deduplication cache with TTL and max size limits.
 *
 * GitHub redelivers webhooks on timeouts and on manual "Redeliver"; keyed by
 * head commit, this keeps one push from starting two deployments.
 */

export type DedupeCache = {
  /**
   * Check if a key was recently seen.
   * Returns true if duplicate (seen within TTL), false if new.
   * Automatically adds/refreshes the key in the cache.
   */
  check: (key: string | undefined | null, now?: number) => boolean
  /** Check if key exists without updating it */
  has: (key: string, now?: number) => boolean
  /** Remove a specific key so its next delivery counts as new */
  delete: (key: string) => boolean
  clear: () => void
  size: () => number
}

export type DedupeCacheOptions = {
  /** Time-to-live in milliseconds. Entries older than this are considered expired. */
  ttlMs: number
  /** Maximum number of entries. Oldest entries are evicted when exceeded. */
  maxSize: number
}

/**
 * Create a deduplication cache.
 *
 * @example
 * ```ts
 * const deliveries = createDedupeCache({ ttlMs: 5 * 60_000, maxSize: 100 })
 *
 * if (deliveries.check(event.after)) {
 *   return c.json({ deduplicated: true })
 * }
 * ```
 */
export function createDedupeCache(options: DedupeCacheOptions): DedupeCache {
  const ttlMs = Math.max(0, options.ttlMs)
  const maxSize = Math.max(0, Math.floor(options.maxSize))
  const cache = new Map<string, number>()

  const isLive = (seenAt: number, now: number) => ttlMs <= 0 || now - seenAt < ttlMs

  // Map iteration order is insertion order, so re-inserting marks a key as newest
  const touch = (key: string, now: number) => {
    cache.delete(key)
    cache.set(key, now)
  }

  const prune = (now: number) => {
    for (const [entryKey, seenAt] of cache) {
      if (!isLive(seenAt, now)) {
        cache.delete(entryKey)
      }
    }

    if (maxSize <= 0) {
      cache.clear()
      return
    }
    for (const oldestKey of cache.keys()) {
      if (cache.size <= maxSize) {
        break
      }
      cache.delete(oldestKey)
    }
  }

  return {
    check: (key, now = Date.now()) => {
      if (!key) {
        return false
      }
      const seenAt = cache.get(key)
      const duplicate = seenAt !== undefined && isLive(seenAt, now)
      touch(key, now)
      if (!duplicate) {
        prune(now)
      }
      return duplicate
    },
    has: (key, now = Date.now()) => {
      const seenAt = cache.get(key)
      if (seenAt === undefined) {
        return false
      }
      if (!isLive(seenAt, now)) {
        cache.delete(key)
        return false
      }
      return true
    },
    delete: key => cache.delete(key),
    clear: () => {
      cache.clear()
    },
    size: () => cache.size,
  }
}
