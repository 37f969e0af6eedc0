import { logger } from '@infra/logging'
import { DEFAULT_SETTINGS } from '@config/settings'
import type { CircuitBreakerSettings, GeoSettings } from '@config/settings'
import { GeoProviderError } from '@shared/errors'
import type { GeoRecord, ResolverStats } from '@shared/interfaces/common'
import { isLocalOrPrivate, isValidIp } from '@shared/utils/address-classifier'
import { runWithConcurrency } from '@shared/utils/task-pool'
import { CircuitBreaker } from './circuit-breaker'
import type { GeoProvider, ProviderAnswer } from './geo-providers'
import { TtlCache } from './ttl-cache'

type ProviderOutcome = ProviderAnswer | { kind: 'error'; message: string }

// Cached records are handed to every caller, so none of them may be mutated
function frozen(record: GeoRecord): GeoRecord {
  return Object.freeze(record)
}

export interface GeoLocationServiceOptions {
  providers: GeoProvider[]
  settings?: GeoSettings
  circuitBreaker?: CircuitBreakerSettings
  cache?: TtlCache<GeoRecord>
  now?: () => number
  sleep?: (ms: number) => Promise<void>
}

export interface BulkLookupOptions {
  concurrency?: number
  signal?: AbortSignal
}

export class GeoLocationService {
  private readonly providers: GeoProvider[]
  private readonly settings: GeoSettings
  private readonly locationCache: TtlCache<GeoRecord>
  private readonly pendingRequests: Map<string, Promise<GeoRecord>>
  private readonly circuitBreaker: CircuitBreaker
  private readonly sleep: (ms: number) => Promise<void>
  private stats = {
    requests: 0,
    cacheHits: 0,
    cacheMisses: 0,
    errors: 0,
    circuitBreakerBlocks: 0
  }

  constructor(options: GeoLocationServiceOptions) {
    this.providers = options.providers
    this.settings = options.settings ?? DEFAULT_SETTINGS.geo
    this.locationCache =
      options.cache ?? new TtlCache({ maxSize: this.settings.cacheMaxSize, now: options.now })
    this.pendingRequests = new Map()
    this.circuitBreaker = new CircuitBreaker({
      ...(options.circuitBreaker ?? DEFAULT_SETTINGS.circuitBreaker),
      now: options.now
    })
    this.sleep = options.sleep ?? ((ms) => new Promise<void>((resolve) => setTimeout(resolve, ms)))
  }

  /**
   * Resolves the origin of `ip`. Never rejects: provider and transport failures come back as
   * `fail` or `error` records and are cached for the negative TTL.
   */
  async resolve(ip: string): Promise<GeoRecord> {
    if (!isValidIp(ip)) {
      return frozen({ ip, status: 'error', message: 'Invalid IP address' })
    }

    const cached = this.locationCache.get(ip)
    if (cached) {
      this.stats.cacheHits += 1
      return cached
    }

    // Registration must stay before the first await so concurrent callers share one lookup
    const pending = this.pendingRequests.get(ip)
    if (pending) return pending

    this.stats.cacheMisses += 1
    const request = this.performLookup(ip).finally(() => {
      this.pendingRequests.delete(ip)
    })
    this.pendingRequests.set(ip, request)
    return request
  }

  async bulkLookup(
    ips: readonly string[],
    options: BulkLookupOptions = {}
  ): Promise<Map<string, GeoRecord>> {
    const unique = [...new Set(ips.map((ip) => ip.trim()).filter((ip) => isValidIp(ip)))]

    let publicCount = 0
    const selected = unique.filter((ip) => {
      if (isLocalOrPrivate(ip)) return true
      publicCount += 1
      return publicCount <= this.settings.lookupLimit
    })

    if (selected.length < unique.length) {
      logger.warn('Bulk lookup truncated to the configured limit', {
        requested: unique.length,
        limit: this.settings.lookupLimit
      })
    }

    const results = new Map<string, GeoRecord>()
    await runWithConcurrency(
      selected,
      options.concurrency ?? this.settings.bulkConcurrency,
      async (ip) => {
        results.set(ip, await this.resolve(ip))
      },
      options.signal
    )

    if (options.signal?.aborted) {
      logger.info('Bulk lookup cancelled', { completed: results.size, requested: selected.length })
    }

    return results
  }

  private async performLookup(ip: string): Promise<GeoRecord> {
    if (isLocalOrPrivate(ip)) {
      return this.store(frozen({ ip, status: 'success', isLocal: true }))
    }

    // Blocked results bypass the cache
    if (!this.circuitBreaker.canExecute()) {
      this.stats.circuitBreakerBlocks += 1
      return frozen({
        ip,
        status: 'error',
        message: 'Service temporarily unavailable (circuit breaker open)'
      })
    }

    this.stats.requests += 1
    let record: GeoRecord
    try {
      record = await this.queryProviders(ip)
    } catch (error) {
      logger.error(`GeoIP lookup error for ${ip}`, error)
      const message = error instanceof Error ? error.message : String(error)
      record = { ip, status: 'error', message }
    }

    if (record.status === 'error') {
      this.stats.errors += 1
      this.circuitBreaker.recordFailure()
    } else {
      this.circuitBreaker.recordSuccess()
    }

    return this.store(frozen(record))
  }

  private async queryProviders(ip: string): Promise<GeoRecord> {
    let notFoundMessage: string | undefined
    let lastError = 'No geolocation providers configured'

    for (const provider of this.providers) {
      const outcome = await this.queryWithRetry(provider, ip)

      if (outcome.kind === 'found') {
        return { ...outcome.record, ip, status: 'success' }
      }

      if (outcome.kind === 'not-found') {
        logger.debug(`Provider ${provider.name} has no data for ${ip}`, {
          message: outcome.message
        })
        notFoundMessage ??= outcome.message
      } else {
        lastError = outcome.message
      }
    }

    if (notFoundMessage !== undefined) {
      return { ip, status: 'fail', message: notFoundMessage }
    }
    return { ip, status: 'error', message: lastError }
  }

  private async queryWithRetry(provider: GeoProvider, ip: string): Promise<ProviderOutcome> {
    const maxAttempts = this.settings.maxRetries
    let lastMessage = `${provider.name} was not attempted`

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      try {
        return await provider.lookup(ip, AbortSignal.timeout(this.settings.timeoutMs))
      } catch (error) {
        const retryable = error instanceof GeoProviderError && error.retryable
        lastMessage = error instanceof Error ? error.message : String(error)

        logger.warn(`Geolocation provider ${provider.name} failed for ${ip}`, {
          attempt,
          retryable,
          error: lastMessage
        })

        if (!retryable || attempt === maxAttempts) break
        await this.sleep(this.backoffDelay(attempt))
      }
    }

    return { kind: 'error', message: lastMessage }
  }

  private backoffDelay(attempt: number): number {
    const { backoffBaseMs, backoffMaxMs } = this.settings
    return Math.min(backoffBaseMs * 2 ** (attempt - 1), backoffMaxMs)
  }

  private store(record: GeoRecord): GeoRecord {
    const ttlMs =
      record.status === 'success' ? this.settings.cacheTtlMs : this.settings.negativeCacheTtlMs
    this.locationCache.set(record.ip, record, ttlMs)
    return record
  }

  getStats(): ResolverStats {
    const lookups = this.stats.cacheHits + this.stats.cacheMisses
    const hitRate = lookups > 0 ? (this.stats.cacheHits / lookups) * 100 : 0

    return {
      ...this.stats,
      cacheHitRate: Math.round(hitRate * 100) / 100,
      circuitBreakerState: this.circuitBreaker.state,
      cacheSize: this.locationCache.size,
      pending: this.pendingRequests.size
    }
  }

  cleanupExpired(): number {
    const removed = this.locationCache.cleanupExpired()
    if (removed > 0) logger.debug('Removed expired geolocation entries', { removed })
    return removed
  }

  clearCache(): void {
    this.locationCache.clear()
    logger.debug('GeoLocation cache cleared')
  }

  getCacheSize(): number {
    return this.locationCache.size
  }

  async close(): Promise<void> {
    await Promise.allSettled([...this.pendingRequests.values()])

    this.locationCache.clear()
    this.pendingRequests.clear()
    this.circuitBreaker.reset()
    logger.info('GeoLocationService closed')
  }
}
