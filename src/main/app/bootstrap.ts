import { logger } from '@infra/logging'
import { loadSettings } from '@config/settings'
import type { Settings } from '@config/settings'
import { GeoLocationService } from '@core/network/geo-location'
import { createProviders } from '@core/network/geo-providers'
import type { GeoProvider } from '@core/network/geo-providers'
import { SecurityScanner } from '@core/security/security-scanner'
import type { ConnectionSource, ScanOptions } from '@core/security/security-scanner'
import { InvalidAddressError } from '@shared/errors'
import type { GeoRecord, ScanReport } from '@shared/interfaces/common'
import { validateIpAddress } from '@shared/utils/ip-validator'

export interface SecurityCoreDeps {
  providers?: GeoProvider[]
  now?: () => number
  sleep?: (ms: number) => Promise<void>
}

export interface SecurityCore {
  readonly settings: Settings
  readonly resolver: GeoLocationService
  readonly scanner: SecurityScanner
  lookupAddress(raw: unknown): Promise<GeoRecord>
  scan(source: ConnectionSource, options?: ScanOptions): Promise<ScanReport>
  close(): Promise<void>
}

/**
 * Builds the resolver and scanner once for the lifetime of the surrounding service.
 * Call `close()` at shutdown to wait for in-flight lookups and drop the cache.
 */
export function createSecurityCore(
  settings: Settings = loadSettings(),
  deps: SecurityCoreDeps = {}
): SecurityCore {
  if (settings.logLevel) logger.setLevel(settings.logLevel)

  const providers = deps.providers ?? createProviders(settings.geo.providers)
  const resolver = new GeoLocationService({
    providers,
    settings: settings.geo,
    circuitBreaker: settings.circuitBreaker,
    now: deps.now,
    sleep: deps.sleep
  })
  const scanner = new SecurityScanner(resolver, settings, deps.now)
  let closed = false

  const ensureOpen = (): void => {
    if (closed) throw new Error('Security core has been closed')
  }

  logger.info('Security core started', {
    providers: providers.map((provider) => provider.name),
    bulkConcurrency: settings.geo.bulkConcurrency
  })

  return {
    settings,
    resolver,
    scanner,

    async lookupAddress(raw: unknown): Promise<GeoRecord> {
      ensureOpen()
      const result = validateIpAddress(raw)
      if (!result.valid) {
        logger.error('Invalid IP address parameter', { ip: raw, reason: result.error })
        throw new InvalidAddressError(raw, result.error)
      }
      return resolver.resolve(result.ip)
    },

    async scan(source: ConnectionSource, options?: ScanOptions): Promise<ScanReport> {
      ensureOpen()
      return scanner.scan(source, options)
    },

    async close(): Promise<void> {
      if (closed) return
      closed = true
      await resolver.close()
      logger.info('Security core stopped')
    }
  }
}
