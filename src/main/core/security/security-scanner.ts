import { logger } from '@infra/logging'
import { UNROUTABLE_REMOTE_ADDRESSES } from '@config/constants'
import { DEFAULT_SETTINGS } from '@config/settings'
import type { Settings } from '@config/settings'
import type {
  ClassifiedConnection,
  ConnectionRecord,
  GeoRecord,
  ScanReport
} from '@shared/interfaces/common'
import { isLocalOrPrivate, isValidIp } from '@shared/utils/address-classifier'
import type { GeoLocationService } from '../network/geo-location'
import { classifyConnection } from './risk-classifier'
import { aggregate, topCountries } from './security-aggregator'

export type ConnectionSource = Iterable<ConnectionRecord> | AsyncIterable<ConnectionRecord>

export interface ScanOptions {
  limit?: number
  signal?: AbortSignal
}

type Resolver = Pick<GeoLocationService, 'bulkLookup'>

function hasRemoteEndpoint(record: ConnectionRecord): boolean {
  const address = typeof record.remoteAddress === 'string' ? record.remoteAddress.trim() : ''
  return !UNROUTABLE_REMOTE_ADDRESSES.has(address) && Number.isInteger(record.remotePort)
}

export class SecurityScanner {
  constructor(
    private readonly resolver: Resolver,
    private readonly settings: Settings = DEFAULT_SETTINGS,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Classifies a snapshot of connections. Records without a usable remote endpoint are skipped,
   * never rejected. Remote addresses whose lookup was cancelled or cut by the lookup limit get a
   * `skipped` geo record and are classified on their port alone.
   */
  async scan(source: ConnectionSource, options: ScanOptions = {}): Promise<ScanReport> {
    const startedAt = this.now()
    const limit = options.limit ?? this.settings.scanLimit

    const records: ConnectionRecord[] = []
    let skippedRecords = 0
    for await (const record of source) {
      if (records.length + skippedRecords >= limit) break
      if (hasRemoteEndpoint(record)) {
        records.push({ ...record, remoteAddress: record.remoteAddress.trim() })
      } else {
        skippedRecords += 1
      }
    }

    const remoteAddresses = records.map((record) => record.remoteAddress)
    const geoByAddress = await this.resolver.bulkLookup(remoteAddresses, {
      signal: options.signal
    })
    const cancelled = options.signal?.aborted === true

    const connections: ClassifiedConnection[] = records.map((record) =>
      classifyConnection(
        record,
        geoByAddress.get(record.remoteAddress) ?? unresolved(record.remoteAddress, cancelled),
        this.settings.risk
      )
    )

    const summary = aggregate(connections, {
      policy: this.settings.risk,
      gradeThresholds: this.settings.gradeThresholds
    })
    const privateConnections = connections.filter((conn) =>
      isLocalOrPrivate(conn.connection.remoteAddress)
    ).length
    const geoLookups = [...geoByAddress.values()].filter((geo) => !geo.isLocal).length

    logger.info('Security scan complete', {
      connections: connections.length,
      skipped: skippedRecords,
      score: summary.score,
      grade: summary.grade
    })

    return {
      connections,
      summary,
      topCountries: topCountries(connections),
      externalConnections: connections.length - privateConnections,
      privateConnections,
      metadata: {
        timestamp: new Date(startedAt).toISOString(),
        connectionsScanned: connections.length,
        skippedRecords,
        geoLookups,
        durationMs: this.now() - startedAt
      }
    }
  }
}

function unresolved(ip: string, cancelled: boolean): GeoRecord {
  const record: GeoRecord = isValidIp(ip)
    ? { ip, status: 'skipped', message: cancelled ? 'Lookup cancelled' : 'Lookup skipped' }
    : { ip, status: 'error', message: 'Invalid IP address' }
  return Object.freeze(record)
}
