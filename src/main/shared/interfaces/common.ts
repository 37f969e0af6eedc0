export type TransportProtocol = 'TCP' | 'UDP'

export interface ConnectionRecord {
  protocol: TransportProtocol
  localAddress: string
  remoteAddress: string
  remotePort: number
  status: string
  processName: string
  pid?: number
}

/**
 * `fail` and `error` are lookup outcomes. `skipped` marks an address that was never looked up
 * (cut by the lookup limit or by cancellation) and says nothing about its origin.
 */
export type GeoStatus = 'success' | 'fail' | 'error' | 'skipped'

export function isGeoFailure(status: GeoStatus | undefined): boolean {
  return status === 'fail' || status === 'error'
}

export interface GeoRecord {
  ip: string
  status: GeoStatus
  city?: string
  region?: string
  country?: string
  countryCode?: string
  lat?: number
  lon?: number
  timezone?: string
  isp?: string
  org?: string
  asn?: string
  message?: string
  isLocal?: boolean
  provider?: string
}

export interface CacheEntry<T> {
  value: T
  insertedAt: number
  ttlMs: number
}

export const RISK_LEVELS = ['info', 'warning', 'danger'] as const

export type RiskLevel = (typeof RISK_LEVELS)[number]

export interface RiskAssessment {
  risk: RiskLevel
  reasons: string[]
}

export interface ClassifiedConnection {
  readonly connection: Readonly<ConnectionRecord>
  readonly geo: Readonly<GeoRecord>
  readonly risk: RiskLevel
  readonly reasons: readonly string[]
}

/**
 * Loosest shape the aggregator accepts. Records decoded from JSON or produced by
 * older collectors may be missing any of these fields.
 */
export interface AggregatableConnection {
  risk?: string
  connection?: Partial<Pick<ConnectionRecord, 'remoteAddress' | 'remotePort' | 'processName'>>
  geo?: Partial<Pick<GeoRecord, 'status' | 'country'>>
}

export type SecurityGrade = 'excellent' | 'good' | 'moderate' | 'high-risk' | 'critical'

export interface SecuritySummary {
  totalConnections: number
  counts: Record<RiskLevel, number>
  suspiciousPorts: number
  geoFailures: number
  secureConnections: number
  score: number
  grade: SecurityGrade
  recommendations: string[]
  riskFactors: string[]
}

export interface CountryCount {
  country: string
  count: number
}

export interface ScanMetadata {
  timestamp: string
  connectionsScanned: number
  skippedRecords: number
  geoLookups: number
  durationMs: number
}

export interface ScanReport {
  connections: ClassifiedConnection[]
  summary: SecuritySummary
  topCountries: CountryCount[]
  externalConnections: number
  privateConnections: number
  metadata: ScanMetadata
}

export type CircuitState = 'closed' | 'open' | 'half-open'

export interface ResolverStats {
  requests: number
  cacheHits: number
  cacheMisses: number
  errors: number
  circuitBreakerBlocks: number
  cacheHitRate: number
  circuitBreakerState: CircuitState
  cacheSize: number
  pending: number
}
