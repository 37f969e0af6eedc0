import { DEFAULT_GRADE_THRESHOLDS, DEFAULT_RISK_POLICY } from '@config/settings'
import type { GradeThresholds, RiskPolicy } from '@config/settings'
import { RISK_LEVELS, isGeoFailure } from '@shared/interfaces/common'
import type {
  AggregatableConnection,
  CountryCount,
  RiskLevel,
  SecurityGrade,
  SecuritySummary
} from '@shared/interfaces/common'
import { isLocalOrPrivate } from '@shared/utils/address-classifier'

export interface AggregatorOptions {
  policy: RiskPolicy
  gradeThresholds: GradeThresholds
}

const DANGER_PENALTY = 12
const WARNING_PENALTY = 4
const CLEAN_PROFILE_BONUS = 5
const CLEAN_PROFILE_RATIO = 0.8
const LOW_SECURE_RATIO = 0.3
const WARNING_REVIEW_THRESHOLD = 2
const MIN_DOMINANT_COUNTRY_SAMPLE = 3
const PORT_SPREAD_THRESHOLD = 10
const MAX_RECOMMENDATIONS = 3
const MAX_PROCESS_FACTORS = 3

interface Tally {
  total: number
  counts: Record<RiskLevel, number>
  suspiciousPorts: number
  geoFailures: number
  secureConnections: number
}

function isRiskLevel(value: unknown): value is RiskLevel {
  return RISK_LEVELS.some((level) => level === value)
}

export function readRisk(value: unknown): RiskLevel {
  return isRiskLevel(value) ? value : 'info'
}

export function scoreToGrade(
  score: number,
  thresholds: GradeThresholds = DEFAULT_GRADE_THRESHOLDS
): SecurityGrade {
  if (score >= thresholds.excellent) return 'excellent'
  if (score >= thresholds.good) return 'good'
  if (score >= thresholds.moderate) return 'moderate'
  if (score >= thresholds.highRisk) return 'high-risk'
  return 'critical'
}

function tally(connections: readonly AggregatableConnection[], policy: RiskPolicy): Tally {
  const result: Tally = {
    total: connections.length,
    counts: { info: 0, warning: 0, danger: 0 },
    suspiciousPorts: 0,
    geoFailures: 0,
    secureConnections: 0
  }

  for (const conn of connections) {
    result.counts[readRisk(conn.risk)] += 1

    const port = conn.connection?.remotePort
    if (typeof port === 'number') {
      if (policy.highRiskPorts.has(port)) result.suspiciousPorts += 1
      if (policy.securePorts.has(port)) result.secureConnections += 1
    }

    if (isGeoFailure(conn.geo?.status)) result.geoFailures += 1
  }

  return result
}

function computeScore({ total, counts, secureConnections }: Tally): number {
  let score = 100
  score = Math.max(0, score - DANGER_PENALTY * counts.danger)
  score = Math.max(0, score - WARNING_PENALTY * counts.warning)

  if (total > 0 && secureConnections / total >= CLEAN_PROFILE_RATIO && counts.danger === 0) {
    score = Math.min(100, score + CLEAN_PROFILE_BONUS)
  }

  return Math.round(score)
}

function isExternal(conn: AggregatableConnection): conn is AggregatableConnection & {
  connection: { remoteAddress: string }
} {
  const address = conn.connection?.remoteAddress
  return typeof address === 'string' && address.length > 0 && !isLocalOrPrivate(address)
}

function byCountDescending(a: [string, number], b: [string, number]): number {
  return b[1] - a[1] || a[0].localeCompare(b[0])
}

/**
 * Counts successfully geolocated external connections per country, most frequent first.
 */
export function topCountries(
  connections: readonly AggregatableConnection[],
  limit = 5
): CountryCount[] {
  const countries = new Map<string, number>()

  for (const conn of connections) {
    const country = conn.geo?.country
    if (!isExternal(conn) || conn.geo?.status !== 'success' || !country) continue
    countries.set(country, (countries.get(country) ?? 0) + 1)
  }

  return [...countries.entries()]
    .sort(byCountDescending)
    .slice(0, limit)
    .map(([country, count]) => ({ country, count }))
}

function dominantCountry(connections: readonly AggregatableConnection[]): string | undefined {
  const ranked = topCountries(connections, Number.MAX_SAFE_INTEGER)
  const sample = ranked.reduce((sum, entry) => sum + entry.count, 0)
  const [top] = ranked

  if (!top || sample < MIN_DOMINANT_COUNTRY_SAMPLE) return undefined
  return top.count > sample / 2 ? top.country : undefined
}

function buildRecommendations(
  stats: Tally,
  score: number,
  connections: readonly AggregatableConnection[]
): string[] {
  const { counts, total, geoFailures, secureConnections } = stats
  const recommendations: string[] = []

  if (counts.danger > 0) {
    recommendations.push(`Terminate high-risk connections (${counts.danger} flagged as dangerous)`)
  }

  if (counts.warning > WARNING_REVIEW_THRESHOLD) {
    recommendations.push(`Review firewall rules (${counts.warning} connections raised warnings)`)
  }

  if (geoFailures > 0) {
    recommendations.push(
      `Verify remote endpoints whose origin could not be determined (${geoFailures})`
    )
  }

  if (secureConnections / total < LOW_SECURE_RATIO) {
    recommendations.push('Prefer secure protocols such as HTTPS, SSH and TLS-wrapped mail')
  }

  const country = dominantCountry(connections)
  if (country) {
    recommendations.push(`Most external connections go to ${country}; verify this is expected`)
  }

  if (recommendations.length === 0) {
    recommendations.push(
      score >= 90
        ? 'Security posture looks good; keep monitoring regularly'
        : 'No critical issues detected; continue monitoring'
    )
  }

  return recommendations.slice(0, MAX_RECOMMENDATIONS)
}

function identifyRiskFactors(connections: readonly AggregatableConnection[]): string[] {
  const processes = new Map<string, number>()
  const portsByRemote = new Map<string, Set<number>>()

  for (const conn of connections) {
    const processName = conn.connection?.processName?.trim()
    if (processName && processName.toLowerCase() !== 'unknown') {
      processes.set(processName, (processes.get(processName) ?? 0) + 1)
    }

    const port = conn.connection?.remotePort
    if (isExternal(conn) && typeof port === 'number') {
      const address = conn.connection.remoteAddress
      const ports = portsByRemote.get(address) ?? new Set<number>()
      ports.add(port)
      portsByRemote.set(address, ports)
    }
  }

  const factors = [...processes.entries()]
    .sort(byCountDescending)
    .slice(0, MAX_PROCESS_FACTORS)
    .map(([name, count]) => `${count} connection${count === 1 ? '' : 's'} from ${name}`)

  for (const [address, ports] of portsByRemote) {
    if (ports.size > PORT_SPREAD_THRESHOLD) {
      factors.push(`${address} contacted on ${ports.size} different ports`)
    }
  }

  return factors
}

/**
 * Summarises a batch of classified connections into counts, a 0-100 score, a grade and
 * at most three recommendations. Records with a missing or unknown risk count as `info`.
 */
export function aggregate(
  connections: readonly AggregatableConnection[],
  options: Partial<AggregatorOptions> = {}
): SecuritySummary {
  const policy = options.policy ?? DEFAULT_RISK_POLICY
  const thresholds = options.gradeThresholds ?? DEFAULT_GRADE_THRESHOLDS
  const stats = tally(connections, policy)
  const score = computeScore(stats)

  const summary: SecuritySummary = {
    totalConnections: stats.total,
    counts: stats.counts,
    suspiciousPorts: stats.suspiciousPorts,
    geoFailures: stats.geoFailures,
    secureConnections: stats.secureConnections,
    score,
    grade: scoreToGrade(score, thresholds),
    recommendations: [],
    riskFactors: []
  }

  if (stats.total === 0) {
    return { ...summary, recommendations: ['No active connections detected'] }
  }

  return {
    ...summary,
    recommendations: buildRecommendations(stats, score, connections),
    riskFactors: identifyRiskFactors(connections)
  }
}
