import { DEFAULT_RISK_POLICY } from '@config/settings'
import type { RiskPolicy } from '@config/settings'
import { isGeoFailure } from '@shared/interfaces/common'
import type {
  ClassifiedConnection,
  ConnectionRecord,
  GeoRecord,
  RiskAssessment,
  RiskLevel
} from '@shared/interfaces/common'
import { isLocalOrPrivate } from '@shared/utils/address-classifier'

export const RISK_ORDER: Record<RiskLevel, number> = {
  info: 0,
  warning: 1,
  danger: 2
}

/**
 * Assigns a risk level to one connection. Rules are checked in order and the first match wins:
 * local traffic, high-risk port, failed origin lookup, established connection on an uncommon port.
 */
export function classify(
  conn: ConnectionRecord,
  geo: GeoRecord,
  policy: RiskPolicy = DEFAULT_RISK_POLICY
): RiskAssessment {
  if (isLocalOrPrivate(conn.remoteAddress)) {
    return { risk: 'info', reasons: [] }
  }

  const port = conn.remotePort
  if (policy.highRiskPorts.has(port)) {
    return { risk: 'danger', reasons: [`connection to high-risk port ${port}`] }
  }

  if (isGeoFailure(geo.status)) {
    return { risk: 'warning', reasons: ['unable to verify origin of remote address'] }
  }

  if (!policy.expectedPorts.has(port) && conn.status.toUpperCase() === 'ESTABLISHED') {
    return { risk: 'warning', reasons: [`established connection on uncommon port ${port}`] }
  }

  return { risk: 'info', reasons: [] }
}

export function classifyConnection(
  conn: ConnectionRecord,
  geo: GeoRecord,
  policy: RiskPolicy = DEFAULT_RISK_POLICY
): ClassifiedConnection {
  const { risk, reasons } = classify(conn, geo, policy)
  return Object.freeze({
    connection: Object.freeze({ ...conn }),
    geo,
    risk,
    reasons: Object.freeze([...reasons])
  })
}

export function compareRisk(a: RiskLevel, b: RiskLevel): number {
  return RISK_ORDER[a] - RISK_ORDER[b]
}

// Most severe first; Array.prototype.sort is stable so ties keep their scan order
export function sortByRisk<T extends { risk: RiskLevel }>(connections: readonly T[]): T[] {
  return [...connections].sort((a, b) => compareRisk(b.risk, a.risk))
}
