export { createSecurityCore } from './app/bootstrap'
export type { SecurityCore, SecurityCoreDeps } from './app/bootstrap'
export { registerProcessSignalHandlers } from './app/lifecycle'
export { loadSettings, DEFAULT_SETTINGS } from './config/settings'
export type { GradeThresholds, RiskPolicy, Settings } from './config/settings'
export { GeoLocationService } from './core/network/geo-location'
export type { BulkLookupOptions, GeoLocationServiceOptions } from './core/network/geo-location'
export { IpApiCoProvider, IpApiComProvider, createProviders } from './core/network/geo-providers'
export type { GeoProvider, ProviderAnswer } from './core/network/geo-providers'
export { TtlCache } from './core/network/ttl-cache'
export {
  classify,
  classifyConnection,
  compareRisk,
  sortByRisk
} from './core/security/risk-classifier'
export { aggregate, scoreToGrade, topCountries } from './core/security/security-aggregator'
export { SecurityScanner } from './core/security/security-scanner'
export type { ConnectionSource, ScanOptions } from './core/security/security-scanner'
export { ConfigurationError, GeoProviderError, InvalidAddressError } from './shared/errors'
export * from './shared/interfaces/common'
export { isLocalOrPrivate, isValidIp, ipVersion } from './shared/utils/address-classifier'
export { parseIpList, validateIpAddress } from './shared/utils/ip-validator'
