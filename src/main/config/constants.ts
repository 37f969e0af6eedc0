export const GEO_CACHE_TTL_S = 3600
export const GEO_NEGATIVE_CACHE_TTL_S = 300
export const GEO_CACHE_MAX_SIZE = 10_000
export const GEO_TIMEOUT_S = 5
export const GEO_MAX_RETRIES = 3
export const GEO_BACKOFF_BASE_MS = 500
export const GEO_BACKOFF_MAX_MS = 4000
export const GEO_BULK_CONCURRENCY = 10
export const GEO_LOOKUP_LIMIT = 50
export const GEO_PROVIDERS = ['ipapi.co', 'ip-api.com'] as const

export const CIRCUIT_BREAKER_THRESHOLD = 5
export const CIRCUIT_BREAKER_RECOVERY_S = 60
export const CIRCUIT_BREAKER_HALF_OPEN_CALLS = 3

export const SCAN_LIMIT = 200

export const RETRYABLE_HTTP_STATUSES = new Set([429, 500, 502, 503, 504])

// Remote-access trojans, reverse shells and services that should not face the internet
export const HIGH_RISK_PORTS = new Set([
  23, 69, 1337, 1433, 3389, 4444, 5555, 6666, 6667, 12345, 27374, 31337
])

export const EXPECTED_PORTS = new Set([
  20, 21, 22, 25, 53, 80, 110, 123, 143, 443, 465, 587, 853, 993, 995, 5061, 8080, 8443
])

export const SECURE_PORTS = new Set([22, 443, 465, 853, 993, 995, 5061, 8443])

export const GRADE_THRESHOLDS = {
  excellent: 90,
  good: 75,
  moderate: 60,
  highRisk: 40
} as const

export const UNROUTABLE_REMOTE_ADDRESSES = new Set(['', '*', '0.0.0.0', '::', '-'])
