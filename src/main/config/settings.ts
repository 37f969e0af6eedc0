import { z } from 'zod'
import { ConfigurationError } from '@shared/errors'
import {
  CIRCUIT_BREAKER_HALF_OPEN_CALLS,
  CIRCUIT_BREAKER_RECOVERY_S,
  CIRCUIT_BREAKER_THRESHOLD,
  EXPECTED_PORTS,
  GEO_BACKOFF_BASE_MS,
  GEO_BACKOFF_MAX_MS,
  GEO_BULK_CONCURRENCY,
  GEO_CACHE_MAX_SIZE,
  GEO_CACHE_TTL_S,
  GEO_LOOKUP_LIMIT,
  GEO_MAX_RETRIES,
  GEO_NEGATIVE_CACHE_TTL_S,
  GEO_PROVIDERS,
  GEO_TIMEOUT_S,
  GRADE_THRESHOLDS,
  HIGH_RISK_PORTS,
  SCAN_LIMIT,
  SECURE_PORTS
} from './constants'

export type GeoProviderName = (typeof GEO_PROVIDERS)[number]

export interface RiskPolicy {
  highRiskPorts: ReadonlySet<number>
  expectedPorts: ReadonlySet<number>
  securePorts: ReadonlySet<number>
}

export interface GradeThresholds {
  excellent: number
  good: number
  moderate: number
  highRisk: number
}

export interface GeoSettings {
  cacheTtlMs: number
  negativeCacheTtlMs: number
  cacheMaxSize: number
  timeoutMs: number
  maxRetries: number
  backoffBaseMs: number
  backoffMaxMs: number
  bulkConcurrency: number
  lookupLimit: number
  providers: GeoProviderName[]
}

export interface CircuitBreakerSettings {
  failureThreshold: number
  recoveryTimeoutMs: number
  halfOpenMaxCalls: number
}

export interface Settings {
  geo: GeoSettings
  circuitBreaker: CircuitBreakerSettings
  risk: RiskPolicy
  gradeThresholds: GradeThresholds
  scanLimit: number
  logLevel?: LogLevel
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

const integer = (fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
  z.coerce.number().int().min(min).max(max).default(fallback)

const commaList = (value: string): string[] =>
  value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0)

const portSet = (fallback: ReadonlySet<number>) =>
  z
    .string()
    .transform((value, ctx) => {
      const ports: Set<number> = new Set()
      for (const item of commaList(value)) {
        const port = Number(item)
        if (!Number.isInteger(port) || port < 0 || port > 65535) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${item}" is not a port number` })
          return z.NEVER
        }
        ports.add(port)
      }
      return ports
    })
    .optional()
    .transform((ports): ReadonlySet<number> => ports ?? fallback)

const gradeThresholds = z
  .string()
  .transform((value, ctx) => {
    const bounds = commaList(value).map(Number)
    const descending = bounds.every((bound, idx) => idx === 0 || bound < bounds[idx - 1])
    if (
      bounds.length !== 4 ||
      bounds.some((bound) => !Number.isInteger(bound) || bound < 0 || bound > 100) ||
      !descending
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'expected four descending integers between 0 and 100'
      })
      return z.NEVER
    }
    const [excellent, good, moderate, highRisk] = bounds
    return { excellent, good, moderate, highRisk }
  })
  .optional()
  .transform((bounds): GradeThresholds => bounds ?? { ...GRADE_THRESHOLDS })

const providerList = z
  .string()
  .transform((value) => commaList(value))
  .pipe(z.array(z.enum(GEO_PROVIDERS)).min(1))
  .optional()
  .transform((providers): GeoProviderName[] => providers ?? [...GEO_PROVIDERS])

const envSchema = z.object({
  GEO_CACHE_TTL: integer(GEO_CACHE_TTL_S, 1),
  GEO_NEGATIVE_CACHE_TTL: integer(GEO_NEGATIVE_CACHE_TTL_S, 1),
  GEO_CACHE_MAX_SIZE: integer(GEO_CACHE_MAX_SIZE, 1),
  GEO_TIMEOUT: integer(GEO_TIMEOUT_S, 1, 60),
  GEO_MAX_RETRIES: integer(GEO_MAX_RETRIES, 1, 10),
  GEO_BACKOFF_BASE_MS: integer(GEO_BACKOFF_BASE_MS, 0),
  GEO_BACKOFF_MAX_MS: integer(GEO_BACKOFF_MAX_MS, 0),
  GEO_BULK_CONCURRENCY: integer(GEO_BULK_CONCURRENCY, 1, 64),
  GEO_LOOKUP_LIMIT: integer(GEO_LOOKUP_LIMIT, 1),
  GEO_PROVIDERS: providerList,
  CIRCUIT_BREAKER_THRESHOLD: integer(CIRCUIT_BREAKER_THRESHOLD, 1),
  CIRCUIT_BREAKER_RECOVERY: integer(CIRCUIT_BREAKER_RECOVERY_S, 1),
  SCAN_LIMIT: integer(SCAN_LIMIT, 1),
  HIGH_RISK_PORTS: portSet(HIGH_RISK_PORTS),
  EXPECTED_PORTS: portSet(EXPECTED_PORTS),
  SECURE_PORTS: portSet(SECURE_PORTS),
  GRADE_THRESHOLDS: gradeThresholds,
  LOG_LEVEL: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum(LOG_LEVELS))
    .optional()
})

type EnvSource = Record<string, string | undefined>

/**
 * Builds settings from environment variables. Unset or blank variables fall back to the
 * defaults in constants.ts; any invalid value fails the whole load.
 */
export function loadSettings(env: EnvSource = process.env): Settings {
  const provided: EnvSource = {}
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key]
    if (value !== undefined && value.trim().length > 0) provided[key] = value
  }

  const parsed = envSchema.safeParse(provided)
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    )
  }

  const vars = parsed.data
  return {
    geo: {
      cacheTtlMs: vars.GEO_CACHE_TTL * 1000,
      negativeCacheTtlMs: vars.GEO_NEGATIVE_CACHE_TTL * 1000,
      cacheMaxSize: vars.GEO_CACHE_MAX_SIZE,
      timeoutMs: vars.GEO_TIMEOUT * 1000,
      maxRetries: vars.GEO_MAX_RETRIES,
      backoffBaseMs: vars.GEO_BACKOFF_BASE_MS,
      backoffMaxMs: Math.max(vars.GEO_BACKOFF_MAX_MS, vars.GEO_BACKOFF_BASE_MS),
      bulkConcurrency: vars.GEO_BULK_CONCURRENCY,
      lookupLimit: vars.GEO_LOOKUP_LIMIT,
      providers: vars.GEO_PROVIDERS
    },
    circuitBreaker: {
      failureThreshold: vars.CIRCUIT_BREAKER_THRESHOLD,
      recoveryTimeoutMs: vars.CIRCUIT_BREAKER_RECOVERY * 1000,
      halfOpenMaxCalls: CIRCUIT_BREAKER_HALF_OPEN_CALLS
    },
    risk: {
      highRiskPorts: vars.HIGH_RISK_PORTS,
      expectedPorts: vars.EXPECTED_PORTS,
      securePorts: vars.SECURE_PORTS
    },
    gradeThresholds: vars.GRADE_THRESHOLDS,
    scanLimit: vars.SCAN_LIMIT,
    logLevel: vars.LOG_LEVEL
  }
}

export const DEFAULT_RISK_POLICY: RiskPolicy = {
  highRiskPorts: HIGH_RISK_PORTS,
  expectedPorts: EXPECTED_PORTS,
  securePorts: SECURE_PORTS
}

export const DEFAULT_GRADE_THRESHOLDS: GradeThresholds = { ...GRADE_THRESHOLDS }

export const DEFAULT_SETTINGS: Settings = loadSettings({})
