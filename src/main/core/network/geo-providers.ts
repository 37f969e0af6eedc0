import { z } from 'zod'
import { RETRYABLE_HTTP_STATUSES } from '@config/constants'
import type { GeoProviderName } from '@config/settings'
import { GeoProviderError } from '@shared/errors'
import type { GeoRecord } from '@shared/interfaces/common'

export type ProviderAnswer =
  | { kind: 'found'; record: GeoRecord }
  | { kind: 'not-found'; message: string }

export interface GeoProvider {
  readonly name: string
  lookup(ip: string, signal: AbortSignal): Promise<ProviderAnswer>
}

const USER_AGENT = 'connscope/1.0'

function isAbort(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('name' in error)) return false
  return error.name === 'TimeoutError' || error.name === 'AbortError'
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function nonEmpty(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

function coordinates(lat: number | null | undefined, lon: number | null | undefined) {
  return typeof lat === 'number' && typeof lon === 'number' ? { lat, lon } : {}
}

async function fetchJson(provider: string, url: string, signal: AbortSignal): Promise<unknown> {
  let response: Response
  try {
    response = await fetch(url, {
      signal,
      headers: { Accept: 'application/json', 'User-Agent': USER_AGENT }
    })
  } catch (error) {
    if (isAbort(error)) {
      throw new GeoProviderError(`${provider} request timed out`, true, undefined, { cause: error })
    }
    throw new GeoProviderError(
      `${provider} request failed: ${errorMessage(error)}`,
      true,
      undefined,
      { cause: error }
    )
  }

  if (!response.ok) {
    throw new GeoProviderError(
      `${provider} responded with HTTP ${response.status}`,
      RETRYABLE_HTTP_STATUSES.has(response.status),
      response.status
    )
  }

  try {
    return await response.json()
  } catch (error) {
    if (isAbort(error)) {
      throw new GeoProviderError(`${provider} request timed out`, true, response.status, {
        cause: error
      })
    }
    throw new GeoProviderError(`${provider} returned malformed JSON`, false, response.status, {
      cause: error
    })
  }
}

function parseBody<T>(
  provider: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  body: unknown
): T {
  const parsed = schema.safeParse(body)
  if (!parsed.success) {
    throw new GeoProviderError(`${provider} returned an unexpected response shape`, false)
  }
  return parsed.data
}

const ipApiComSchema = z.object({
  status: z.enum(['success', 'fail']),
  message: z.string().optional(),
  country: z.string().optional(),
  countryCode: z.string().optional(),
  regionName: z.string().optional(),
  city: z.string().optional(),
  lat: z.number().optional(),
  lon: z.number().optional(),
  timezone: z.string().optional(),
  isp: z.string().optional(),
  org: z.string().optional(),
  as: z.string().optional()
})

const IP_API_COM_FIELDS =
  'status,message,country,countryCode,regionName,city,lat,lon,timezone,isp,org,as,query'

export class IpApiComProvider implements GeoProvider {
  readonly name = 'ip-api.com'

  constructor(private readonly baseUrl = 'http://ip-api.com/json') {}

  async lookup(ip: string, signal: AbortSignal): Promise<ProviderAnswer> {
    const url = `${this.baseUrl}/${encodeURIComponent(ip)}?fields=${IP_API_COM_FIELDS}`
    const data = parseBody(this.name, ipApiComSchema, await fetchJson(this.name, url, signal))

    if (data.status === 'fail') {
      return { kind: 'not-found', message: data.message || 'Lookup failed' }
    }

    const asMatch = data.as?.match(/^(AS\d+)/)
    return {
      kind: 'found',
      record: {
        ip,
        status: 'success',
        city: nonEmpty(data.city),
        region: nonEmpty(data.regionName),
        country: nonEmpty(data.country),
        countryCode: nonEmpty(data.countryCode),
        ...coordinates(data.lat, data.lon),
        timezone: nonEmpty(data.timezone),
        isp: nonEmpty(data.isp),
        org: nonEmpty(data.org),
        asn: asMatch ? asMatch[1] : nonEmpty(data.as),
        provider: this.name
      }
    }
  }
}

const ipApiCoSchema = z.object({
  error: z.boolean().optional(),
  reason: z.string().optional(),
  message: z.string().optional(),
  city: z.string().nullish(),
  region: z.string().nullish(),
  country_name: z.string().nullish(),
  country_code: z.string().nullish(),
  latitude: z.number().nullish(),
  longitude: z.number().nullish(),
  timezone: z.string().nullish(),
  org: z.string().nullish(),
  asn: z.string().nullish()
})

export class IpApiCoProvider implements GeoProvider {
  readonly name = 'ipapi.co'

  constructor(private readonly baseUrl = 'https://ipapi.co') {}

  async lookup(ip: string, signal: AbortSignal): Promise<ProviderAnswer> {
    const url = `${this.baseUrl}/${encodeURIComponent(ip)}/json/`
    const data = parseBody(this.name, ipApiCoSchema, await fetchJson(this.name, url, signal))

    if (data.error) {
      return { kind: 'not-found', message: data.reason || data.message || 'Lookup failed' }
    }

    return {
      kind: 'found',
      record: {
        ip,
        status: 'success',
        city: nonEmpty(data.city),
        region: nonEmpty(data.region),
        country: nonEmpty(data.country_name),
        countryCode: nonEmpty(data.country_code),
        ...coordinates(data.latitude, data.longitude),
        timezone: nonEmpty(data.timezone),
        // ipapi.co reports the network owner only as `org`
        isp: nonEmpty(data.org),
        org: nonEmpty(data.org),
        asn: nonEmpty(data.asn),
        provider: this.name
      }
    }
  }
}

const PROVIDER_FACTORIES: Record<GeoProviderName, () => GeoProvider> = {
  'ip-api.com': () => new IpApiComProvider(),
  'ipapi.co': () => new IpApiCoProvider()
}

export function createProviders(names: readonly GeoProviderName[]): GeoProvider[] {
  return names.map((name) => PROVIDER_FACTORIES[name]())
}
