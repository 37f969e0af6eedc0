import { beforeEach, describe, expect, it, vi } from 'vitest'
import {
  IpApiCoProvider,
  IpApiComProvider,
  createProviders
} from '@core/network/geo-providers'
import { GeoProviderError } from '@shared/errors'

const fetchMock = vi.fn<typeof fetch>()

function respondWith(body: unknown, status = 200): void {
  fetchMock.mockImplementation(
    async () => new Response(typeof body === 'string' ? body : JSON.stringify(body), { status })
  )
}

describe('geo providers', () => {
  const signal = new AbortController().signal

  beforeEach(() => {
    fetchMock.mockReset()
    vi.stubGlobal('fetch', fetchMock)
  })

  describe('IpApiComProvider', () => {
    const provider = new IpApiComProvider()

    it('maps a successful answer', async () => {
      respondWith({
        status: 'success',
        country: 'Testland',
        countryCode: 'TL',
        regionName: 'Test Region',
        city: 'Testville',
        lat: 1.5,
        lon: 2.5,
        timezone: 'UTC',
        isp: 'Example ISP',
        org: '',
        as: 'AS64500 Example Net'
      })

      const answer = await provider.lookup('203.0.113.7', signal)

      expect(answer).toEqual({
        kind: 'found',
        record: {
          ip: '203.0.113.7',
          status: 'success',
          city: 'Testville',
          region: 'Test Region',
          country: 'Testland',
          countryCode: 'TL',
          lat: 1.5,
          lon: 2.5,
          timezone: 'UTC',
          isp: 'Example ISP',
          org: undefined,
          asn: 'AS64500',
          provider: 'ip-api.com'
        }
      })
      expect(fetchMock).toHaveBeenCalledTimes(1)
      expect(fetchMock.mock.calls[0][0]).toBe(
        'http://ip-api.com/json/203.0.113.7?fields=status,message,country,countryCode,' +
          'regionName,city,lat,lon,timezone,isp,org,as,query'
      )
    })

    it('reports a provider-side failure as not found', async () => {
      respondWith({ status: 'fail', message: 'reserved range' })

      await expect(provider.lookup('203.0.113.7', signal)).resolves.toEqual({
        kind: 'not-found',
        message: 'reserved range'
      })
    })

    it('marks 5xx and 429 responses as retryable', async () => {
      respondWith('', 503)
      await expect(provider.lookup('203.0.113.7', signal)).rejects.toMatchObject({
        message: 'ip-api.com responded with HTTP 503',
        retryable: true,
        status: 503
      })

      respondWith('', 429)
      await expect(provider.lookup('203.0.113.7', signal)).rejects.toMatchObject({
        retryable: true,
        status: 429
      })
    })

    it('does not retry other client errors', async () => {
      respondWith('', 404)

      await expect(provider.lookup('203.0.113.7', signal)).rejects.toMatchObject({
        message: 'ip-api.com responded with HTTP 404',
        retryable: false
      })
    })

    it('rejects malformed JSON without retry', async () => {
      respondWith('not json')

      await expect(provider.lookup('203.0.113.7', signal)).rejects.toMatchObject({
        message: 'ip-api.com returned malformed JSON',
        retryable: false
      })
    })

    it('rejects an unexpected body shape without retry', async () => {
      respondWith({ status: 'pending' })

      await expect(provider.lookup('203.0.113.7', signal)).rejects.toMatchObject({
        message: 'ip-api.com returned an unexpected response shape',
        retryable: false
      })
    })

    it('treats timeouts as retryable', async () => {
      fetchMock.mockRejectedValue(
        Object.assign(new Error('aborted due to timeout'), { name: 'TimeoutError' })
      )

      const error = await provider.lookup('203.0.113.7', signal).catch((err: unknown) => err)

      expect(error).toBeInstanceOf(GeoProviderError)
      expect(error).toMatchObject({ message: 'ip-api.com request timed out', retryable: true })
    })

    it('treats connection failures as retryable', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'))

      await expect(provider.lookup('203.0.113.7', signal)).rejects.toMatchObject({
        message: 'ip-api.com request failed: fetch failed',
        retryable: true
      })
    })
  })

  describe('IpApiCoProvider', () => {
    const provider = new IpApiCoProvider()

    it('maps a successful answer and uses org as the ISP', async () => {
      respondWith({
        city: 'Testville',
        region: 'Test Region',
        country_name: 'Testland',
        country_code: 'TL',
        latitude: 1.5,
        longitude: null,
        timezone: 'UTC',
        org: 'Example Org',
        asn: 'AS64500'
      })

      const answer = await provider.lookup('2001:db8::1', signal)

      expect(answer).toEqual({
        kind: 'found',
        record: {
          ip: '2001:db8::1',
          status: 'success',
          city: 'Testville',
          region: 'Test Region',
          country: 'Testland',
          countryCode: 'TL',
          timezone: 'UTC',
          isp: 'Example Org',
          org: 'Example Org',
          asn: 'AS64500',
          provider: 'ipapi.co'
        }
      })
      expect(fetchMock.mock.calls[0][0]).toBe('https://ipapi.co/2001%3Adb8%3A%3A1/json/')
    })

    it('reports an error body as not found', async () => {
      respondWith({ error: true, reason: 'Reserved IP Address' })

      await expect(provider.lookup('203.0.113.7', signal)).resolves.toEqual({
        kind: 'not-found',
        message: 'Reserved IP Address'
      })
    })
  })

  it('creates providers in the configured order', () => {
    expect(createProviders(['ipapi.co', 'ip-api.com']).map((provider) => provider.name)).toEqual([
      'ipapi.co',
      'ip-api.com'
    ])
  })
})
