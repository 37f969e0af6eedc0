import { describe, expect, it } from 'vitest'
import { ipVersion, isLocalOrPrivate, isValidIp } from '@shared/utils/address-classifier'

describe('isLocalOrPrivate', () => {
  it.each([
    '127.0.0.1',
    '127.255.255.254',
    '169.254.10.20',
    '10.0.0.1',
    '10.255.255.255',
    '172.16.0.1',
    '172.31.255.255',
    '192.168.1.5',
    '::1',
    'fc00::1',
    'fd12:3456:789a::1',
    'fe80::1',
    'febf::1',
    'fe80::1%eth0',
    '::ffff:192.168.1.5',
    '::ffff:c0a8:105',
    '::FFFF:7F00:1',
    '0:0:0:0:0:ffff:a00:1'
  ])('treats %s as local or private', (ip) => {
    expect(isLocalOrPrivate(ip)).toBe(true)
  })

  it.each([
    '8.8.8.8',
    '1.1.1.1',
    '203.0.113.5',
    '2001:4860:4860::8888',
    '::ffff:8.8.8.8',
    '::ffff:808:808',
    'fec0::1'
  ])('treats %s as public', (ip) => {
    expect(isLocalOrPrivate(ip)).toBe(false)
  })

  it('only covers 172.16.0.0/12 inside the 172 block', () => {
    expect(isLocalOrPrivate('172.15.255.255')).toBe(false)
    expect(isLocalOrPrivate('172.16.0.0')).toBe(true)
    expect(isLocalOrPrivate('172.31.0.1')).toBe(true)
    expect(isLocalOrPrivate('172.32.0.1')).toBe(false)
    expect(isLocalOrPrivate('172.200.1.1')).toBe(false)
  })

  it.each(['not-an-ip', '', '256.1.1.1', '192.168.1', '10.0.0.1/8', ' 10.0.0.1', '::g'])(
    'returns false without throwing for malformed input %j',
    (ip) => {
      expect(() => isLocalOrPrivate(ip)).not.toThrow()
      expect(isLocalOrPrivate(ip)).toBe(false)
    }
  )
})

describe('ipVersion', () => {
  it('reports the address family', () => {
    expect(ipVersion('8.8.8.8')).toBe(4)
    expect(ipVersion('2001:db8::1')).toBe(6)
    expect(ipVersion('fe80::1%en0')).toBe(6)
    expect(ipVersion('example.com')).toBe(0)
  })

  it('accepts a zone id on IPv6 addresses only', () => {
    expect(ipVersion('203.0.113.5%x')).toBe(0)
    expect(isValidIp('10.0.0.1%eth0')).toBe(false)
    expect(isLocalOrPrivate('10.0.0.1%eth0')).toBe(false)
    expect(ipVersion('fe80::1%')).toBe(0)
    expect(isValidIp('fe80::1%eth0')).toBe(true)
  })

  it('backs isValidIp', () => {
    expect(isValidIp('1.1.1.1')).toBe(true)
    expect(isValidIp('1.1.1')).toBe(false)
  })
})
