import { describe, expect, it } from 'vitest'
import { parseIpList, validateIpAddress } from '@shared/utils/ip-validator'

describe('validateIpAddress', () => {
  it('accepts and trims valid addresses', () => {
    expect(validateIpAddress('  8.8.8.8 ')).toEqual({ valid: true, ip: '8.8.8.8' })
    expect(validateIpAddress('2001:db8::1')).toEqual({ valid: true, ip: '2001:db8::1' })
  })

  it('rejects missing input', () => {
    expect(validateIpAddress(undefined)).toEqual({ valid: false, error: 'IP address is required' })
    expect(validateIpAddress('   ')).toEqual({ valid: false, error: 'IP address is required' })
    expect(validateIpAddress(42)).toEqual({ valid: false, error: 'IP address is required' })
  })

  it('rejects overlong input', () => {
    expect(validateIpAddress('1'.repeat(46))).toEqual({
      valid: false,
      error: 'IP address is too long'
    })
  })

  it.each(['not-an-ip', '999.1.1.1', '8.8.8.8;rm -rf /', 'fe80::1%eth0'])(
    'rejects %j as an invalid address',
    (raw) => {
      expect(validateIpAddress(raw)).toEqual({ valid: false, error: 'Invalid IP address' })
    }
  )
})

describe('parseIpList', () => {
  it('splits on commas, whitespace and newlines and drops duplicates and junk', () => {
    expect(parseIpList('8.8.8.8, 1.1.1.1\nbogus 8.8.8.8\t::1,,')).toEqual([
      '8.8.8.8',
      '1.1.1.1',
      '::1'
    ])
  })

  it('returns an empty list for empty text', () => {
    expect(parseIpList('')).toEqual([])
  })
})
