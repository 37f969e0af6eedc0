import { isValidIp } from './address-classifier'

// Longest textual IPv6 form with an embedded IPv4 tail.
const MAX_IP_LENGTH = 45

export type IpValidationResult = { valid: true; ip: string } | { valid: false; error: string }

export function validateIpAddress(raw: unknown): IpValidationResult {
  if (typeof raw !== 'string' || raw.trim().length === 0) {
    return { valid: false, error: 'IP address is required' }
  }

  const ip = raw.trim()
  if (ip.length > MAX_IP_LENGTH) {
    return { valid: false, error: 'IP address is too long' }
  }

  if (!/^[0-9a-fA-F:.]+$/.test(ip) || !isValidIp(ip)) {
    return { valid: false, error: 'Invalid IP address' }
  }

  return { valid: true, ip }
}

export function parseIpList(text: string): string[] {
  const seen = new Set<string>()

  for (const token of text.split(/[\s,]+/)) {
    const result = validateIpAddress(token)
    if (result.valid) seen.add(result.ip)
  }

  return [...seen]
}
