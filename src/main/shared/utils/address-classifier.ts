import { BlockList, isIP } from 'node:net'

export type IpVersion = 0 | 4 | 6

interface LocalNetwork {
  network: string
  prefix: number
  type: 'ipv4' | 'ipv6'
}

export const LOCAL_NETWORKS: readonly LocalNetwork[] = [
  { network: '127.0.0.0', prefix: 8, type: 'ipv4' },
  { network: '169.254.0.0', prefix: 16, type: 'ipv4' },
  { network: '10.0.0.0', prefix: 8, type: 'ipv4' },
  { network: '172.16.0.0', prefix: 12, type: 'ipv4' },
  { network: '192.168.0.0', prefix: 16, type: 'ipv4' },
  { network: '::1', prefix: 128, type: 'ipv6' },
  { network: 'fc00::', prefix: 7, type: 'ipv6' },
  { network: 'fe80::', prefix: 10, type: 'ipv6' }
]

const localNetworks = new BlockList()
for (const { network, prefix, type } of LOCAL_NETWORKS) {
  localNetworks.addSubnet(network, prefix, type)
}

// ::ffff:a.b.c.d and ::ffff:hhhh:hhhh, compressed or written out in full
const MAPPED_IPV4 = new RegExp(
  '^(?:::|(?:0{1,4}:){5})ffff:' +
    '(?:(\\d{1,3}(?:\\.\\d{1,3}){3})|([0-9a-f]{1,4}):([0-9a-f]{1,4}))$',
  'i'
)

function unmapIpv4(address: string): string | undefined {
  const match = address.match(MAPPED_IPV4)
  if (!match) return undefined

  const [, dotted, high, low] = match
  if (dotted) return dotted
  const value = (parseInt(high, 16) << 16) | parseInt(low, 16)
  return [24, 16, 8, 0].map((shift) => (value >>> shift) & 0xff).join('.')
}

// Zone ids (`fe80::1%eth0`) are only valid on IPv6 addresses
function stripZone(ip: string): string {
  const zoneIndex = ip.indexOf('%')
  if (zoneIndex === -1) return ip
  const address = ip.slice(0, zoneIndex)
  return zoneIndex < ip.length - 1 && isIP(address) === 6 ? address : ip
}

export function ipVersion(ip: string): IpVersion {
  if (typeof ip !== 'string' || ip.length === 0) return 0
  const version = isIP(stripZone(ip))
  return version === 4 || version === 6 ? version : 0
}

export function isValidIp(ip: string): boolean {
  return ipVersion(ip) !== 0
}

/**
 * True for loopback, link-local, RFC 1918 and IPv6 unique-local addresses.
 * IPv4-mapped IPv6 addresses are judged by their IPv4 part.
 * Malformed input is reported as not local.
 */
export function isLocalOrPrivate(ip: string): boolean {
  const version = ipVersion(ip)
  if (version === 0) return false

  const address = stripZone(ip)
  if (version === 6) {
    const mapped = unmapIpv4(address)
    if (mapped !== undefined) return localNetworks.check(mapped, 'ipv4')
    return localNetworks.check(address, 'ipv6')
  }

  return localNetworks.check(address, 'ipv4')
}
