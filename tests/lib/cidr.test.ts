/**
 * Unit tests for src/lib/cidr.ts
 */

import { describe, it, expect } from 'vitest'
import {
  isValidIPv4,
  ipToNumber,
  numberToIp,
  parseIPv6,
  formatIPv6,
  parseAddress,
  canonicalAddress,
  compareAddresses,
  prefixToMask,
  parseCIDR,
  rangeSize,
  addressRange,
  blockEnd,
  formatAddress,
} from '@/lib/cidr'

describe('isValidIPv4', () => {
  it('accepts dotted-decimal addresses', () => {
    expect(isValidIPv4('0.0.0.0')).toBe(true)
    expect(isValidIPv4('192.168.1.1')).toBe(true)
    expect(isValidIPv4('255.255.255.255')).toBe(true)
  })

  it('rejects out-of-range octets and wrong shapes', () => {
    expect(isValidIPv4('256.0.0.1')).toBe(false)
    expect(isValidIPv4('1.2.3')).toBe(false)
    expect(isValidIPv4('1.2.3.4.5')).toBe(false)
    expect(isValidIPv4('a.b.c.d')).toBe(false)
    expect(isValidIPv4('')).toBe(false)
  })

  it('rejects leading zeros', () => {
    expect(isValidIPv4('010.0.0.1')).toBe(false)
  })
})

describe('ipToNumber / numberToIp', () => {
  it('converts without sign problems at the top of the range', () => {
    expect(ipToNumber('192.168.1.1')).toBe(3232235777)
    expect(ipToNumber('255.255.255.255')).toBe(4294967295)
    expect(numberToIp(3232235777)).toBe('192.168.1.1')
    expect(numberToIp(4294967295)).toBe('255.255.255.255')
  })
})

describe('parseIPv6', () => {
  it('parses full and compressed forms', () => {
    expect(parseIPv6('::')).toBe(0n)
    expect(parseIPv6('::1')).toBe(1n)
    expect(parseIPv6('1::')).toBe(1n << 112n)
    expect(parseIPv6('0:0:0:0:0:0:0:1')).toBe(1n)
    expect(parseIPv6('2001:DB8::1')).toBe(parseIPv6('2001:db8:0:0:0:0:0:1'))
  })

  it('parses an embedded IPv4 tail', () => {
    expect(parseIPv6('::ffff:1.2.3.4')).toBe((0xffffn << 32n) | 0x01020304n)
    expect(parseIPv6('::1.2.3.4')).toBe(0x01020304n)
  })

  it('rejects malformed addresses', () => {
    expect(parseIPv6('')).toBeNull()
    expect(parseIPv6('1::2::3')).toBeNull()
    expect(parseIPv6('1:2:3:4:5:6:7')).toBeNull()
    expect(parseIPv6('1:2:3:4:5:6:7:8:9')).toBeNull()
    expect(parseIPv6('12345::1')).toBeNull()
    expect(parseIPv6('g::1')).toBeNull()
    expect(parseIPv6('example.com')).toBeNull()
  })

  it('rejects zone identifiers', () => {
    expect(parseIPv6('fe80::1%eth0')).toBeNull()
  })
})

describe('formatIPv6', () => {
  it('compresses the longest zero run', () => {
    expect(formatIPv6(0n)).toBe('::')
    expect(formatIPv6(1n)).toBe('::1')
    expect(formatIPv6(parseIPv6('2001:db8:0:0:1:0:0:1') ?? -1n)).toBe('2001:db8::1:0:0:1')
    expect(formatIPv6(parseIPv6('2001:0:0:1:0:0:0:1') ?? -1n)).toBe('2001:0:0:1::1')
  })

  it('does not compress a single zero group', () => {
    expect(formatIPv6(parseIPv6('2001:db8:0:1:1:1:1:1') ?? -1n)).toBe('2001:db8:0:1:1:1:1:1')
  })

  it('writes mapped IPv4 addresses in hex', () => {
    expect(formatIPv6(parseIPv6('::ffff:1.2.3.4') ?? -1n)).toBe('::ffff:102:304')
  })
})

describe('parseAddress / canonicalAddress', () => {
  it('detects the family', () => {
    expect(parseAddress('10.0.0.1')).toEqual({ family: 4, value: 167772161n })
    expect(parseAddress('::1')).toEqual({ family: 6, value: 1n })
    expect(parseAddress('nope')).toBeNull()
  })

  it('canonicalizes text', () => {
    expect(canonicalAddress(' 2001:DB8:0:0::1 ')).toBe('2001:db8::1')
    expect(canonicalAddress('10.0.0.1')).toBe('10.0.0.1')
    expect(canonicalAddress('10.0.0.256')).toBeNull()
  })
})

describe('compareAddresses', () => {
  it('orders IPv4 before IPv6 and numerically within a family', () => {
    const sorted = ['::1', '10.0.0.10', '10.0.0.9', '2001:db8::']
      .flatMap((text) => parseAddress(text) ?? [])
      .sort(compareAddresses)
      .map(formatAddress)
    expect(sorted).toEqual(['10.0.0.9', '10.0.0.10', '::1', '2001:db8::'])
  })
})

describe('prefixToMask', () => {
  it('builds IPv4 and IPv6 masks', () => {
    expect(prefixToMask(24)).toBe(0xffffff00n)
    expect(prefixToMask(0)).toBe(0n)
    expect(prefixToMask(32)).toBe(0xffffffffn)
    expect(prefixToMask(64, 6)).toBe(0xffffffffffffffffn << 64n)
  })
})

describe('parseCIDR', () => {
  it('clears host bits and sizes the block', () => {
    const block = parseCIDR('192.168.1.7/30')
    expect(block).toEqual({ network: { family: 4, value: BigInt(ipToNumber('192.168.1.4')) }, prefix: 30, size: 4n })
  })

  it('parses IPv6 blocks', () => {
    const block = parseCIDR('2001:db8::/126')
    expect(block?.size).toBe(4n)
    expect(block?.network.family).toBe(6)
  })

  it('rejects bad prefixes', () => {
    expect(parseCIDR('10.0.0.0/33')).toBeNull()
    expect(parseCIDR('10.0.0.0/')).toBeNull()
    expect(parseCIDR('10.0.0.0/a')).toBeNull()
    expect(parseCIDR('::/129')).toBeNull()
    expect(parseCIDR('10.0.0.0')).toBeNull()
  })
})

describe('enumeration', () => {
  it('counts and walks an inclusive range', () => {
    const start = { family: 4 as const, value: 10n }
    const end = { family: 4 as const, value: 12n }
    expect(rangeSize(start, end)).toBe(3n)
    expect(rangeSize(end, start)).toBe(0n)
    expect([...addressRange(start, end)].map((a) => a.value)).toEqual([10n, 11n, 12n])
  })

  it('finds the last address of a block', () => {
    const block = parseCIDR('10.0.0.0/30')
    expect(block && formatAddress(blockEnd(block))).toBe('10.0.0.3')
  })
})
