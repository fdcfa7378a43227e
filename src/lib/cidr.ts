/**
 * IP address and CIDR utilities
 * Pure functions for parsing, formatting, ordering and enumerating IPv4 and
 * IPv6 addresses.
 *
 * Both families are held as BigInt so that 128-bit IPv6 arithmetic and
 * 32-bit IPv4 arithmetic share one code path.
 */

// =============================================================================
// Types
// =============================================================================

export type IpFamily = 4 | 6

export interface IpAddress {
  family: IpFamily
  value: bigint
}

export interface CidrBlock {
  /** Network address (host bits cleared) */
  network: IpAddress
  prefix: number
  /** Number of addresses in the block */
  size: bigint
}

const FAMILY_BITS: Record<IpFamily, number> = { 4: 32, 6: 128 }

// =============================================================================
// IPv4
// =============================================================================

/**
 * Validate an IPv4 address string
 * Returns true if the string is a valid dotted-decimal IPv4 address.
 * Leading zeros ("010.0.0.1") are rejected to avoid octal ambiguity.
 */
export function isValidIPv4(ip: string): boolean {
  const parts = ip.split('.')
  if (parts.length !== 4) return false
  for (const part of parts) {
    const num = parseInt(part, 10)
    if (isNaN(num) || num < 0 || num > 255 || String(num) !== part) {
      return false
    }
  }
  return true
}

/**
 * Convert IPv4 dotted-decimal string to 32-bit unsigned number
 * "192.168.1.1" -> 3232235777
 *
 * Uses multiplication instead of bit shifts to avoid JavaScript's
 * signed 32-bit integer behavior with bitwise operators.
 */
export function ipToNumber(ip: string): number {
  const parts = ip.split('.').map(Number)
  return ((parts[0] * 256 + parts[1]) * 256 + parts[2]) * 256 + parts[3]
}

/**
 * Convert 32-bit unsigned number to IPv4 dotted-decimal string
 * 3232235777 -> "192.168.1.1"
 */
export function numberToIp(num: number): string {
  return [
    (num >>> 24) & 0xff,
    (num >>> 16) & 0xff,
    (num >>> 8) & 0xff,
    num & 0xff,
  ].join('.')
}

// =============================================================================
// IPv6
// =============================================================================

function parseHexGroups(part: string): number[] | null {
  if (part === '') return []
  const groups: number[] = []
  for (const group of part.split(':')) {
    if (!/^[0-9a-f]{1,4}$/.test(group)) return null
    groups.push(parseInt(group, 16))
  }
  return groups
}

/**
 * Parse an IPv6 address into its 128-bit value
 * Accepts "::" compression and a trailing dotted IPv4 part
 * ("::ffff:192.0.2.1"). Zone identifiers ("fe80::1%eth0") are rejected.
 */
export function parseIPv6(ip: string): bigint | null {
  if (!ip || ip.includes('%')) return null

  let text = ip.toLowerCase()
  const lastColon = text.lastIndexOf(':')
  if (lastColon === -1) return null

  let tailGroups: number[] = []
  const tail = text.substring(lastColon + 1)
  if (tail.includes('.')) {
    if (!isValidIPv4(tail)) return null
    const v4 = ipToNumber(tail)
    tailGroups = [Math.floor(v4 / 65536), v4 % 65536]
    text = text.substring(0, lastColon + 1)
    if (!text.endsWith('::')) {
      text = text.substring(0, text.length - 1)
    }
  }

  const compressed = text.indexOf('::')
  if (compressed !== text.lastIndexOf('::')) return null

  let groups: number[]
  if (compressed === -1) {
    const all = parseHexGroups(text)
    if (!all) return null
    groups = [...all, ...tailGroups]
    if (groups.length !== 8) return null
  } else {
    const head = parseHexGroups(text.substring(0, compressed))
    const rest = parseHexGroups(text.substring(compressed + 2))
    if (!head || !rest) return null
    const known = head.length + rest.length + tailGroups.length
    if (known > 7) return null
    groups = [...head, ...new Array<number>(8 - known).fill(0), ...rest, ...tailGroups]
  }

  return groups.reduce((acc, group) => (acc << 16n) | BigInt(group), 0n)
}

/**
 * Format a 128-bit value as a compressed lower-case IPv6 address (RFC 5952)
 * The longest run of two or more zero groups becomes "::", the first run
 * winning a tie.
 */
export function formatIPv6(value: bigint): string {
  const groups: number[] = []
  for (let i = 7; i >= 0; i--) {
    groups.push(Number((value >> BigInt(i * 16)) & 0xffffn))
  }

  let bestStart = -1
  let bestLength = 0
  for (let i = 0; i < 8; ) {
    if (groups[i] !== 0) {
      i++
      continue
    }
    let j = i
    while (j < 8 && groups[j] === 0) j++
    if (j - i > bestLength) {
      bestStart = i
      bestLength = j - i
    }
    i = j
  }

  const hex = groups.map((group) => group.toString(16))
  if (bestLength < 2) return hex.join(':')
  const head = hex.slice(0, bestStart).join(':')
  const rest = hex.slice(bestStart + bestLength).join(':')
  return `${head}::${rest}`
}

// =============================================================================
// Family-neutral helpers
// =============================================================================

export function parseAddress(text: string): IpAddress | null {
  if (isValidIPv4(text)) {
    return { family: 4, value: BigInt(ipToNumber(text)) }
  }
  const v6 = parseIPv6(text)
  return v6 === null ? null : { family: 6, value: v6 }
}

export function formatAddress(address: IpAddress): string {
  return address.family === 4 ? numberToIp(Number(address.value)) : formatIPv6(address.value)
}

/**
 * Canonical text form of an address, or null when the text is not one
 * "2001:DB8:0:0::1" -> "2001:db8::1"
 */
export function canonicalAddress(text: string): string | null {
  const address = parseAddress(text.trim())
  return address ? formatAddress(address) : null
}

/**
 * Total order over addresses: every IPv4 address sorts before every IPv6
 * address, numeric order within a family.
 */
export function compareAddresses(a: IpAddress, b: IpAddress): number {
  if (a.family !== b.family) return a.family - b.family
  if (a.value === b.value) return 0
  return a.value < b.value ? -1 : 1
}

// =============================================================================
// CIDR Operations
// =============================================================================

/**
 * Create a bitmask for a given prefix length
 * (24, 4) -> 0xFFFFFF00
 * (0, 4)  -> 0
 * (64, 6) -> 0xFFFFFFFFFFFFFFFF0000000000000000
 */
export function prefixToMask(prefixLength: number, family: IpFamily = 4): bigint {
  const bits = BigInt(FAMILY_BITS[family])
  const all = (1n << bits) - 1n
  const hostBits = (1n << (bits - BigInt(prefixLength))) - 1n
  return all ^ hostBits
}

/**
 * Parse CIDR notation into its network address, prefix and size
 * "192.168.1.7/30" -> { network: 192.168.1.4, prefix: 30, size: 4 }
 *
 * Returns null when the address or prefix is invalid for the family.
 */
export function parseCIDR(cidr: string): CidrBlock | null {
  const slashIdx = cidr.indexOf('/')
  if (slashIdx === -1) return null

  const address = parseAddress(cidr.substring(0, slashIdx))
  const prefixStr = cidr.substring(slashIdx + 1)
  if (!address || !/^\d{1,3}$/.test(prefixStr)) return null

  const prefix = parseInt(prefixStr, 10)
  const bits = FAMILY_BITS[address.family]
  if (prefix > bits) return null

  const network = address.value & prefixToMask(prefix, address.family)
  return {
    network: { family: address.family, value: network },
    prefix,
    size: 1n << BigInt(bits - prefix),
  }
}

// =============================================================================
// Enumeration
// =============================================================================

/**
 * Number of addresses in the inclusive range [start, end]; 0 when reversed
 */
export function rangeSize(start: IpAddress, end: IpAddress): bigint {
  if (start.family !== end.family || end.value < start.value) return 0n
  return end.value - start.value + 1n
}

/**
 * Yield every address from start to end inclusive, ascending
 */
export function* addressRange(start: IpAddress, end: IpAddress): Generator<IpAddress> {
  if (start.family !== end.family) return
  for (let value = start.value; value <= end.value; value++) {
    yield { family: start.family, value }
  }
}

/**
 * Last address of a CIDR block (the broadcast address for IPv4)
 */
export function blockEnd(block: CidrBlock): IpAddress {
  return { family: block.network.family, value: block.network.value + block.size - 1n }
}
