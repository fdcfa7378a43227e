/**
 * Target resolution types
 */

import type { Logger } from '@/lib/logger'
import type { CidrBlock, IpAddress } from '@/lib/cidr'

// =============================================================================
// Targets
// =============================================================================

/**
 * One concrete scan endpoint
 */
export interface Target {
  /** Canonical IPv4 or IPv6 address, never a range or subnet */
  address: string
  /** Ordered, duplicate-free ports; empty means no port-specific probing */
  ports: number[]
  /** The range, subnet or domain token this target was expanded from */
  origin?: string
}

// =============================================================================
// Address specifications
// =============================================================================

export type AddressKind =
  | 'ipv4-literal'
  | 'ipv6-literal'
  | 'ipv4-subnet'
  | 'ipv6-subnet'
  | 'ipv4-range'
  | 'ipv6-range'
  | 'domain'

/**
 * A classified token together with its parsed parts
 */
export type AddressSpec =
  | { kind: 'ipv4-literal' | 'ipv6-literal'; token: string; address: IpAddress }
  | { kind: 'ipv4-subnet' | 'ipv6-subnet'; token: string; block: CidrBlock }
  | { kind: 'ipv4-range' | 'ipv6-range'; token: string; start: IpAddress; end: IpAddress }
  | { kind: 'domain'; token: string; name: string }

// =============================================================================
// Resolution context
// =============================================================================

/**
 * Which resolved address family a domain name contributes
 */
export type AddressFamilyPreference = 'ipv4-first' | 'ipv6-first'

/**
 * full-block: every address of a CIDR block
 * hosts-only: drop the first (network) and last (broadcast) address of
 * blocks larger than two addresses
 */
export type SubnetPolicy = 'full-block' | 'hosts-only'

export interface DnsResolver {
  /** All A and AAAA addresses of a name; rejects with DnsError on failure */
  resolve(name: string): Promise<string[]>
}

export interface ResolveContext {
  dns: DnsResolver
  preference: AddressFamilyPreference
  subnetPolicy: SubnetPolicy
  /** Largest number of addresses a single token may expand to */
  maxTargets: number
  logger: Logger
}
