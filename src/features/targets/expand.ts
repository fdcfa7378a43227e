/**
 * Target Expander
 * Turns one target token into concrete targets.
 *
 * Subnet policy: by default ("full-block") a CIDR block enumerates every
 * address it declares, network and broadcast included, so 192.168.5.0/30
 * yields .0, .1, .2 and .3. "hosts-only" drops the first and last address
 * of blocks larger than two addresses (/31, /32, /127 and /128 are kept
 * whole).
 */

import {
  addressRange,
  blockEnd,
  compareAddresses,
  formatAddress,
  parseAddress,
  rangeSize,
  type CidrBlock,
  type IpAddress,
} from '@/lib/cidr'
import { ExpansionLimitError, RangeOrderError } from '@/lib/errors'
import { parseAddressSpec } from './classify'
import type { ResolveContext, SubnetPolicy, Target } from './types'

// =============================================================================
// Enumeration
// =============================================================================

function enumerate(
  token: string,
  start: IpAddress,
  end: IpAddress,
  ports: readonly number[],
  context: ResolveContext,
): Target[] {
  const count = rangeSize(start, end)
  if (count > BigInt(context.maxTargets)) {
    throw new ExpansionLimitError(token, count, context.maxTargets)
  }

  const targets: Target[] = []
  for (const address of addressRange(start, end)) {
    targets.push({ address: formatAddress(address), ports: [...ports], origin: token })
  }
  return targets
}

/**
 * First and last address to enumerate for a block under a policy
 */
export function subnetBounds(block: CidrBlock, policy: SubnetPolicy): [IpAddress, IpAddress] {
  const first = block.network
  const last = blockEnd(block)
  if (policy === 'hosts-only' && block.size > 2n) {
    return [
      { family: first.family, value: first.value + 1n },
      { family: last.family, value: last.value - 1n },
    ]
  }
  return [first, last]
}

// =============================================================================
// Domains
// =============================================================================

async function resolveDomain(
  token: string,
  name: string,
  ports: readonly number[],
  context: ResolveContext,
): Promise<Target[]> {
  const answers = await context.dns.resolve(name)
  const family = context.preference === 'ipv6-first' ? 6 : 4

  const kept: IpAddress[] = []
  const seen = new Set<string>()
  for (const answer of answers) {
    const address = parseAddress(answer)
    if (!address || address.family !== family) continue
    const text = formatAddress(address)
    if (seen.has(text)) continue
    seen.add(text)
    kept.push(address)
  }

  // Resolvers rotate answers; sort so repeated runs list targets identically
  kept.sort(compareAddresses)

  context.logger.debug(
    { name, answers: answers.length, kept: kept.length, preference: context.preference },
    'resolved domain target',
  )

  return kept.map((address) => ({ address: formatAddress(address), ports: [...ports], origin: token }))
}

// =============================================================================
// Expansion
// =============================================================================

/**
 * Expand one token into targets sharing (copies of) the given ports
 *
 * - literal -> one target without origin
 * - subnet  -> every address of the block under context.subnetPolicy
 * - range   -> every address from start to end inclusive
 * - domain  -> every resolved address of the preferred family
 *
 * Throws AddressClassificationError, RangeOrderError, ExpansionLimitError
 * or DnsError.
 */
export async function expandToken(
  token: string,
  ports: readonly number[],
  context: ResolveContext,
): Promise<Target[]> {
  const spec = parseAddressSpec(token)
  context.logger.debug({ token: spec.token, kind: spec.kind }, 'classified target token')

  let targets: Target[]
  switch (spec.kind) {
    case 'ipv4-literal':
    case 'ipv6-literal':
      targets = [{ address: formatAddress(spec.address), ports: [...ports] }]
      break
    case 'ipv4-subnet':
    case 'ipv6-subnet': {
      const [first, last] = subnetBounds(spec.block, context.subnetPolicy)
      targets = enumerate(spec.token, first, last, ports, context)
      break
    }
    case 'ipv4-range':
    case 'ipv6-range':
      if (compareAddresses(spec.start, spec.end) > 0) {
        throw new RangeOrderError(spec.token)
      }
      targets = enumerate(spec.token, spec.start, spec.end, ports, context)
      break
    case 'domain':
      targets = await resolveDomain(spec.token, spec.name, ports, context)
      break
  }

  context.logger.debug({ token: spec.token, targets: targets.length }, 'expanded target token')
  return targets
}
