/**
 * Address Spec Classifier
 * Decides what kind of address expression a free-form target token is,
 * without an explicit --type flag:
 *
 * - "10.0.0.1"                -> ipv4-literal
 * - "2001:db8::1"             -> ipv6-literal
 * - "10.0.0.0/24"             -> ipv4-subnet
 * - "2001:db8::/120"          -> ipv6-subnet
 * - "10.0.0.1-10.0.0.9"       -> ipv4-range
 * - "2001:db8::1-2001:db8::9" -> ipv6-range
 * - "example.com"             -> domain (last label must be a known TLD)
 */

import { isValidIPv4, parseCIDR, parseIPv6, parseAddress } from '@/lib/cidr'
import { AddressClassificationError } from '@/lib/errors'
import { isKnownTld } from './tld-registry'
import type { AddressKind, AddressSpec } from './types'

const IPV4_CHARS = /^[0-9./]+$/

/**
 * Classify a token and return its parsed parts
 * Throws AddressClassificationError when no form matches.
 */
export function parseAddressSpec(raw: string): AddressSpec {
  const token = raw.trim()
  if (!token) {
    throw new AddressClassificationError(raw)
  }

  // IPv6 literal or subnet
  if (token.includes(':') && !token.includes('-')) {
    if (token.includes('/')) {
      const block = parseCIDR(token)
      if (block && block.network.family === 6) {
        return { kind: 'ipv6-subnet', token, block }
      }
    } else {
      const value = parseIPv6(token)
      if (value !== null) {
        return { kind: 'ipv6-literal', token, address: { family: 6, value } }
      }
    }
  }

  // IPv4 literal or subnet
  if (IPV4_CHARS.test(token)) {
    if (token.includes('/')) {
      const block = parseCIDR(token)
      if (block && block.network.family === 4) {
        return { kind: 'ipv4-subnet', token, block }
      }
    } else if (isValidIPv4(token)) {
      const address = parseAddress(token)
      if (address) {
        return { kind: 'ipv4-literal', token, address }
      }
    }
  }

  // Address range, split at the first '-'
  const dash = token.indexOf('-')
  if (dash !== -1) {
    const startText = token.substring(0, dash).trim()
    const endText = token.substring(dash + 1).trim()

    if (isValidIPv4(startText) && isValidIPv4(endText)) {
      const start = parseAddress(startText)
      const end = parseAddress(endText)
      if (start && end) {
        return { kind: 'ipv4-range', token, start, end }
      }
    }

    if (startText.includes(':') || endText.includes(':')) {
      const start = parseIPv6(startText)
      const end = parseIPv6(endText)
      if (start !== null && end !== null) {
        return {
          kind: 'ipv6-range',
          token,
          start: { family: 6, value: start },
          end: { family: 6, value: end },
        }
      }
    }
  }

  // Domain name, recognized by its top-level label. A trailing root dot
  // ("example.com.") is allowed.
  const name = token.endsWith('.') ? token.substring(0, token.length - 1) : token
  const labels = name.split('.')
  const tld = labels[labels.length - 1].trim()
  if (isKnownTld(tld)) {
    return { kind: 'domain', token, name }
  }

  throw new AddressClassificationError(token)
}

export function classifyAddress(token: string): AddressKind {
  return parseAddressSpec(token).kind
}
