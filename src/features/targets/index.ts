export { parseAddressSpec, classifyAddress } from './classify'
export { expandToken, subnetBounds } from './expand'
export { resolveList, resolveFile, expandTokens, splitTargetList, dedupeTargets } from './batch'
export { createSystemDnsResolver } from './dns'
export { isKnownTld, tldCount, parseTldList } from './tld-registry'
export type {
  Target,
  AddressKind,
  AddressSpec,
  AddressFamilyPreference,
  SubnetPolicy,
  DnsResolver,
  ResolveContext,
} from './types'
