/**
 * DNS collaborator backed by the system resolver
 */

import { Resolver } from 'node:dns/promises'
import { ConfigError, DnsError, systemErrorCode } from '@/lib/errors'
import { silentLogger, type Logger } from '@/lib/logger'
import type { DnsResolver } from './types'

/**
 * Query A and AAAA records for a name
 *
 * ENODATA for one family is an empty answer for that family. Any other
 * failure of either query fails the lookup, so a flaky resolver cannot
 * silently drop addresses from the target list.
 */
export function createSystemDnsResolver(servers: string[] = [], logger: Logger = silentLogger()): DnsResolver {
  const resolver = new Resolver()
  if (servers.length > 0) {
    try {
      resolver.setServers(servers)
    } catch (err) {
      throw new ConfigError('dns servers', servers.join(','), err instanceof Error ? err.message : String(err))
    }
  }

  return {
    async resolve(name: string): Promise<string[]> {
      const results = await Promise.allSettled([resolver.resolve4(name), resolver.resolve6(name)])

      const addresses: string[] = []
      for (const result of results) {
        if (result.status === 'fulfilled') {
          addresses.push(...result.value)
        } else if (systemErrorCode(result.reason) !== 'ENODATA') {
          logger.debug({ name, err: result.reason }, 'dns query failed')
          throw new DnsError(name, result.reason)
        }
      }

      logger.trace({ name, addresses }, 'dns answer')
      return addresses
    },
  }
}
