/**
 * reconmap command line definition
 * Flags, their validation and the mapping onto a scan method and config.
 */

import { Command, InvalidArgumentError, Option } from 'commander'
import pkg from '../package.json'
import { loadConfig, type ConfigOverrides, type ReconConfig } from '@/lib/config'
import { isLogLevel, levelFromVerbosity, LOG_LEVELS } from '@/lib/logger'
import {
  HOST_DISCOVERY_METHODS,
  isHostDiscoveryMethod,
  isPortScanMethod,
  PORT_SCAN_METHODS,
  type ScanMethod,
} from '@/features/engine'

// =============================================================================
// Types
// =============================================================================

export interface CliOptions {
  filename?: string
  ports: string
  ipv6: boolean
  dedupe: boolean
  hostsOnly: boolean
  ping?: string
  portScan?: string
  osDetect: boolean
  results?: string
  timeout?: number
  threads?: number
  retries?: number
  topK?: number
  yes: boolean
  verbose: number
  logLevel?: string
  listTargets: boolean
}

export type CliAction = (list: string | undefined, options: CliOptions, command: Command) => Promise<void>

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_PING_METHOD = 'tcp-connect'

// =============================================================================
// Option parsing
// =============================================================================

function numberOption(value: string): number {
  const parsed = Number(value)
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.')
  }
  return parsed
}

function countVerbosity(_value: string, previous: number): number {
  return previous + 1
}

/**
 * Pick the scan method; tcp-connect host discovery when no mode flag is given
 */
export function scanMethodFrom(options: CliOptions): ScanMethod {
  if (options.osDetect) {
    return { mode: 'os-detect' }
  }
  if (options.portScan !== undefined) {
    if (!isPortScanMethod(options.portScan)) {
      throw new InvalidArgumentError(`unknown port scan method '${options.portScan}' (one of ${PORT_SCAN_METHODS.join(', ')})`)
    }
    return { mode: 'port-scan', method: options.portScan }
  }
  const ping = options.ping ?? DEFAULT_PING_METHOD
  if (!isHostDiscoveryMethod(ping)) {
    throw new InvalidArgumentError(`unknown ping method '${ping}' (one of ${HOST_DISCOVERY_METHODS.join(', ')})`)
  }
  return { mode: 'host-discovery', method: ping }
}

export function configFrom(options: CliOptions, env: NodeJS.ProcessEnv = process.env): ReconConfig {
  const overrides: ConfigOverrides = {
    timeout: options.timeout,
    threads: options.threads,
    retries: options.retries,
    topK: options.topK,
  }
  if (options.ipv6) overrides.preference = 'ipv6-first'
  if (options.hostsOnly) overrides.subnetPolicy = 'hosts-only'
  if (options.logLevel !== undefined) {
    if (!isLogLevel(options.logLevel)) {
      throw new InvalidArgumentError(`unknown log level '${options.logLevel}'`)
    }
    overrides.logLevel = options.logLevel
  } else if (options.verbose > 0) {
    overrides.logLevel = levelFromVerbosity(options.verbose)
  }
  return loadConfig(env, overrides)
}

// =============================================================================
// Program
// =============================================================================

export function buildProgram(action: CliAction): Command {
  return new Command()
    .name('reconmap')
    .description('Resolve scan targets and report host discovery, port scan and OS detection results')
    .version(pkg.version)
    .argument('[targets]', 'comma-separated addresses, subnets, ranges and domain names')
    .option('-f, --filename <file>', 'read targets from a file, one per line')
    .option('-p, --ports <spec>', 'ports to probe, e.g. 22,80,8000-8100', '')
    .option('--ipv6', 'use the IPv6 addresses of domain names', false)
    .option('--dedupe', 'drop repeated targets', false)
    .option('--hosts-only', 'skip network and broadcast addresses of subnets', false)
    .addOption(
      new Option('--ping <method>', `host discovery (default: ${DEFAULT_PING_METHOD} when no other mode is given)`)
        .choices(HOST_DISCOVERY_METHODS),
    )
    .addOption(new Option('--port-scan <method>', 'port scan').choices(PORT_SCAN_METHODS).conflicts('ping'))
    .addOption(new Option('--os-detect', 'operating system detection').default(false).conflicts(['ping', 'portScan']))
    .option('--results <file>', 'aggregate a result file written by an external engine instead of probing')
    .option('--timeout <seconds>', 'per-probe timeout', numberOption)
    .option('--threads <count>', 'concurrent probes', numberOption)
    .option('--retries <count>', 'extra attempts for unanswered probes', numberOption)
    .option('--top-k <count>', 'OS guesses shown per host', numberOption)
    .option('-y, --yes', 'do not ask before large scans', false)
    .option('-v, --verbose', 'more logging; repeat for more', countVerbosity, 0)
    .addOption(new Option('--log-level <level>', 'log level').choices(LOG_LEVELS))
    .option('--list-targets', 'print the resolved targets and exit', false)
    .action(action)
}
