/**
 * Runtime configuration
 * Defaults <- RECONMAP_* environment variables <- CLI overrides
 */

import { z } from 'zod'
import { ConfigError } from './errors'
import { LOG_LEVELS, isLogLevel, type LogFormat, type LogLevel } from './logger'
import type { AddressFamilyPreference, SubnetPolicy } from '@/features/targets/types'

// =============================================================================
// Types
// =============================================================================

export interface ReconConfig {
  /** Per-probe timeout in seconds */
  timeout: number
  threads: number
  retries: number
  topK: number
  preference: AddressFamilyPreference
  subnetPolicy: SubnetPolicy
  maxTargets: number
  dnsServers: string[]
  logLevel: LogLevel
  logFormat: LogFormat
}

export type ConfigOverrides = Partial<ReconConfig>

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_CONFIG: ReconConfig = {
  timeout: 1.0,
  threads: 64,
  retries: 2,
  topK: 3,
  preference: 'ipv4-first',
  subnetPolicy: 'full-block',
  maxTargets: 1_048_576,
  dnsServers: [],
  logLevel: 'warn',
  logFormat: 'pretty',
}

const ENV_KEYS = {
  timeout: 'RECONMAP_TIMEOUT',
  threads: 'RECONMAP_THREADS',
  retries: 'RECONMAP_RETRIES',
  topK: 'RECONMAP_TOP_K',
  ipv6First: 'RECONMAP_IPV6_FIRST',
  maxTargets: 'RECONMAP_MAX_TARGETS',
  dnsServers: 'RECONMAP_DNS_SERVERS',
  logLevel: 'RECONMAP_LOG_LEVEL',
  logFormat: 'RECONMAP_LOG_FORMAT',
} as const

const configSchema = z.object({
  timeout: z.number().positive().max(3600),
  threads: z.number().int().min(1).max(4096),
  retries: z.number().int().min(0).max(10),
  topK: z.number().int().min(1).max(100),
  preference: z.enum(['ipv4-first', 'ipv6-first']),
  subnetPolicy: z.enum(['full-block', 'hosts-only']),
  maxTargets: z.number().int().min(1),
  dnsServers: z.array(z.string().min(1)),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
  logFormat: z.enum(['json', 'pretty']),
})

// =============================================================================
// Environment parsing
// =============================================================================

function envNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') return undefined
  const value = Number(raw)
  if (!Number.isFinite(value)) {
    throw new ConfigError(key, raw, 'expected a number')
  }
  return value
}

function envBoolean(env: NodeJS.ProcessEnv, key: string): boolean | undefined {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') return undefined
  const normalized = raw.trim().toLowerCase()
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false
  throw new ConfigError(key, raw, 'expected true or false')
}

/**
 * Read the RECONMAP_* variables; unset variables are left out
 */
export function getConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  const overrides: ConfigOverrides = {}

  const timeout = envNumber(env, ENV_KEYS.timeout)
  if (timeout !== undefined) overrides.timeout = timeout
  const threads = envNumber(env, ENV_KEYS.threads)
  if (threads !== undefined) overrides.threads = threads
  const retries = envNumber(env, ENV_KEYS.retries)
  if (retries !== undefined) overrides.retries = retries
  const topK = envNumber(env, ENV_KEYS.topK)
  if (topK !== undefined) overrides.topK = topK
  const maxTargets = envNumber(env, ENV_KEYS.maxTargets)
  if (maxTargets !== undefined) overrides.maxTargets = maxTargets

  const ipv6First = envBoolean(env, ENV_KEYS.ipv6First)
  if (ipv6First !== undefined) overrides.preference = ipv6First ? 'ipv6-first' : 'ipv4-first'

  const servers = env[ENV_KEYS.dnsServers]
  if (servers) {
    overrides.dnsServers = servers.split(',').map((s) => s.trim()).filter(Boolean)
  }

  const level = env[ENV_KEYS.logLevel]?.trim().toLowerCase()
  if (level) {
    if (!isLogLevel(level)) {
      throw new ConfigError(ENV_KEYS.logLevel, level, `expected one of ${LOG_LEVELS.join(', ')}`)
    }
    overrides.logLevel = level
  }

  const format = env[ENV_KEYS.logFormat]?.trim().toLowerCase()
  if (format) {
    if (format !== 'json' && format !== 'pretty') {
      throw new ConfigError(ENV_KEYS.logFormat, format, 'expected json or pretty')
    }
    overrides.logFormat = format
  }

  return overrides
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Merge defaults, environment and explicit overrides, then validate
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
): ReconConfig {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  )
  const merged = { ...DEFAULT_CONFIG, ...getConfigFromEnv(env), ...defined }

  const result = configSchema.safeParse(merged)
  if (!result.success) {
    const issue = result.error.issues[0]
    const key = issue.path.join('.')
    const value = Object.entries(merged).find(([name]) => name === issue.path[0])?.[1]
    throw new ConfigError(key, String(value), issue.message)
  }
  return result.data
}
