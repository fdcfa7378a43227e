/**
 * Typed errors for target resolution and scanning, plus friendly error
 * display for the CLI
 */

import type { Logger } from './logger'

// =============================================================================
// Error Types
// =============================================================================

export type ReconErrorCode =
  | 'PORT_PARSE'
  | 'ADDRESS_CLASSIFICATION'
  | 'RANGE_ORDER'
  | 'DNS'
  | 'IO'
  | 'EMPTY_TARGET_SET'
  | 'EXPANSION_LIMIT'
  | 'ENGINE'
  | 'RECORD_FORMAT'
  | 'CONFIG'

export interface ReconErrorContext {
  message: string
  /** The user input the error is about (token, file path, option value) */
  input?: string
  hint?: string
  cause?: unknown
}

export class ReconError extends Error {
  readonly code: ReconErrorCode
  readonly input?: string
  readonly hint?: string

  constructor(code: ReconErrorCode, context: ReconErrorContext) {
    super(context.message, context.cause === undefined ? undefined : { cause: context.cause })
    this.name = new.target.name
    this.code = code
    this.input = context.input
    this.hint = context.hint
  }
}

export type PortParseReason = 'malformed' | 'range-order'

export class PortParseError extends ReconError {
  readonly reason: PortParseReason

  constructor(segment: string, reason: PortParseReason) {
    super('PORT_PARSE', {
      message: reason === 'range-order'
        ? `invalid port range '${segment}': start must be less than end`
        : `invalid port '${segment}': expected a number from 0 to 65535 or a range like 20-25`,
      input: segment,
    })
    this.reason = reason
  }
}

export class AddressClassificationError extends ReconError {
  constructor(token: string) {
    super('ADDRESS_CLASSIFICATION', {
      message: `cannot parse target '${token}': not an address, subnet, range or known domain name`,
      input: token,
      hint: 'Use forms like 10.0.0.1, 10.0.0.0/24, 10.0.0.1-10.0.0.9, 2001:db8::1 or example.com',
    })
  }
}

export class RangeOrderError extends ReconError {
  constructor(token: string) {
    super('RANGE_ORDER', {
      message: `invalid address range '${token}': start must precede end`,
      input: token,
    })
  }
}

export class DnsError extends ReconError {
  constructor(name: string, cause: unknown) {
    const code = systemErrorCode(cause)
    super('DNS', {
      message: `dns lookup for '${name}' failed${code ? ` (${code})` : ''}`,
      input: name,
      cause,
    })
  }
}

export class IOError extends ReconError {
  constructor(path: string, cause: unknown, what = 'target file') {
    const code = systemErrorCode(cause)
    super('IO', {
      message: `cannot read ${what} '${path}'${code ? ` (${code})` : ''}`,
      input: path,
      cause,
    })
  }
}

export class EmptyTargetSetError extends ReconError {
  constructor(spec: string) {
    super('EMPTY_TARGET_SET', {
      message: `no targets resolved from '${spec}'`,
      input: spec,
      hint: 'A domain may have no address of the preferred family; try --ipv6 or check the input',
    })
  }
}

export class ExpansionLimitError extends ReconError {
  constructor(token: string, count: bigint, limit: number) {
    super('EXPANSION_LIMIT', {
      message: `target '${token}' expands to ${count} addresses, more than the limit of ${limit}`,
      input: token,
      hint: 'Narrow the subnet or range, or raise RECONMAP_MAX_TARGETS',
    })
  }
}

export class EngineError extends ReconError {
  constructor(message: string, input?: string, cause?: unknown) {
    super('ENGINE', { message, input, cause })
  }
}

export class RecordFormatError extends ReconError {
  constructor(path: string, detail: string) {
    super('RECORD_FORMAT', {
      message: `invalid scan result file '${path}': ${detail}`,
      input: path,
    })
  }
}

export class ConfigError extends ReconError {
  constructor(key: string, value: string, detail: string) {
    super('CONFIG', {
      message: `invalid value '${value}' for ${key}: ${detail}`,
      input: value,
    })
  }
}

/**
 * Extract the Node system error code ("ENOENT", "ENOTFOUND", ...) if any
 */
export function systemErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}

// =============================================================================
// Friendly Errors
// =============================================================================

export interface FriendlyError {
  title: string
  message: string
  code?: string
  hint?: string
  canRetry: boolean
}

const RECON_ERROR_TITLES: Record<ReconErrorCode, { title: string; canRetry: boolean }> = {
  PORT_PARSE: { title: 'Invalid Port Specification', canRetry: false },
  ADDRESS_CLASSIFICATION: { title: 'Invalid Target', canRetry: false },
  RANGE_ORDER: { title: 'Invalid Address Range', canRetry: false },
  DNS: { title: 'DNS Lookup Failed', canRetry: true },
  IO: { title: 'File Error', canRetry: false },
  EMPTY_TARGET_SET: { title: 'No Targets', canRetry: false },
  EXPANSION_LIMIT: { title: 'Too Many Targets', canRetry: false },
  ENGINE: { title: 'Scan Engine Error', canRetry: true },
  RECORD_FORMAT: { title: 'Invalid Scan Results', canRetry: false },
  CONFIG: { title: 'Invalid Configuration', canRetry: false },
}

const ERROR_PATTERNS: Array<{
  pattern: RegExp
  title: string
  message: string
  canRetry: boolean
}> = [
  {
    pattern: /ENOENT|no such file/i,
    title: 'File Not Found',
    message: 'The file does not exist. Check the path and try again.',
    canRetry: false,
  },
  {
    pattern: /EACCES|EPERM|permission denied|operation not permitted/i,
    title: 'Permission Denied',
    message: 'Permission denied. This scan method may need elevated privileges.',
    canRetry: false,
  },
  {
    pattern: /ENOTFOUND|EAI_AGAIN|ESERVFAIL|EREFUSED/i,
    title: 'DNS Lookup Failed',
    message: 'The name could not be resolved. Check the spelling and your DNS settings.',
    canRetry: true,
  },
  {
    pattern: /timeout|ETIMEDOUT|ECONNRESET/i,
    title: 'Request Timeout',
    message: 'The operation took too long. Try a larger --timeout.',
    canRetry: true,
  },
  {
    pattern: /ENETUNREACH|EHOSTUNREACH|network/i,
    title: 'Network Error',
    message: 'The network is unreachable from this host.',
    canRetry: true,
  },
]

/**
 * Parse a raw error into a user-friendly message
 */
export function parseError(error: unknown): FriendlyError {
  if (!error) {
    return {
      title: 'Unknown Error',
      message: 'An unexpected error occurred.',
      canRetry: false,
    }
  }

  if (error instanceof ReconError) {
    const { title, canRetry } = RECON_ERROR_TITLES[error.code]
    return { title, message: error.message, code: error.code, hint: error.hint, canRetry }
  }

  let errorMessage: string
  let errorCode: string | undefined

  if (error instanceof Error) {
    errorMessage = error.message
    errorCode = systemErrorCode(error)
  } else if (typeof error === 'string') {
    errorMessage = error
  } else {
    errorMessage = String(error)
  }

  for (const { pattern, title, message, canRetry } of ERROR_PATTERNS) {
    if (pattern.test(errorMessage) || (errorCode && pattern.test(errorCode))) {
      return { title, message, code: errorCode, canRetry }
    }
  }

  return {
    title: 'Error',
    message: sanitizeErrorMessage(errorMessage),
    code: errorCode,
    canRetry: false,
  }
}

/**
 * Trim, truncate and capitalize an error message for display
 */
function sanitizeErrorMessage(message: string): string {
  let sanitized = message.trim()

  if (sanitized.length > 200) {
    sanitized = sanitized.substring(0, 197) + '...'
  }

  if (sanitized.length > 0) {
    sanitized = sanitized.charAt(0).toUpperCase() + sanitized.slice(1)
  }

  return sanitized || 'An unexpected error occurred.'
}

/**
 * Check if an error is a network error
 */
export function isNetworkError(error: unknown): boolean {
  const { title } = parseError(error)
  return title === 'Network Error' || title === 'Request Timeout' || title === 'DNS Lookup Failed'
}

/**
 * Check if an error can be retried
 */
export function canRetryError(error: unknown): boolean {
  return parseError(error).canRetry
}

/**
 * Log a fatal error and return the message to show the user
 * The error itself, stack included, is logged only at debug and below.
 */
export function reportFailure(error: unknown, logger: Logger): FriendlyError {
  const friendly = parseError(error)
  if (logger.isLevelEnabled('debug')) {
    logger.fatal({ err: error }, friendly.message)
  } else {
    logger.fatal(friendly.message)
  }
  return friendly
}
