/**
 * Unit tests for src/lib/errors.ts
 * Typed errors and friendly error generation
 */

import { describe, it, expect } from 'vitest'
import { createLogger, type Logger } from '@/lib/logger'
import {
  parseError,
  reportFailure,
  isNetworkError,
  canRetryError,
  systemErrorCode,
  ReconError,
  PortParseError,
  AddressClassificationError,
  RangeOrderError,
  DnsError,
  IOError,
  EmptyTargetSetError,
  ExpansionLimitError,
  RecordFormatError,
  ConfigError,
} from '@/lib/errors'

function systemError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code })
}

describe('typed errors', () => {
  it('carry their code, name and input', () => {
    const error = new PortParseError('70000', 'malformed')
    expect(error).toBeInstanceOf(ReconError)
    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe('PortParseError')
    expect(error.code).toBe('PORT_PARSE')
    expect(error.input).toBe('70000')
    expect(error.reason).toBe('malformed')
  })

  it('describe port errors by reason', () => {
    expect(new PortParseError('25-20', 'range-order').message).toBe(
      "invalid port range '25-20': start must be less than end",
    )
    expect(new PortParseError('http', 'malformed').message).toBe(
      "invalid port 'http': expected a number from 0 to 65535 or a range like 20-25",
    )
  })

  it('name the offending token', () => {
    expect(new AddressClassificationError('foo.invalidtld').message).toBe(
      "cannot parse target 'foo.invalidtld': not an address, subnet, range or known domain name",
    )
    expect(new RangeOrderError('10.0.0.9-10.0.0.1').message).toBe(
      "invalid address range '10.0.0.9-10.0.0.1': start must precede end",
    )
    expect(new EmptyTargetSetError('example.com').message).toBe("no targets resolved from 'example.com'")
  })

  it('include the system code of the cause', () => {
    const dns = new DnsError('example.com', systemError('queryA ESERVFAIL example.com', 'ESERVFAIL'))
    expect(dns.message).toBe("dns lookup for 'example.com' failed (ESERVFAIL)")
    expect(dns.cause).toBeInstanceOf(Error)

    const io = new IOError('targets.txt', systemError('no such file', 'ENOENT'))
    expect(io.message).toBe("cannot read target file 'targets.txt' (ENOENT)")

    const results = new IOError('out.json', systemError('no such file', 'ENOENT'), 'scan result file')
    expect(results.message).toBe("cannot read scan result file 'out.json' (ENOENT)")
  })

  it('report the expansion size against the limit', () => {
    const error = new ExpansionLimitError('10.0.0.0/8', 16777216n, 1048576)
    expect(error.message).toBe("target '10.0.0.0/8' expands to 16777216 addresses, more than the limit of 1048576")
    expect(error.code).toBe('EXPANSION_LIMIT')
  })

  it('format record and config errors', () => {
    expect(new RecordFormatError('out.json', 'records: Required').message).toBe(
      "invalid scan result file 'out.json': records: Required",
    )
    expect(new ConfigError('RECONMAP_THREADS', 'many', 'expected a number').message).toBe(
      "invalid value 'many' for RECONMAP_THREADS: expected a number",
    )
  })
})

describe('systemErrorCode', () => {
  it('reads string codes only', () => {
    expect(systemErrorCode(systemError('x', 'ENOENT'))).toBe('ENOENT')
    expect(systemErrorCode(new Error('x'))).toBeUndefined()
    expect(systemErrorCode('ENOENT')).toBeUndefined()
  })
})

describe('parseError', () => {
  describe('null/undefined handling', () => {
    it('returns default error for null', () => {
      const result = parseError(null)
      expect(result.title).toBe('Unknown Error')
      expect(result.message).toBe('An unexpected error occurred.')
      expect(result.canRetry).toBe(false)
    })

    it('returns default error for undefined', () => {
      expect(parseError(undefined).title).toBe('Unknown Error')
    })
  })

  describe('typed errors', () => {
    it('maps each code to a title', () => {
      const result = parseError(new RangeOrderError('b-a'))
      expect(result.title).toBe('Invalid Address Range')
      expect(result.code).toBe('RANGE_ORDER')
      expect(result.message).toBe("invalid address range 'b-a': start must precede end")
      expect(result.canRetry).toBe(false)
    })

    it('keeps the hint', () => {
      const result = parseError(new AddressClassificationError('nope'))
      expect(result.title).toBe('Invalid Target')
      expect(result.hint).toContain('10.0.0.0/24')
    })

    it('marks DNS failures retryable', () => {
      const result = parseError(new DnsError('example.com', undefined))
      expect(result.title).toBe('DNS Lookup Failed')
      expect(result.canRetry).toBe(true)
    })
  })

  describe('system error patterns', () => {
    it('detects missing files', () => {
      const result = parseError(systemError('open failed', 'ENOENT'))
      expect(result.title).toBe('File Not Found')
      expect(result.code).toBe('ENOENT')
    })

    it('detects permission errors', () => {
      expect(parseError(systemError('socket', 'EPERM')).title).toBe('Permission Denied')
    })

    it('detects timeouts', () => {
      expect(parseError(new Error('connect ETIMEDOUT 10.0.0.1:80')).title).toBe('Request Timeout')
    })

    it('detects unreachable networks', () => {
      expect(parseError(new Error('connect ENETUNREACH 10.0.0.1:80')).title).toBe('Network Error')
    })
  })

  describe('fallback', () => {
    it('capitalizes plain messages', () => {
      const result = parseError('something broke')
      expect(result.title).toBe('Error')
      expect(result.message).toBe('Something broke')
    })

    it('truncates long messages', () => {
      const result = parseError(new Error('x'.repeat(300)))
      expect(result.message).toBe('X' + 'x'.repeat(196) + '...')
    })
  })
})

describe('isNetworkError / canRetryError', () => {
  it('classifies network failures', () => {
    expect(isNetworkError(new Error('connect ETIMEDOUT'))).toBe(true)
    expect(isNetworkError(new DnsError('example.com', undefined))).toBe(true)
    expect(isNetworkError(new RangeOrderError('b-a'))).toBe(false)
  })

  it('follows canRetry', () => {
    expect(canRetryError(new DnsError('example.com', undefined))).toBe(true)
    expect(canRetryError(new PortParseError('x', 'malformed'))).toBe(false)
  })
})

describe('reportFailure', () => {
  function capture(level: 'debug' | 'warn' | 'silent'): { logger: Logger; lines: string[] } {
    const lines: string[] = []
    const logger = createLogger({ level, destination: { write: (msg: string) => { lines.push(msg) } } })
    return { logger, lines }
  }

  it('logs a fatal record carrying the stack at debug', () => {
    const { logger, lines } = capture('debug')
    const error = new RangeOrderError('b-a')
    const friendly = reportFailure(error, logger)

    expect(friendly.title).toBe('Invalid Address Range')
    expect(lines).toHaveLength(1)
    const record: unknown = JSON.parse(lines[0])
    expect(record).toMatchObject({
      level: 60,
      msg: "invalid address range 'b-a': start must precede end",
      err: { message: "invalid address range 'b-a': start must precede end", stack: error.stack },
    })
  })

  it('leaves the error out above debug', () => {
    const { logger, lines } = capture('warn')
    reportFailure(new RangeOrderError('b-a'), logger)

    expect(lines).toHaveLength(1)
    const record: unknown = JSON.parse(lines[0])
    expect(record).toMatchObject({ level: 60, msg: "invalid address range 'b-a': start must precede end" })
    expect(record).not.toHaveProperty('err')
  })

  it('writes nothing when logging is off', () => {
    const { logger, lines } = capture('silent')
    expect(reportFailure(new Error('boom'), logger).message).toBe('Boom')
    expect(lines).toEqual([])
  })
})
