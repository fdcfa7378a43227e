/**
 * Unprivileged scanning engine built on TCP connect()
 *
 * - tcp-connect host discovery: a host is up when any probe port answers
 *   with a completed handshake or a reset. Probe ports are the target's
 *   ports, or 80 and 443 when it has none.
 * - connect port scan: open on handshake, closed on reset, filtered on
 *   timeout or unreachable.
 *
 * Probes that get no answer are retried `retries` more times. Other scan
 * methods need raw sockets and are left to external engines.
 */

import net from 'node:net'
import { PromisePool } from '@supercharge/promise-pool'
import { EngineError, systemErrorCode } from '@/lib/errors'
import { silentLogger, type Logger } from '@/lib/logger'
import type { Target } from '@/features/targets'
import type { PingRecord, PortRecord, PortStatus, RecordBatch } from '@/features/report'
import { describeMethod, type ScanEngine, type ScanOptions } from './types'

export const DEFAULT_DISCOVERY_PORTS = [80, 443]

// =============================================================================
// Probes
// =============================================================================

export type ProbeOutcome = 'connected' | 'refused' | 'no-answer'

export interface ProbeResult {
  outcome: ProbeOutcome
  /** Seconds spent on the probe, retries included */
  cost: number
  /** System error code behind a no-answer, if any */
  code?: string
}

function probeOnce(address: string, port: number, timeoutSeconds: number): Promise<Omit<ProbeResult, 'cost'>> {
  return new Promise((resolve) => {
    const socket = new net.Socket()
    let settled = false

    const done = (outcome: ProbeOutcome, code?: string) => {
      if (settled) return
      settled = true
      socket.destroy()
      resolve({ outcome, code })
    }

    socket.setTimeout(timeoutSeconds * 1000)
    socket.once('connect', () => done('connected'))
    socket.once('timeout', () => done('no-answer', 'ETIMEDOUT'))
    socket.once('error', (err) => {
      const code = systemErrorCode(err)
      if (code === 'ECONNREFUSED') {
        done('refused')
      } else {
        done('no-answer', code)
      }
    })

    socket.connect({ host: address, port })
  })
}

/**
 * Connect to address:port, retrying unanswered attempts
 */
export async function probeTcp(
  address: string,
  port: number,
  timeoutSeconds: number,
  retries: number,
): Promise<ProbeResult> {
  const start = performance.now()
  let result = await probeOnce(address, port, timeoutSeconds)
  for (let attempt = 0; attempt < retries && result.outcome === 'no-answer'; attempt++) {
    result = await probeOnce(address, port, timeoutSeconds)
  }
  return { ...result, cost: (performance.now() - start) / 1000 }
}

export function portStatusFromProbe(outcome: ProbeOutcome): PortStatus {
  switch (outcome) {
    case 'connected':
      return 'open'
    case 'refused':
      return 'closed'
    case 'no-answer':
      return 'filtered'
  }
}

// =============================================================================
// Engine
// =============================================================================

export function createConnectEngine(logger: Logger = silentLogger()): ScanEngine {
  async function runPool<I, R>(items: readonly I[], threads: number, probe: (item: I) => Promise<R>): Promise<R[]> {
    const { results, errors } = await PromisePool.for([...items])
      .withConcurrency(threads)
      .process(probe)

    if (errors.length > 0) {
      throw new EngineError(`probe failed: ${errors[0].message}`, undefined, errors[0])
    }
    return results
  }

  async function discoverHost(target: Target, options: ScanOptions): Promise<PingRecord> {
    const start = performance.now()
    const ports = target.ports.length > 0 ? target.ports : DEFAULT_DISCOVERY_PORTS

    for (const port of ports) {
      const probe = await probeTcp(target.address, port, options.timeout, options.retries)
      logger.trace({ address: target.address, port, outcome: probe.outcome, code: probe.code }, 'discovery probe')
      if (probe.outcome !== 'no-answer') {
        return { kind: 'ping', address: target.address, status: 'up', cost: (performance.now() - start) / 1000 }
      }
    }
    return { kind: 'ping', address: target.address, status: 'down', cost: (performance.now() - start) / 1000 }
  }

  async function scanPort(item: { address: string; port: number }, options: ScanOptions): Promise<PortRecord> {
    const probe = await probeTcp(item.address, item.port, options.timeout, options.retries)
    logger.trace({ ...item, outcome: probe.outcome, code: probe.code }, 'port probe')
    return {
      kind: 'port',
      address: item.address,
      port: item.port,
      protocol: 'tcp',
      status: portStatusFromProbe(probe.outcome),
      cost: probe.cost,
    }
  }

  return {
    name: 'connect',

    async run(targets: readonly Target[], options: ScanOptions): Promise<RecordBatch> {
      const { method } = options
      logger.debug({ method: describeMethod(method), targets: targets.length, threads: options.threads }, 'starting scan')

      if (method.mode === 'host-discovery' && method.method === 'tcp-connect') {
        const records = await runPool(targets, options.threads, (target) => discoverHost(target, options))
        return { kind: 'ping', records }
      }

      if (method.mode === 'port-scan' && method.method === 'connect') {
        const missing = targets.find((target) => target.ports.length === 0)
        if (missing) {
          throw new EngineError('port scan needs at least one port; pass --ports', missing.address)
        }
        const items = targets.flatMap((target) => target.ports.map((port) => ({ address: target.address, port })))
        const records = await runPool(items, options.threads, (item) => scanPort(item, options))
        return { kind: 'port', records }
      }

      throw new EngineError(
        `${describeMethod(method)} needs raw socket access and is not supported by the connect engine; ` +
          'run an external engine and pass its output with --results',
        method.mode === 'os-detect' ? undefined : method.method,
      )
    },
  }
}
