/**
 * TCP connect engine tests against in-process servers on 127.0.0.1
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import net from 'node:net'
import { createConnectEngine, portStatusFromProbe, probeTcp, type ScanOptions } from '@/features/engine'
import { EngineError } from '@/lib/errors'

const LOCALHOST = '127.0.0.1'

function listen(server: net.Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject)
    server.listen(0, LOCALHOST, () => {
      const address = server.address()
      if (address && typeof address === 'object') {
        resolve(address.port)
      } else {
        reject(new Error('server has no port'))
      }
    })
  })
}

function close(server: net.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()))
  })
}

let server: net.Server
let openPort = 0
let closedPort = 0

beforeAll(async () => {
  server = net.createServer((socket) => socket.end())
  openPort = await listen(server)

  // A port that was just released refuses connections
  const released = net.createServer()
  closedPort = await listen(released)
  await close(released)
})

afterAll(async () => {
  await close(server)
})

function options(method: ScanOptions['method']): ScanOptions {
  return { method, timeout: 2, threads: 4, retries: 0, topK: 3 }
}

// =============================================================================
// Probes
// =============================================================================

describe('probeTcp', () => {
  it('connects to a listening port', async () => {
    const result = await probeTcp(LOCALHOST, openPort, 2, 0)
    expect(result.outcome).toBe('connected')
    expect(result.cost).toBeGreaterThanOrEqual(0)
  })

  it('sees a reset on a closed port', async () => {
    const result = await probeTcp(LOCALHOST, closedPort, 2, 1)
    expect(result.outcome).toBe('refused')
  })
})

describe('portStatusFromProbe', () => {
  it('maps probe outcomes to port states', () => {
    expect(portStatusFromProbe('connected')).toBe('open')
    expect(portStatusFromProbe('refused')).toBe('closed')
    expect(portStatusFromProbe('no-answer')).toBe('filtered')
  })
})

// =============================================================================
// Engine
// =============================================================================

describe('connect engine', () => {
  const engine = createConnectEngine()

  it('scans ports', async () => {
    const batch = await engine.run(
      [{ address: LOCALHOST, ports: [openPort, closedPort] }],
      options({ mode: 'port-scan', method: 'connect' }),
    )
    expect(batch.kind).toBe('port')
    if (batch.kind !== 'port') return
    const statuses = Object.fromEntries(batch.records.map((record) => [record.port, record.status]))
    expect(statuses).toEqual({ [openPort]: 'open', [closedPort]: 'closed' })
    expect(batch.records.every((record) => record.protocol === 'tcp' && record.address === LOCALHOST)).toBe(true)
  })

  it('finds hosts that answer with a connection or a reset', async () => {
    const batch = await engine.run(
      [
        { address: LOCALHOST, ports: [openPort] },
        { address: LOCALHOST, ports: [closedPort] },
      ],
      options({ mode: 'host-discovery', method: 'tcp-connect' }),
    )
    expect(batch.kind).toBe('ping')
    if (batch.kind !== 'ping') return
    expect(batch.records.map((record) => record.status)).toEqual(['up', 'up'])
  })

  it('needs ports for a port scan', async () => {
    await expect(
      engine.run([{ address: LOCALHOST, ports: [] }], options({ mode: 'port-scan', method: 'connect' })),
    ).rejects.toThrow(EngineError)
  })

  it('refuses methods that need raw sockets', async () => {
    await expect(
      engine.run([{ address: LOCALHOST, ports: [80] }], options({ mode: 'port-scan', method: 'syn' })),
    ).rejects.toThrow('port scan (syn) needs raw socket access')
    await expect(
      engine.run([{ address: LOCALHOST, ports: [] }], options({ mode: 'host-discovery', method: 'icmp-echo' })),
    ).rejects.toThrow(EngineError)
    await expect(engine.run([{ address: LOCALHOST, ports: [] }], options({ mode: 'os-detect' }))).rejects.toThrow(
      'os detection needs raw socket access',
    )
  })
})
