/**
 * One line renderer per result record kind
 * Renderers receive records already merged and sorted.
 */

import type { MacRecord, OsRecord, PingRecord, PortRecord, ReportStats } from './types'

export const APP_NAME = 'reconmap'

export interface RenderedBody {
  lines: string[]
  stats: ReportStats
}

export function formatSeconds(seconds: number): string {
  return seconds.toFixed(2)
}

/**
 * "10.0.0.1" + 80 -> "10.0.0.1:80", "2001:db8::1" + 80 -> "[2001:db8::1]:80"
 */
export function formatEndpoint(address: string, port: number): string {
  return address.includes(':') ? `[${address}]:${port}` : `${address}:${port}`
}

function collapsedDown(count: number): string[] {
  return count > 0 ? [`other ${count} hosts -> down`] : []
}

// =============================================================================
// Host discovery
// =============================================================================

export function renderPing(records: PingRecord[]): RenderedBody {
  const lines: string[] = []
  let hostsUp = 0
  let hostsNotUp = 0

  for (const record of records) {
    if (record.status === 'up') {
      hostsUp++
      lines.push(`${record.address} -> up (${formatSeconds(record.cost)}s)`)
    } else {
      hostsNotUp++
    }
  }
  lines.push(...collapsedDown(hostsNotUp))

  return { lines, stats: { hostsUp, hostsNotUp, portsOpen: 0, records: records.length } }
}

export function renderMac(records: MacRecord[]): RenderedBody {
  const lines: string[] = []
  let hostsUp = 0
  let hostsNotUp = 0

  for (const record of records) {
    if (record.mac) {
      hostsUp++
      lines.push(
        `${record.address} -> up (${formatSeconds(record.cost)}s) (${record.mac}) (${record.vendor ?? 'unknown'})`,
      )
    } else {
      hostsNotUp++
    }
  }
  lines.push(...collapsedDown(hostsNotUp))

  return { lines, stats: { hostsUp, hostsNotUp, portsOpen: 0, records: records.length } }
}

// =============================================================================
// Port scanning
// =============================================================================

export function renderPorts(records: PortRecord[]): RenderedBody {
  const lines: string[] = []
  const openHosts = new Set<string>()
  const allHosts = new Set<string>()
  let portsOpen = 0

  for (const record of records) {
    allHosts.add(record.address)
    if (record.status === 'open') {
      portsOpen++
      openHosts.add(record.address)
    }
    lines.push(
      `${formatEndpoint(record.address, record.port)}/${record.protocol} -> ${record.status} (${formatSeconds(record.cost)}s)`,
    )
  }

  return {
    lines,
    stats: {
      hostsUp: openHosts.size,
      hostsNotUp: allHosts.size - openHosts.size,
      portsOpen,
      records: records.length,
    },
  }
}

// =============================================================================
// OS detection
// =============================================================================

export function renderOs(records: OsRecord[], topK: number): RenderedBody {
  const lines: string[] = []
  let detected = 0

  for (const record of records) {
    const candidates = record.candidates.slice(0, topK)
    if (candidates.length > 0) detected++

    const guesses = candidates.length > 0
      ? candidates
        .map((candidate) => (candidate.cpe.length > 0 ? `${candidate.name} [${candidate.cpe.join(', ')}]` : candidate.name))
        .join(' | ')
      : 'no match'
    lines.push(`${record.address} -> ${guesses} (${formatSeconds(record.cost)}s)`)
  }

  return {
    lines,
    stats: { hostsUp: detected, hostsNotUp: records.length - detected, portsOpen: 0, records: records.length },
  }
}
