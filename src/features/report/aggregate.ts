/**
 * Result Aggregator
 * Pure transform from an engine record batch to a sorted report.
 *
 * Ordering: address (IPv4 before IPv6, numeric within a family), then port,
 * then protocol. Records sharing a key are merged by preference rather than
 * arrival order (the more positive status, then the faster probe), so any
 * permutation of the same records yields the same report.
 */

import { canonicalAddress, compareAddresses, parseAddress } from '@/lib/cidr'
import { APP_NAME, formatSeconds, renderMac, renderOs, renderPing, renderPorts, type RenderedBody } from './render'
import type {
  MacRecord,
  OsRecord,
  PingRecord,
  PortRecord,
  PortStatus,
  RecordBatch,
  RecordKind,
  Report,
  ResultRecord,
  ScanSummary,
} from './types'

export const DEFAULT_TOP_K = 3

const PORT_STATUS_RANK: Record<PortStatus, number> = {
  'open': 5,
  'open|filtered': 4,
  'unfiltered': 3,
  'closed|filtered': 2,
  'closed': 1,
  'filtered': 0,
}

// =============================================================================
// Ordering
// =============================================================================

/**
 * Compare address strings numerically; unparseable text sorts last
 */
export function compareAddressText(a: string, b: string): number {
  const left = parseAddress(a)
  const right = parseAddress(b)
  if (left && right) return compareAddresses(left, right)
  if (left) return -1
  if (right) return 1
  return a < b ? -1 : a > b ? 1 : 0
}

function compareRecords(a: ResultRecord, b: ResultRecord): number {
  const byAddress = compareAddressText(a.address, b.address)
  if (byAddress !== 0) return byAddress
  if (a.kind === 'port' && b.kind === 'port') {
    if (a.port !== b.port) return a.port - b.port
    return a.protocol < b.protocol ? -1 : a.protocol > b.protocol ? 1 : 0
  }
  return 0
}

function recordKey(record: ResultRecord): string {
  return record.kind === 'port' ? `${record.address}|${record.port}|${record.protocol}` : record.address
}

// =============================================================================
// Merging
// =============================================================================

function statusRank(record: ResultRecord): number {
  switch (record.kind) {
    case 'ping':
      return record.status === 'up' ? 1 : 0
    case 'mac':
      return record.mac ? 1 : 0
    case 'port':
      return PORT_STATUS_RANK[record.status]
    case 'os':
      return record.candidates.length
  }
}

function preferRecord<R extends ResultRecord>(a: R, b: R): R {
  const rankDiff = statusRank(a) - statusRank(b)
  if (rankDiff !== 0) return rankDiff > 0 ? a : b
  if (a.cost !== b.cost) return a.cost < b.cost ? a : b
  return JSON.stringify(a) <= JSON.stringify(b) ? a : b
}

/**
 * Canonicalize addresses, merge records sharing a key and sort
 */
export function mergeRecords<R extends ResultRecord>(records: readonly R[]): R[] {
  const merged = new Map<string, R>()
  for (const record of records) {
    const normalized: R = { ...record, address: canonicalAddress(record.address) ?? record.address }
    const key = recordKey(normalized)
    const existing = merged.get(key)
    merged.set(key, existing ? preferRecord(existing, normalized) : normalized)
  }
  return [...merged.values()].sort(compareRecords)
}

// =============================================================================
// Aggregation
// =============================================================================

function renderBody(batch: RecordBatch, topK: number): RenderedBody {
  switch (batch.kind) {
    case 'ping':
      return renderPing(mergeRecords<PingRecord>(batch.records))
    case 'mac':
      return renderMac(mergeRecords<MacRecord>(batch.records))
    case 'port':
      return renderPorts(mergeRecords<PortRecord>(batch.records))
    case 'os':
      return renderOs(mergeRecords<OsRecord>(batch.records), topK)
  }
}

export function formatTail(kind: RecordKind, summary: ScanSummary, body: RenderedBody): string {
  const scanned = `scanned in ${formatSeconds(summary.elapsed)} seconds`
  switch (kind) {
    case 'ping':
    case 'mac':
      return `${APP_NAME} done: ${summary.targets} ip addresses (${body.stats.hostsUp} hosts up) ${scanned}`
    case 'port':
      return `${APP_NAME} done: ${summary.targets} ip addresses (${body.stats.portsOpen} ports open) ${scanned}`
    case 'os':
      return `${APP_NAME} done: ${summary.targets} ip addresses ${scanned}`
  }
}

/**
 * Build the report for one engine batch
 */
export function aggregate(batch: RecordBatch, summary: ScanSummary): Report {
  const body = renderBody(batch, summary.topK ?? DEFAULT_TOP_K)
  return {
    kind: batch.kind,
    lines: body.lines,
    tail: formatTail(batch.kind, summary, body),
    stats: body.stats,
  }
}

/**
 * Report body lines followed by the tail line
 */
export function renderReport(report: Report): string {
  return [...report.lines, report.tail].join('\n')
}
