/**
 * Scanning engine boundary
 * The engine probes targets with its own worker pool and hands back one
 * complete record batch once every probe has finished.
 */

import type { Target } from '@/features/targets'
import type { RecordBatch } from '@/features/report'

export const HOST_DISCOVERY_METHODS = [
  'icmp-echo',
  'icmp-timestamp',
  'icmp-address-mask',
  'tcp-syn',
  'tcp-ack',
  'tcp-connect',
  'udp',
  'mac',
] as const

export const PORT_SCAN_METHODS = [
  'syn',
  'connect',
  'fin',
  'null',
  'xmas',
  'ack',
  'window',
  'maimon',
  'udp',
  'idle',
] as const

export type HostDiscoveryMethod = (typeof HOST_DISCOVERY_METHODS)[number]
export type PortScanMethod = (typeof PORT_SCAN_METHODS)[number]

export type ScanMethod =
  | { mode: 'host-discovery'; method: HostDiscoveryMethod }
  | { mode: 'port-scan'; method: PortScanMethod }
  | { mode: 'os-detect' }

export interface ScanOptions {
  method: ScanMethod
  /** Per-probe timeout in seconds */
  timeout: number
  threads: number
  /** Extra attempts for probes that got no answer */
  retries: number
  topK: number
}

export interface ScanEngine {
  readonly name: string
  run(targets: readonly Target[], options: ScanOptions): Promise<RecordBatch>
}

export function isHostDiscoveryMethod(value: string): value is HostDiscoveryMethod {
  return (HOST_DISCOVERY_METHODS as readonly string[]).includes(value)
}

export function isPortScanMethod(value: string): value is PortScanMethod {
  return (PORT_SCAN_METHODS as readonly string[]).includes(value)
}

export function describeMethod(method: ScanMethod): string {
  switch (method.mode) {
    case 'host-discovery':
      return `host discovery (${method.method})`
    case 'port-scan':
      return `port scan (${method.method})`
    case 'os-detect':
      return 'os detection'
  }
}
