/**
 * Scan result records and reports
 */

// =============================================================================
// Result records
// =============================================================================

export type HostStatus = 'up' | 'down'

export type PortStatus =
  | 'open'
  | 'closed'
  | 'filtered'
  | 'unfiltered'
  | 'open|filtered'
  | 'closed|filtered'

export type Protocol = 'tcp' | 'udp'

export interface PingRecord {
  kind: 'ping'
  address: string
  status: HostStatus
  /** Probe time in seconds */
  cost: number
}

/** ARP / NDP host discovery: a MAC answer means the host is up */
export interface MacRecord {
  kind: 'mac'
  address: string
  mac?: string
  vendor?: string
  cost: number
}

export interface PortRecord {
  kind: 'port'
  address: string
  port: number
  protocol: Protocol
  status: PortStatus
  cost: number
}

export interface OsCandidate {
  name: string
  cpe: string[]
}

export interface OsRecord {
  kind: 'os'
  address: string
  /** Best match first */
  candidates: OsCandidate[]
  cost: number
}

export type ResultRecord = PingRecord | MacRecord | PortRecord | OsRecord

export type RecordKind = ResultRecord['kind']

/**
 * All records of one engine run; every record has the batch's kind
 */
export type RecordBatch =
  | { kind: 'ping'; records: PingRecord[] }
  | { kind: 'mac'; records: MacRecord[] }
  | { kind: 'port'; records: PortRecord[] }
  | { kind: 'os'; records: OsRecord[] }

// =============================================================================
// Reports
// =============================================================================

export interface ScanSummary {
  /** Number of targets handed to the engine */
  targets: number
  /** Wall-clock seconds measured by the caller around probing */
  elapsed: number
  /** OS candidates listed per host */
  topK?: number
}

export interface ReportStats {
  hostsUp: number
  hostsNotUp: number
  portsOpen: number
  records: number
}

export interface Report {
  kind: RecordKind
  lines: string[]
  tail: string
  stats: ReportStats
}
