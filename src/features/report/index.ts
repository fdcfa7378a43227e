export { aggregate, renderReport, mergeRecords, compareAddressText, formatTail, DEFAULT_TOP_K } from './aggregate'
export { APP_NAME, formatSeconds, formatEndpoint } from './render'
export type {
  HostStatus,
  PortStatus,
  Protocol,
  PingRecord,
  MacRecord,
  PortRecord,
  OsRecord,
  OsCandidate,
  ResultRecord,
  RecordKind,
  RecordBatch,
  ScanSummary,
  Report,
  ReportStats,
} from './types'
