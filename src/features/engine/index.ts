export { createConnectEngine, probeTcp, portStatusFromProbe, DEFAULT_DISCOVERY_PORTS } from './connect-engine'
export { createRecordFileEngine, parseRecordBatch, recordKindFor, recordBatchSchema } from './record-file-engine'
export {
  HOST_DISCOVERY_METHODS,
  PORT_SCAN_METHODS,
  isHostDiscoveryMethod,
  isPortScanMethod,
  describeMethod,
} from './types'
export type { ProbeOutcome, ProbeResult } from './connect-engine'
export type { HostDiscoveryMethod, PortScanMethod, ScanMethod, ScanOptions, ScanEngine } from './types'
