export { resolveTargets, runScan, probeCount, formatBanner, formatTarget } from './scan'
export type { TargetRequest } from './scan'
