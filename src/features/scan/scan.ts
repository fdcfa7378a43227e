/**
 * Scan orchestration shared by the CLI and tests
 * resolve targets -> engine batch -> aggregated report
 */

import { describePorts } from '@/features/ports'
import { aggregate, APP_NAME, type Report } from '@/features/report'
import { dedupeTargets, resolveFile, resolveList, type ResolveContext, type Target } from '@/features/targets'
import type { ScanEngine, ScanOptions } from '@/features/engine'

export interface TargetRequest {
  /** Comma-separated target list */
  list?: string
  /** Target file, one token or comma list per line */
  filename?: string
  /** Port specification, possibly empty */
  ports: string
  dedupe: boolean
}

/**
 * Resolve the list and then the file, in that order
 */
export async function resolveTargets(request: TargetRequest, context: ResolveContext): Promise<Target[]> {
  const targets: Target[] = []
  if (request.list !== undefined) {
    targets.push(...(await resolveList(request.list, request.ports, context)))
  }
  if (request.filename !== undefined) {
    targets.push(...(await resolveFile(request.filename, request.ports, context)))
  }
  return request.dedupe ? dedupeTargets(targets) : targets
}

/**
 * Number of probes a scan will send before retries
 */
export function probeCount(targets: readonly Target[]): number {
  return targets.reduce((sum, target) => sum + Math.max(1, target.ports.length), 0)
}

/**
 * Run the engine and aggregate its batch; elapsed time covers probing only
 */
export async function runScan(
  engine: ScanEngine,
  targets: readonly Target[],
  options: ScanOptions,
  now: () => number = () => performance.now(),
): Promise<Report> {
  const start = now()
  const batch = await engine.run(targets, options)
  const elapsed = (now() - start) / 1000
  return aggregate(batch, { targets: targets.length, elapsed, topK: options.topK })
}

function pad(value: number): string {
  return String(value).padStart(2, '0')
}

/**
 * "Starting reconmap 0.3.0 at 2024-05-01 09:07"
 */
export function formatBanner(version: string, date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}`
  return `Starting ${APP_NAME} ${version} at ${day} ${time}`
}

/**
 * "10.0.0.1 22,80-82" or just the address when there are no ports
 */
export function formatTarget(target: Target): string {
  return target.ports.length > 0 ? `${target.address} ${describePorts(target.ports)}` : target.address
}
