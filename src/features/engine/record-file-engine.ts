/**
 * Engine adapter for results produced elsewhere
 * Reads a JSON file `{ "kind": ..., "records": [...] }` written by an
 * external (privileged) engine and hands it to the aggregator as if it had
 * been probed here. Records for addresses outside the resolved targets are
 * dropped.
 */

import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { canonicalAddress } from '@/lib/cidr'
import { IOError, RecordFormatError } from '@/lib/errors'
import { silentLogger, type Logger } from '@/lib/logger'
import type { Target } from '@/features/targets'
import type { RecordBatch, RecordKind, ResultRecord } from '@/features/report'
import { describeMethod, type ScanEngine, type ScanMethod, type ScanOptions } from './types'

// =============================================================================
// Schema
// =============================================================================

const cost = z.number().nonnegative()

const pingRecordSchema = z.object({
  kind: z.literal('ping'),
  address: z.string().min(1),
  status: z.enum(['up', 'down']),
  cost,
})

const macRecordSchema = z.object({
  kind: z.literal('mac'),
  address: z.string().min(1),
  mac: z.string().optional(),
  vendor: z.string().optional(),
  cost,
})

const portRecordSchema = z.object({
  kind: z.literal('port'),
  address: z.string().min(1),
  port: z.number().int().min(0).max(0xffff),
  protocol: z.enum(['tcp', 'udp']),
  status: z.enum(['open', 'closed', 'filtered', 'unfiltered', 'open|filtered', 'closed|filtered']),
  cost,
})

const osRecordSchema = z.object({
  kind: z.literal('os'),
  address: z.string().min(1),
  candidates: z.array(z.object({ name: z.string(), cpe: z.array(z.string()) })),
  cost,
})

export const recordBatchSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('ping'), records: z.array(pingRecordSchema) }),
  z.object({ kind: z.literal('mac'), records: z.array(macRecordSchema) }),
  z.object({ kind: z.literal('port'), records: z.array(portRecordSchema) }),
  z.object({ kind: z.literal('os'), records: z.array(osRecordSchema) }),
])

// =============================================================================
// Helpers
// =============================================================================

/**
 * Record kind an engine produces for a scan method
 */
export function recordKindFor(method: ScanMethod): RecordKind {
  switch (method.mode) {
    case 'host-discovery':
      return method.method === 'mac' ? 'mac' : 'ping'
    case 'port-scan':
      return 'port'
    case 'os-detect':
      return 'os'
  }
}

/**
 * Validate parsed JSON as a record batch
 */
export function parseRecordBatch(data: unknown, filePath: string): RecordBatch {
  const result = recordBatchSchema.safeParse(data)
  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''
    throw new RecordFormatError(filePath, `${where}${issue.message}`)
  }
  return result.data
}

function keepTargets<R extends ResultRecord>(records: R[], addresses: ReadonlySet<string>): R[] {
  return records.filter((record) => addresses.has(canonicalAddress(record.address) ?? record.address))
}

function restrictBatch(batch: RecordBatch, targets: readonly Target[]): RecordBatch {
  const addresses = new Set(targets.map((target) => target.address))
  switch (batch.kind) {
    case 'ping':
      return { kind: 'ping', records: keepTargets(batch.records, addresses) }
    case 'mac':
      return { kind: 'mac', records: keepTargets(batch.records, addresses) }
    case 'port':
      return { kind: 'port', records: keepTargets(batch.records, addresses) }
    case 'os':
      return { kind: 'os', records: keepTargets(batch.records, addresses) }
  }
}

// =============================================================================
// Engine
// =============================================================================

export function createRecordFileEngine(filePath: string, logger: Logger = silentLogger()): ScanEngine {
  return {
    name: 'record-file',

    async run(targets: readonly Target[], options: ScanOptions): Promise<RecordBatch> {
      let content: string
      try {
        content = await readFile(filePath, 'utf-8')
      } catch (err) {
        throw new IOError(filePath, err, 'scan result file')
      }

      let data: unknown
      try {
        data = JSON.parse(content)
      } catch (err) {
        throw new RecordFormatError(filePath, err instanceof Error ? err.message : 'not valid JSON')
      }

      const batch = parseRecordBatch(data, filePath)
      const expected = recordKindFor(options.method)
      if (batch.kind !== expected) {
        throw new RecordFormatError(
          filePath,
          `holds ${batch.kind} records but ${describeMethod(options.method)} produces ${expected} records`,
        )
      }

      const restricted = restrictBatch(batch, targets)
      logger.debug(
        { file: filePath, kind: batch.kind, records: batch.records.length, kept: restricted.records.length },
        'loaded scan results',
      )
      return restricted
    },
  }
}
