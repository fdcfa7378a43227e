/**
 * Port specification parsing
 *
 * Port specifications:
 * - Numeric: single port (e.g., "80")
 * - Range: inclusive port range, start strictly below end (e.g., "1-1024")
 * - Comma-separated: multiple specs (e.g., "22,80,443-445")
 */

import { PortParseError } from '@/lib/errors'

export const MAX_PORT = 0xffff

function parsePortNumber(text: string, segment: string): number {
  if (!/^\d{1,5}$/.test(text)) {
    throw new PortParseError(segment, 'malformed')
  }
  const port = parseInt(text, 10)
  if (port > MAX_PORT) {
    throw new PortParseError(segment, 'malformed')
  }
  return port
}

/**
 * Parse a port expression into an ordered, duplicate-free port list
 * "80,443-445,80" -> [80, 443, 444, 445]
 * ""              -> []
 *
 * Throws PortParseError on the first malformed segment or reversed range.
 */
export function parsePorts(spec: string): number[] {
  if (!spec || spec.trim().length === 0) {
    return []
  }

  const seen = new Set<number>()
  const ports: number[] = []
  const add = (port: number) => {
    if (!seen.has(port)) {
      seen.add(port)
      ports.push(port)
    }
  }

  for (const raw of spec.split(',')) {
    const segment = raw.trim()
    if (!segment) continue

    const dash = segment.indexOf('-')
    if (dash === -1) {
      add(parsePortNumber(segment, segment))
      continue
    }

    const start = parsePortNumber(segment.substring(0, dash).trim(), segment)
    const end = parsePortNumber(segment.substring(dash + 1).trim(), segment)
    if (start >= end) {
      throw new PortParseError(segment, 'range-order')
    }
    for (let port = start; port <= end; port++) {
      add(port)
    }
  }

  return ports
}

/**
 * Render a port list back into a compact expression, collapsing runs
 * [22, 80, 81, 82, 443] -> "22,80-82,443"
 */
export function describePorts(ports: readonly number[]): string {
  const parts: string[] = []
  let i = 0
  while (i < ports.length) {
    let j = i
    while (j + 1 < ports.length && ports[j + 1] === ports[j] + 1) j++
    parts.push(j > i ? `${ports[i]}-${ports[j]}` : `${ports[i]}`)
    i = j + 1
  }
  return parts.join(',')
}
