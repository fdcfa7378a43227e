/**
 * TLD Registry
 * Static set of recognized top-level domain labels, used to tell domain
 * names apart from malformed address literals
 */

import * as fs from 'node:fs'
import * as path from 'node:path'
import { fileURLToPath } from 'node:url'

const TLD_FILE = path.join(path.dirname(fileURLToPath(import.meta.url)), '..', '..', 'data', 'tlds.txt')

// Lazy-loaded label set (upper-case)
let tlds: Set<string> | null = null

/**
 * Parse the registry file format: one label per line, '#' starts a comment line
 */
export function parseTldList(content: string): Set<string> {
  const labels = new Set<string>()
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim()
    if (!trimmed || trimmed.startsWith('#')) continue
    labels.add(trimmed.toUpperCase())
  }
  return labels
}

function loadTlds(): Set<string> {
  if (tlds === null) {
    tlds = parseTldList(fs.readFileSync(TLD_FILE, 'utf-8'))
  }
  return tlds
}

/**
 * Case-insensitive membership test
 * "com" -> true, "COM" -> true, "local" -> false
 */
export function isKnownTld(label: string): boolean {
  if (!label) return false
  return loadTlds().has(label.toUpperCase())
}

export function tldCount(): number {
  return loadTlds().size
}
