/**
 * Batch Resolver
 * Accumulates targets from a comma-separated list or a line-oriented file.
 *
 * Resolution is all-or-nothing: the first bad token aborts the batch and no
 * partial target list is returned.
 */

import { readFile } from 'node:fs/promises'
import { EmptyTargetSetError, IOError } from '@/lib/errors'
import { parsePorts } from '@/features/ports'
import { expandToken } from './expand'
import type { ResolveContext, Target } from './types'

/**
 * Split a comma list into trimmed, non-empty tokens
 * " 10.0.0.1, ,example.com " -> ["10.0.0.1", "example.com"]
 */
export function splitTargetList(spec: string): string[] {
  return spec
    .split(',')
    .map((token) => token.trim())
    .filter((token) => token.length > 0)
}

/**
 * Expand tokens one after another, keeping input order
 */
export async function expandTokens(
  tokens: string[],
  ports: readonly number[],
  context: ResolveContext,
): Promise<Target[]> {
  const targets: Target[] = []
  for (const token of tokens) {
    const expanded = await expandToken(token, ports, context)
    targets.push(...expanded)
  }
  return targets
}

/**
 * Resolve a comma-separated target list
 * Throws EmptyTargetSetError when nothing resolves.
 */
export async function resolveList(spec: string, portsSpec: string, context: ResolveContext): Promise<Target[]> {
  const ports = parsePorts(portsSpec)
  const targets = await expandTokens(splitTargetList(spec), ports, context)

  if (targets.length === 0) {
    throw new EmptyTargetSetError(spec)
  }
  context.logger.info({ targets: targets.length }, 'resolved target list')
  return targets
}

/**
 * Resolve a target file: one token (or comma list) per line, blank lines
 * ignored
 * Throws IOError when the file cannot be read and EmptyTargetSetError when
 * nothing resolves.
 */
export async function resolveFile(filePath: string, portsSpec: string, context: ResolveContext): Promise<Target[]> {
  const ports = parsePorts(portsSpec)

  let content: string
  try {
    content = await readFile(filePath, 'utf-8')
  } catch (err) {
    throw new IOError(filePath, err)
  }

  const tokens = content.split(/\r?\n/).flatMap(splitTargetList)
  context.logger.debug({ file: filePath, tokens: tokens.length }, 'read target file')

  const targets = await expandTokens(tokens, ports, context)
  if (targets.length === 0) {
    throw new EmptyTargetSetError(filePath)
  }
  context.logger.info({ file: filePath, targets: targets.length }, 'resolved target file')
  return targets
}

/**
 * Drop repeated targets with the same address and ports, keeping the first
 * one seen (and its origin)
 */
export function dedupeTargets(targets: readonly Target[]): Target[] {
  const seen = new Set<string>()
  const unique: Target[] = []
  for (const target of targets) {
    const key = `${target.address}|${target.ports.join(',')}`
    if (seen.has(key)) continue
    seen.add(key)
    unique.push(target)
  }
  return unique
}
