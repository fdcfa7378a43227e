#!/usr/bin/env -S npx tsx
/**
 * reconmap command line
 * Resolves targets, runs a scan engine and prints the aggregated report.
 * The report goes to stdout; banner, spinners and logs go to stderr.
 */

import type { Command } from 'commander'
import chalk from 'chalk'
import ora from 'ora'
import prompts from 'prompts'
import pkg from '../package.json'
import { reportFailure } from '@/lib/errors'
import { createLogger, type Logger } from '@/lib/logger'
import { createSystemDnsResolver, type ResolveContext, type Target } from '@/features/targets'
import { renderReport } from '@/features/report'
import { createConnectEngine, createRecordFileEngine, describeMethod, type ScanEngine } from '@/features/engine'
import { formatBanner, formatTarget, probeCount, resolveTargets, runScan } from '@/features/scan'
import { buildProgram, configFrom, scanMethodFrom, type CliOptions } from './program'

/** Probe count above which an interactive run asks before scanning */
const CONFIRM_PROBES = 65_536

/** Replaced once the configuration is known; failures are logged through it */
let logger: Logger = createLogger()

// =============================================================================
// Steps
// =============================================================================

async function confirmLargeScan(targets: readonly Target[], options: CliOptions): Promise<boolean> {
  const probes = probeCount(targets)
  if (options.yes || probes <= CONFIRM_PROBES || !process.stdin.isTTY) {
    return true
  }

  const { proceed } = await prompts({
    type: 'confirm',
    name: 'proceed',
    message: `Send ${probes} probes to ${targets.length} targets?`,
    initial: false,
  })
  return proceed === true
}

function createEngine(options: CliOptions): ScanEngine {
  if (options.results !== undefined) {
    return createRecordFileEngine(options.results, logger.child({ engine: 'record-file' }))
  }
  return createConnectEngine(logger.child({ engine: 'connect' }))
}

async function run(list: string | undefined, options: CliOptions, command: Command): Promise<void> {
  if (list === undefined && options.filename === undefined) {
    command.error('error: give a target list or --filename')
  }

  const method = scanMethodFrom(options)
  const config = configFrom(options)
  logger = createLogger({ level: config.logLevel, format: config.logFormat })

  const context: ResolveContext = {
    dns: createSystemDnsResolver(config.dnsServers, logger.child({ component: 'dns' })),
    preference: config.preference,
    subnetPolicy: config.subnetPolicy,
    maxTargets: config.maxTargets,
    logger: logger.child({ component: 'targets' }),
  }

  const resolving = ora('Resolving targets...').start()
  let targets: Target[]
  try {
    targets = await resolveTargets(
      { list, filename: options.filename, ports: options.ports, dedupe: options.dedupe },
      context,
    )
    resolving.succeed(`Resolved ${targets.length} targets`)
  } catch (err) {
    resolving.fail('Target resolution failed')
    throw err
  }

  if (options.listTargets) {
    for (const target of targets) {
      console.log(formatTarget(target))
    }
    return
  }

  if (!(await confirmLargeScan(targets, options))) {
    console.error(chalk.gray('Scan cancelled.'))
    return
  }

  console.error(chalk.cyan(formatBanner(pkg.version, new Date())))

  const engine = createEngine(options)
  const scanning = ora(`Running ${describeMethod(method)}...`).start()
  try {
    const report = await runScan(engine, targets, {
      method,
      timeout: config.timeout,
      threads: config.threads,
      retries: config.retries,
      topK: config.topK,
    })
    scanning.stop()
    console.log(renderReport(report))
  } catch (err) {
    scanning.fail(`${describeMethod(method)} failed`)
    throw err
  }
}

// =============================================================================
// Main
// =============================================================================

const program = buildProgram(run)

process.on('SIGINT', () => {
  console.error(chalk.gray('\nScan cancelled.'))
  process.exit(130)
})

program.parseAsync(process.argv).catch((err: unknown) => {
  const friendly = reportFailure(err, logger)
  console.error(chalk.red(`${friendly.title}: ${friendly.message}`))
  if (friendly.hint) {
    console.error(chalk.gray(friendly.hint))
  }
  process.exit(1)
})
