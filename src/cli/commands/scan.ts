/**
 * Scan command implementation
 *
 * Tree → PatternScanner → statistics → Reporter. Read-only.
 */

import { resolve } from 'path'
import type { Command } from 'commander'
import type { GlobalOptions } from '../index.js'
import { ExitCode } from '../index.js'
import { createLogger, finding as logFinding } from '../../utils/logger.js'
import { isDirectory } from '../../utils/hash.js'
import { PatternScanner, collectStats } from '../../core/scanner/index.js'
import { PlanLoader, type ScanConfig } from '../../core/plan/index.js'
import { JsonReporter } from '../../core/reporter/json.js'
import { MarkdownReporter } from '../../core/reporter/markdown.js'
import { summarizeFindings, type ScanReport, type Severity } from '../../types/index.js'
import { REPORT_VERSION } from '../../core/remediator/index.js'

const logger = createLogger('scan')

const SEVERITY_RANK: Record<Severity, number> = {
  info: 0,
  low: 1,
  medium: 2,
  high: 3,
  critical: 4
}

/**
 * Scan command options
 */
export interface ScanOptions {
  output?: string
  format?: 'json' | 'markdown'
  plan?: string
  failOn?: Severity
}

function isSeverity(value: string): value is Severity {
  return Object.hasOwn(SEVERITY_RANK, value)
}

/**
 * Build a scan report for a tree
 */
export function buildScanReport(root: string, config?: ScanConfig, planName?: string): ScanReport {
  const startTime = Date.now()
  const scanner = new PatternScanner({
    allowList: config?.allow_list,
    exceptions: config?.exceptions
  })
  const result = scanner.scanTree(root, {
    include: config?.include,
    exclude: config?.exclude
  })

  return {
    version: REPORT_VERSION,
    timestamp: new Date().toISOString(),
    root,
    planName,
    findings: result.findings,
    summary: summarizeFindings(result.findings),
    stats: collectStats(root, config?.exclude),
    duration: Date.now() - startTime,
    errors: result.errors
  }
}

/**
 * Execute scan command
 */
export function executeScan(
  source: string,
  options: ScanOptions,
  globalOptions: GlobalOptions
): number {
  const root = resolve(source)
  if (!isDirectory(root)) {
    logger.error(`Not a directory: ${source}`)
    return ExitCode.ERROR
  }

  try {
    const plan = options.plan ? new PlanLoader().load(options.plan) : undefined
    const report = buildScanReport(root, plan?.scan, plan?.name)

    const reporter = options.format === 'markdown' ? new MarkdownReporter() : new JsonReporter()
    reporter.write(report, {
      output: options.output,
      quiet: globalOptions.quiet
    })

    // Findings go to the console only when the report went to a file
    if (options.output && !globalOptions.quiet) {
      for (const f of report.findings) {
        logFinding(f.severity, `${f.rule}: ${f.message}`, `${f.file}:${f.line}`)
      }
      logger.info(`${report.findings.length} finding(s) in ${report.stats.sourceFiles + report.stats.headerFiles} C file(s)`)
    }

    for (const error of report.errors) {
      logger.warn(error)
    }

    const threshold = options.failOn
    if (threshold && report.findings.some(f => SEVERITY_RANK[f.severity] >= SEVERITY_RANK[threshold])) {
      return ExitCode.VERIFICATION_FAILED
    }
    return ExitCode.SUCCESS
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error'
    logger.error(`Scan failed: ${message}`)
    return ExitCode.ERROR
  }
}

/**
 * Register scan command on the program
 */
export function registerScanCommand(program: Command): void {
  program
    .command('scan <root>')
    .description('Scan a C source tree for unsafe patterns')
    .option('-o, --output <file>', 'Output file path')
    .option('-f, --format <format>', 'Output format (json|markdown)', 'json')
    .option('-p, --plan <file>', 'Plan whose scan settings to use')
    .option('--fail-on <severity>', 'Exit 1 when a finding is at or above this severity')
    .action((root: string, options: Omit<ScanOptions, 'failOn'> & { failOn?: string }) => {
      const { failOn, ...rest } = options
      if (failOn !== undefined && !isSeverity(failOn)) {
        logger.error(`Unknown severity: ${failOn}`)
        process.exit(ExitCode.ERROR)
        return
      }
      process.exit(executeScan(root, { ...rest, failOn }, program.opts<GlobalOptions>()))
    })
}
