/**
 * fix and verify commands
 *
 * Plan → Remediator (Scan → Patch → Verify per file) → status lines + JSON report
 */

import { resolve } from 'path'
import type { Command } from 'commander'
import type { GlobalOptions } from '../index.js'
import { ExitCode } from '../index.js'
import { createLogger, status } from '../../utils/logger.js'
import { isDirectory } from '../../utils/hash.js'
import { PlanLoader, toPatchSpec, toProbe, type Plan } from '../../core/plan/index.js'
import { PatternScanner } from '../../core/scanner/index.js'
import { Remediator } from '../../core/remediator/index.js'
import { JsonReporter } from '../../core/reporter/json.js'
import type { FileReport, RunReport } from '../../types/index.js'

const logger = createLogger('remediate')

export interface RemediateOptions {
  plan: string
  output?: string
  json?: boolean
  dryRun?: boolean
}

/**
 * Human-readable status lines for one file. Every failure names the file,
 * the patch and its anchor, and the failure category.
 */
export function formatFileStatus(report: FileReport): Array<{ ok: boolean; message: string }> {
  const lines: Array<{ ok: boolean; message: string }> = []

  for (const patch of report.patches) {
    if (patch.applied) {
      lines.push({ ok: true, message: `patch ${patch.patchId} applied (${patch.message})` })
    } else if (patch.reason === 'already-applied') {
      lines.push({ ok: true, message: `patch ${patch.patchId} already applied` })
    } else {
      lines.push({
        ok: false,
        message: `patch ${patch.patchId} [${patch.locator}] ${patch.reason ?? 'failed'}: ${patch.message}`
      })
    }
  }

  const { verification } = report
  for (const marker of verification.missingMarkers) {
    lines.push({ ok: false, message: `verification-failed: missing ${JSON.stringify(marker)}` })
  }
  for (const match of verification.forbiddenMatches) {
    lines.push({
      ok: false,
      message: `verification-failed: forbidden ${JSON.stringify(match.marker)} at line ${match.line}: ${match.text}`
    })
  }
  if (verification.error) {
    lines.push({ ok: false, message: `verification error: ${verification.error}` })
  }
  if (report.error) {
    lines.push({ ok: false, message: `error: ${report.error}` })
  }
  if (lines.every(line => line.ok)) {
    lines.push({ ok: true, message: 'verified' })
  }

  return lines
}

function printRun(report: RunReport): void {
  for (const file of report.files) {
    for (const line of formatFileStatus(file)) {
      status(line.ok, file.file, line.message)
    }
  }
  const { summary } = report
  logger.info(
    `${summary.files} file(s): ${summary.patchesApplied} patched, ` +
      `${summary.patchesAlreadyApplied} already applied, ${summary.patchesFailed} failed; ` +
      `${summary.verificationsPassed} verified, ${summary.verificationsFailed} failed verification`
  )
}

function loadPlan(planPath: string): Plan | undefined {
  try {
    return new PlanLoader().load(planPath)
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error))
    return undefined
  }
}

function execute(
  source: string,
  options: RemediateOptions,
  globalOptions: GlobalOptions,
  withPatches: boolean
): number {
  const root = resolve(source)
  if (!isDirectory(root)) {
    logger.error(`Not a directory: ${source}`)
    return ExitCode.ERROR
  }

  const plan = loadPlan(options.plan)
  if (!plan) {
    return ExitCode.ERROR
  }

  const remediator = new Remediator(root, {
    dryRun: options.dryRun,
    scanner: new PatternScanner({
      allowList: plan.scan.allow_list,
      exceptions: plan.scan.exceptions
    })
  })

  const report = remediator.run({
    planName: plan.name,
    patches: withPatches ? plan.patches.map(toPatchSpec) : [],
    probes: plan.probes.map(toProbe)
  })

  const reporter = new JsonReporter<RunReport>()
  if (options.output) {
    reporter.write(report, { output: options.output })
  }
  if (options.json) {
    reporter.write(report, { quiet: globalOptions.quiet })
  } else {
    printRun(report)
  }

  return report.exitCode
}

/**
 * Apply a plan's patches, then verify
 */
export function executeFix(source: string, options: RemediateOptions, globalOptions: GlobalOptions): number {
  return execute(source, options, globalOptions, true)
}

/**
 * Run a plan's probes only
 */
export function executeVerify(source: string, options: RemediateOptions, globalOptions: GlobalOptions): number {
  return execute(source, options, globalOptions, false)
}

export function registerFixCommand(program: Command): void {
  program
    .command('fix <root>')
    .description('Apply a remediation plan to a tree and verify the result')
    .requiredOption('-p, --plan <file>', 'Remediation plan')
    .option('-o, --output <file>', 'Write the JSON run report to a file')
    .option('--json', 'Print the JSON run report instead of status lines')
    .option('--dry-run', 'Compute and verify patches without writing files')
    .action((root: string, options: RemediateOptions) => {
      process.exit(executeFix(root, options, program.opts<GlobalOptions>()))
    })
}

export function registerVerifyCommand(program: Command): void {
  program
    .command('verify <root>')
    .description("Run a plan's verification probes without patching")
    .requiredOption('-p, --plan <file>', 'Remediation plan')
    .option('-o, --output <file>', 'Write the JSON run report to a file')
    .option('--json', 'Print the JSON run report instead of status lines')
    .action((root: string, options: RemediateOptions) => {
      process.exit(executeVerify(root, options, program.opts<GlobalOptions>()))
    })
}
