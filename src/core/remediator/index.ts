import { join } from 'path'
import type {
  FileReport,
  FileStatus,
  PatchResult,
  PatchSpec,
  RunReport,
  RunSummary,
  VerificationOutcome,
  VerificationProbe
} from '../../types/index.js'
import { createLogger } from '../../utils/logger.js'
import { hashContent, hashFile, isFile } from '../../utils/hash.js'
import {
  describeLocator,
  applyPatches,
  decodeFromSource,
  readSourceFile,
  specForSource,
  writeSourceFile,
  WriteFailureError
} from '../patcher/index.js'
import { PatternScanner } from '../scanner/index.js'
import { readFileContent } from '../scanner/utils.js'
import { mergeOutcomes, verify, verifyFile } from '../verifier/index.js'

const logger = createLogger('remediator')

export const REPORT_VERSION = '1.0.0'

/**
 * Exit status per file outcome. The run exits with the worst one.
 */
export const ExitCodes: Record<FileStatus, number> = {
  ok: 0,
  'verification-failed': 1,
  'patch-failed': 2,
  error: 3
} as const

export interface RemediationInput {
  planName: string
  patches: readonly PatchSpec[]
  probes: readonly VerificationProbe[]
}

export interface RemediatorOptions {
  /** Compute and verify patched content in memory without writing */
  dryRun?: boolean
  scanner?: PatternScanner
}

function worstStatus(statuses: readonly FileStatus[]): FileStatus {
  return statuses.reduce<FileStatus>(
    (worst, status) => (ExitCodes[status] > ExitCodes[worst] ? status : worst),
    'ok'
  )
}

function groupBy<T>(items: readonly T[], key: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>()
  for (const item of items) {
    const k = key(item)
    const group = groups.get(k)
    if (group) {
      group.push(item)
    } else {
      groups.set(k, [item])
    }
  }
  return groups
}

/**
 * Runs Scan → Patch → Verify for every file a plan touches.
 *
 * Files are processed one at a time in lexical path order and each file's
 * sequence completes before the next starts. Verification always runs, even
 * after a failed patch, and reads the file back from disk rather than
 * trusting the patcher.
 */
export class Remediator {
  private readonly scanner: PatternScanner
  private readonly dryRun: boolean

  constructor(
    private readonly rootDir: string,
    options: RemediatorOptions = {}
  ) {
    this.scanner = options.scanner ?? new PatternScanner()
    this.dryRun = options.dryRun ?? false
  }

  run(input: RemediationInput): RunReport {
    const patchesByFile = groupBy(input.patches, p => p.targetFile)
    const probesByFile = groupBy(input.probes, p => p.file)
    const files = [...new Set([...patchesByFile.keys(), ...probesByFile.keys()])].sort()

    const reports = files.map(file =>
      this.processFile(file, patchesByFile.get(file) ?? [], probesByFile.get(file) ?? [])
    )

    const status = worstStatus(reports.map(r => r.status))
    return {
      version: REPORT_VERSION,
      timestamp: new Date().toISOString(),
      root: this.rootDir,
      planName: input.planName,
      dryRun: this.dryRun,
      files: reports,
      summary: summarize(reports),
      exitCode: ExitCodes[status],
      errors: reports.flatMap(r => (r.error ? [`${r.file}: ${r.error}`] : []))
    }
  }

  private processFile(
    file: string,
    specs: readonly PatchSpec[],
    probes: readonly VerificationProbe[]
  ): FileReport {
    const path = join(this.rootDir, file)
    const report: FileReport = {
      file,
      state: 'unscanned',
      status: 'ok',
      findingsBefore: [],
      patches: [],
      findingsAfter: [],
      verification: { file, passed: true, missingMarkers: [], forbiddenMatches: [] }
    }
    let pending: string | undefined
    let patchFailed = false

    logger.debug(`Processing ${file} (${specs.length} patch(es), ${probes.length} probe(s))`)

    if (!isFile(path)) {
      report.patches = specs.map(spec => missingTarget(spec))
      patchFailed = specs.length > 0
      if (specs.length === 0 && probes.length === 0) {
        report.error = 'file not found'
      }
    } else {
      try {
        const source = readSourceFile(path)
        report.hashBefore = hashContent(Buffer.from(source.text, source.encoding))
        report.findingsBefore = [...this.scanner.scan(decodeFromSource(source.text, source.encoding), file)]
        report.state = 'scanned'

        if (specs.length > 0) {
          const result = applyPatches(source.text, specs.map(spec => specForSource(spec, source.encoding)))
          report.patches = result.results
          report.state = 'patch-attempted'
          patchFailed = result.failed

          if (result.changed) {
            if (this.dryRun) {
              pending = decodeFromSource(result.text, source.encoding)
            } else {
              try {
                writeSourceFile({ ...source, text: result.text })
              } catch (error) {
                if (!(error instanceof WriteFailureError)) throw error
                report.patches = report.patches.map(p => writeFailed(p, error))
                patchFailed = true
              }
            }
          }
        }
      } catch (error) {
        report.error = error instanceof Error ? error.message : String(error)
      }
    }

    const afterText = pending ?? readFileContent(path)
    if (afterText !== null) {
      report.findingsAfter = [...this.scanner.scan(afterText, file)]
    }
    report.verification = this.verifyAll(file, probes, pending)
    report.state = 'verified'
    report.hashAfter = hashFile(path)

    report.status = report.error
      ? 'error'
      : patchFailed
        ? 'patch-failed'
        : report.verification.passed
          ? 'ok'
          : 'verification-failed'

    return report
  }

  private verifyAll(
    file: string,
    probes: readonly VerificationProbe[],
    pending: string | undefined
  ): VerificationOutcome {
    if (probes.length === 0) {
      return { file, passed: true, missingMarkers: [], forbiddenMatches: [] }
    }
    const outcomes = probes.map(probe =>
      pending !== undefined ? verify(pending, probe) : verifyFile(this.rootDir, probe)
    )
    return mergeOutcomes(file, outcomes)
  }
}

function missingTarget(spec: PatchSpec): PatchResult {
  return {
    patchId: spec.id,
    targetFile: spec.targetFile,
    locator: describeLocator(spec),
    applied: false,
    reason: 'anchor-not-found',
    message: `target file not found: ${spec.targetFile}`
  }
}

function writeFailed(result: PatchResult, error: WriteFailureError): PatchResult {
  if (!result.applied) {
    return result
  }
  return { ...result, applied: false, reason: 'write-failure', message: error.message }
}

function summarize(reports: readonly FileReport[]): RunSummary {
  const patches = reports.flatMap(r => r.patches)
  return {
    files: reports.length,
    patchesApplied: patches.filter(p => p.applied).length,
    patchesAlreadyApplied: patches.filter(p => p.reason === 'already-applied').length,
    patchesFailed: patches.filter(p => !p.applied && p.reason !== 'already-applied').length,
    verificationsPassed: reports.filter(r => r.verification.passed).length,
    verificationsFailed: reports.filter(r => !r.verification.passed).length
  }
}

/**
 * Create a remediator for a tree root
 */
export function createRemediator(rootDir: string, options?: RemediatorOptions): Remediator {
  return new Remediator(rootDir, options)
}
