import type { Finding, FindingSummary } from './finding.js'
import type { PatchResult } from './patch.js'
import type { VerificationOutcome } from './verification.js'

/**
 * Per-file lifecycle within one run
 */
export type FileState = 'unscanned' | 'scanned' | 'patch-attempted' | 'verified'

/**
 * Worst outcome recorded for a file
 */
export type FileStatus = 'ok' | 'verification-failed' | 'patch-failed' | 'error'

export interface FileReport {
  file: string
  state: FileState
  status: FileStatus
  findingsBefore: Finding[]
  patches: PatchResult[]
  findingsAfter: Finding[]
  verification: VerificationOutcome
  /** SHA-256 of the content read at the start of the run */
  hashBefore?: string
  /** SHA-256 of the content on disk after the run */
  hashAfter?: string
  error?: string
}

export interface RunSummary {
  files: number
  patchesApplied: number
  patchesAlreadyApplied: number
  patchesFailed: number
  verificationsPassed: number
  verificationsFailed: number
}

/**
 * Complete result of a remediation run
 */
export interface RunReport {
  version: string
  timestamp: string
  root: string
  planName: string
  dryRun: boolean
  files: FileReport[]
  summary: RunSummary
  exitCode: number
  errors: string[]
}

/**
 * Counts gathered while walking a source tree
 */
export interface RepositoryStats {
  totalFiles: number
  sourceFiles: number
  headerFiles: number
  testFiles: number
  documentationFiles: number
  buildFiles: number
  totalLines: number
  functions: number
}

/**
 * Result of a scan-only run
 */
export interface ScanReport {
  version: string
  timestamp: string
  root: string
  planName?: string
  findings: Finding[]
  summary: FindingSummary
  stats: RepositoryStats
  duration: number
  errors: string[]
}

/**
 * Options for report generation
 */
export interface ReportOptions {
  format: 'json' | 'markdown'
  output?: string
  quiet?: boolean
}
