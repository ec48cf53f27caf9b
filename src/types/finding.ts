/**
 * Severity levels for findings
 */
export type Severity = 'critical' | 'high' | 'medium' | 'low' | 'info'

/**
 * Categories of suspicious C source patterns
 */
export type FindingCategory = 'unsafe-call' | 'unchecked-allocation' | 'overflow-risk'

/**
 * A single detected instance of a suspicious textual pattern
 */
export interface Finding {
  /** Path relative to the scanned root, forward slashes */
  readonly file: string

  /** 1-based line number */
  readonly line: number

  readonly category: FindingCategory

  /** Rule identifier that produced this finding */
  readonly rule: string

  readonly severity: Severity

  /** Human-readable message describing the finding */
  readonly message: string

  /** The text that matched, truncated */
  readonly matchedText: string
}

/**
 * Summary of findings by severity
 */
export interface FindingSummary {
  critical: number
  high: number
  medium: number
  low: number
  info: number
}

/**
 * Count findings per severity
 */
export function summarizeFindings(findings: readonly Finding[]): FindingSummary {
  const summary: FindingSummary = { critical: 0, high: 0, medium: 0, low: 0, info: 0 }
  for (const finding of findings) {
    summary[finding.severity]++
  }
  return summary
}
