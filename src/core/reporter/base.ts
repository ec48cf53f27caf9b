import type { ReportOptions } from '../../types/index.js'

/**
 * Base interface for all reporters
 */
export interface Reporter<T> {
  /**
   * Render a report as a string
   */
  generate(report: T, options?: Partial<ReportOptions>): string

  /**
   * Write report to the output file, or stdout when none is given
   */
  write(report: T, options?: Partial<ReportOptions>): void
}

/**
 * Extended report options with format-specific settings
 */
export interface JsonReportOptions extends ReportOptions {
  /** Pretty print JSON with indentation */
  pretty?: boolean
}
